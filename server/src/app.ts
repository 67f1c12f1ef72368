/**
 * Express application
 *
 * Built from an open database so tests can run it against an in-memory
 * SQLite instance. Route order: health and metrics (public), auth, record
 * sections, export, dashboard, then the 404 and error handlers.
 */

import type { Server } from 'http';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import type { KyselyDB } from './db/index.js';
import { requestLogger } from './utils/logger.js';
import { createMetrics, METRICS_PATH } from './utils/metrics.js';
import { errorHandler } from './middleware/errorHandler.js';
import { NotFoundError } from './utils/errors.js';
import authRoutes from './routes/auth.js';
import customerRoutes from './routes/customers.js';
import orderRoutes from './routes/orders.js';
import expenseRoutes from './routes/expenses.js';
import taskRoutes from './routes/tasks.js';
import exportRoutes from './routes/export.js';
import dashboardRoutes from './routes/dashboard.js';
import { createMetricsRouter } from './routes/metrics.js';

export interface AppOptions {
    db: KyselyDB;
    /** Allowed origin for a front end served elsewhere; credentials are allowed */
    corsOrigin?: string;
}

export function createApp({ db, corsOrigin }: AppOptions): Express {
    const app = express();
    const metrics = createMetrics();

    app.disable('x-powered-by');

    if (corsOrigin) {
        app.use(cors({ origin: corsOrigin, credentials: true }));
    }
    app.use(express.json({ limit: '1mb' }));
    app.use(cookieParser());
    app.use(requestLogger);
    app.use(metrics.countRequests);

    app.use((req: Request, _res: Response, next: NextFunction) => {
        req.db = db;
        next();
    });

    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });
    app.use(METRICS_PATH, createMetricsRouter(metrics));

    app.use('/api/auth', authRoutes);
    app.use('/api/customers', customerRoutes);
    app.use('/api/orders', orderRoutes);
    app.use('/api/expenses', expenseRoutes);
    app.use('/api/tasks', taskRoutes);
    app.use('/api/export', exportRoutes);
    app.use('/api/dashboard', dashboardRoutes);

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    app.use(errorHandler);

    return app;
}

/**
 * Resolves once the server is listening; rejects on a bind error such as
 * EADDRINUSE instead of leaving an unhandled 'error' event.
 */
export function listen(app: Express, port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server: Server = app.listen(port, host);
        server.once('error', reject);
        server.once('listening', () => {
            server.off('error', reject);
            resolve(server);
        });
    });
}
