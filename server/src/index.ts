/**
 * Server entry point
 *
 * Opens the database, ensures the schema, listens on HOST:PORT and closes
 * both on SIGINT/SIGTERM through the shutdown coordinator.
 */

import type { Server } from 'http';
import { env } from './config/env.js';
import { createDatabase } from './db/index.js';
import { ensureSchema } from './db/schema.js';
import { createApp, listen } from './app.js';
import { shutdownCoordinator } from './utils/shutdownCoordinator.js';
import { serverLogger } from './utils/logger.js';

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

async function main(): Promise<void> {
    const db = createDatabase(env.DATABASE_PATH);
    await ensureSchema(db);

    const app = createApp({ db, corsOrigin: env.CORS_ORIGIN });

    let server: Server;
    try {
        server = await listen(app, env.PORT, env.HOST);
    } catch (error: unknown) {
        await db.destroy();
        throw error;
    }
    serverLogger.info({ host: env.HOST, port: env.PORT, env: env.NODE_ENV }, 'Server listening');

    shutdownCoordinator.register('http', () => closeServer(server));
    shutdownCoordinator.register('database', () => db.destroy());

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            serverLogger.info({ signal }, 'Shutdown signal received');
            shutdownCoordinator
                .shutdown()
                .then((results) => {
                    process.exit(results.every((r) => r.success) ? 0 : 1);
                })
                .catch((error: unknown) => {
                    serverLogger.error({ err: error }, 'Shutdown failed');
                    process.exit(1);
                });
        });
    }
}

main().catch((error: unknown) => {
    serverLogger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
