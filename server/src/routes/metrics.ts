/**
 * @module routes/metrics
 * @description Prometheus scrape endpoint
 *
 * Public like /api/health; scrapers carry no session cookie.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { getDashboardSummaryKysely } from '../db/queries/index.js';
import type { AppMetrics } from '../utils/metrics.js';

export function createMetricsRouter(metrics: AppMetrics): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        metrics.recordSummary(await getDashboardSummaryKysely(req.db));

        res.set('Content-Type', metrics.registry.contentType);
        res.send(await metrics.registry.metrics());
    }));

    return router;
}
