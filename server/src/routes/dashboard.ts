/**
 * @module routes/dashboard
 * @description Landing-page summary: totals, today's figures, recent records
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { getDashboardSummaryKysely } from '../db/queries/index.js';

const router: Router = Router();

router.get('/', authenticateToken, asyncHandler(async (req: Request, res: Response) => {
    res.json(await getDashboardSummaryKysely(req.db));
}));

export default router;
