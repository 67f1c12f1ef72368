/**
 * @fileoverview Export Routes - one xlsx workbook per record section
 *
 * GET /api/export/:section?start_date=YYYY-MM-DD&end_date=YYYY-MM-DD
 *   expenses also take filter_type (expense | income | all)
 *   tasks also take status_filter (Pending | In Progress | Done | all)
 *
 * Rows are oldest first. An inverted range is not an error: the workbook
 * carries only its header row.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    customersExportQuerySchema,
    EXPORT_SECTIONS,
    FILTER_ALL,
    ledgerExportQuerySchema,
    ordersExportQuerySchema,
    tasksExportQuerySchema,
    toDateRange,
    type ExportSection,
} from '@storekeep/shared';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    EXPORT_CONTENT_TYPE,
    exportSection,
    type ExportRequest,
} from '../services/export/exportService.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';

const router: Router = Router();

router.use(authenticateToken);

function isExportSection(value: string): value is ExportSection {
    return EXPORT_SECTIONS.some((section) => section === value);
}

/**
 * Validate the query for one section into an export request
 */
export function parseExportRequest(section: ExportSection, query: unknown): ExportRequest {
    switch (section) {
        case 'customers':
            return { section, range: toDateRange(parseInput(customersExportQuerySchema, query)) };
        case 'orders':
            return { section, range: toDateRange(parseInput(ordersExportQuerySchema, query)) };
        case 'expenses': {
            const parsed = parseInput(ledgerExportQuerySchema, query);
            return {
                section,
                range: toDateRange(parsed),
                type: parsed.filter_type === FILTER_ALL ? undefined : parsed.filter_type,
            };
        }
        case 'tasks': {
            const parsed = parseInput(tasksExportQuerySchema, query);
            return {
                section,
                range: toDateRange(parsed),
                status: parsed.status_filter === FILTER_ALL ? undefined : parsed.status_filter,
            };
        }
    }
}

router.get('/:section', asyncHandler(async (req: Request, res: Response) => {
    const { section } = req.params;
    if (!isExportSection(section)) {
        throw new NotFoundError(`Unknown export section: ${section}`, 'ExportSection', section);
    }

    const request = parseExportRequest(section, req.query);
    const { filename, buffer } = await exportSection(req.db, request);

    res.setHeader('Content-Type', EXPORT_CONTENT_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.send(buffer);
}));

export default router;
