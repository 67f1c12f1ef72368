/**
 * @module routes/expenses
 * @description Expense and income ledger
 *
 * filter_type narrows the list to one side; the totals always describe the
 * rows returned.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    FILTER_ALL,
    idParamSchema,
    ledgerEntryInputSchema,
    ledgerListQuerySchema,
    RECORD_DEFAULTS,
    summarizeLedger,
    todayDateString,
    type LedgerListResponse,
} from '@storekeep/shared';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    createLedgerEntryKysely,
    deleteLedgerEntryKysely,
    getLedgerEntryKysely,
    listLedgerEntriesKysely,
    updateLedgerEntryKysely,
} from '../db/queries/index.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { ledgerLogger } from '../utils/logger.js';

const router: Router = Router();

router.use(authenticateToken);

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(ledgerListQuerySchema, req.query);

    const entries = await listLedgerEntriesKysely(req.db, {
        type: query.filter_type === FILTER_ALL ? undefined : query.filter_type,
        startDate: query.start_date,
        endDate: query.end_date,
    });

    const body: LedgerListResponse = { entries, ...summarizeLedger(entries) };
    res.json(body);
}));

router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    const entry = await getLedgerEntryKysely(req.db, id);
    if (!entry) {
        throw new NotFoundError('Entry not found', 'LedgerEntry', id);
    }

    res.json(entry);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { date, type, category, ...input } = parseInput(ledgerEntryInputSchema, req.body);

    const entry = await createLedgerEntryKysely(req.db, {
        ...input,
        date: date ?? todayDateString(),
        type: type ?? RECORD_DEFAULTS.entryType,
        category: category ?? RECORD_DEFAULTS.category,
    });

    ledgerLogger.info({ entryId: entry.id, type: entry.type }, 'Ledger entry created');
    res.status(201).json(entry);
}));

router.put('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { date, type, category, ...input } = parseInput(ledgerEntryInputSchema, req.body);

    // Omitted date, type and category keep their stored values
    const entry = await updateLedgerEntryKysely(req.db, id, {
        ...input,
        ...(date !== undefined && { date }),
        ...(type !== undefined && { type }),
        ...(category !== undefined && { category }),
    });
    if (!entry) {
        throw new NotFoundError('Entry not found', 'LedgerEntry', id);
    }

    ledgerLogger.info({ entryId: id }, 'Ledger entry updated');
    res.json(entry);
}));

router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    if (!(await deleteLedgerEntryKysely(req.db, id))) {
        throw new NotFoundError('Entry not found', 'LedgerEntry', id);
    }

    ledgerLogger.info({ entryId: id }, 'Ledger entry deleted');
    res.json({ success: true });
}));

export default router;
