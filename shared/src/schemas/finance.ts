/**
 * Finance Zod Schemas
 *
 * Expense and income entries share one ledger table; `type` carries the
 * direction and `amount` is always non-negative.
 */

import { z } from 'zod';
import { ENTRY_TYPE_FILTERS, ENTRY_TYPES, FILTER_ALL } from '../domain/constants.js';
import {
    amountSchema,
    dateRangeQuerySchema,
    emptyToUndefined,
    optionalDateSchema,
    optionalText,
} from './common.js';

export const entryTypeSchema = z.enum(ENTRY_TYPES, {
    errorMap: () => ({ message: `Type must be one of: ${ENTRY_TYPES.join(', ')}` }),
});

export const entryTypeFilterSchema = z.preprocess(
    emptyToUndefined,
    z.enum(ENTRY_TYPE_FILTERS, {
        errorMap: () => ({ message: `filter_type must be one of: ${ENTRY_TYPE_FILTERS.join(', ')}` }),
    }).default(FILTER_ALL)
);

// ============================================
// INPUT SCHEMAS
// ============================================

export const ledgerEntryInputSchema = z.object({
    date: optionalDateSchema,
    /** Omitted: `expense` on create, unchanged on update */
    type: z.preprocess(emptyToUndefined, entryTypeSchema.optional()),
    /** Omitted: `General` on create, unchanged on update */
    category: z.preprocess(
        emptyToUndefined,
        z.string().max(100, 'Category must be at most 100 characters').optional()
    ),
    description: optionalText('Description', 255),
    amount: amountSchema('Amount'),
});

export type LedgerEntryInput = z.infer<typeof ledgerEntryInputSchema>;

// ============================================
// QUERY SCHEMAS
// ============================================

/** GET /expenses?filter_type=income&start_date=...&end_date=... */
export const ledgerListQuerySchema = dateRangeQuerySchema.extend({
    filter_type: entryTypeFilterSchema,
});

export type LedgerListQuery = z.infer<typeof ledgerListQuerySchema>;

export const ledgerExportQuerySchema = ledgerListQuerySchema;

export type LedgerExportQuery = z.infer<typeof ledgerExportQuerySchema>;
