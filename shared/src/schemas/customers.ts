/**
 * Customers Zod Schemas
 *
 * Request validation for customer create/update and the list/export filters.
 */

import { z } from 'zod';
import {
    dateRangeQuerySchema,
    optionalDateSchema,
    optionalText,
    requiredText,
    searchQuerySchema,
} from './common.js';

// ============================================
// INPUT SCHEMAS
// ============================================

export const customerInputSchema = z.object({
    name: requiredText('Name', 200),
    email: optionalText('Email', 200),
    phone: optionalText('Phone', 50),
    city: optionalText('City', 100),
    country: optionalText('Country', 100),
    /** Customer id on the store platform (e.g. the online shop's admin) */
    externalCustomerId: optionalText('External customer ID', 100),
    note: optionalText('Note', 500),
    /** Defaults to today on create, keeps the stored value on update */
    createdAt: optionalDateSchema,
});

export type CustomerInput = z.infer<typeof customerInputSchema>;

// ============================================
// QUERY SCHEMAS
// ============================================

/**
 * GET /customers?search=ann&start_date=2024-01-01&end_date=2024-01-31
 * search matches name, email and phone case-insensitively
 */
export const customersListQuerySchema = dateRangeQuerySchema.extend({
    search: searchQuerySchema,
});

export type CustomersListQuery = z.infer<typeof customersListQuerySchema>;

export const customersExportQuerySchema = dateRangeQuerySchema;

export type CustomersExportQuery = z.infer<typeof customersExportQuerySchema>;
