/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 *
 * Form posts send empty strings for untouched inputs, so optional fields
 * normalize "" to null (stored) or undefined (filters) before validating.
 */

import { z } from 'zod';
import { isIsoDateString } from '../utils/dateHelpers.js';

// ============================================
// PREPROCESSORS
// ============================================

export function emptyToNull(value: unknown): unknown {
    return value === undefined || value === '' ? null : value;
}

export function emptyToUndefined(value: unknown): unknown {
    return value === '' || value === null ? undefined : value;
}

function toNumberInput(value: unknown): unknown {
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return value;
}

// ============================================
// FIELD SCHEMAS
// ============================================

export const isoDateSchema = z
    .string({ invalid_type_error: 'Date must be a string' })
    .refine(isIsoDateString, { message: 'Invalid date, expected YYYY-MM-DD' });

/** Optional date: "" and missing both mean "not given" */
export const optionalDateSchema = z.preprocess(emptyToUndefined, isoDateSchema.optional());

/** Required, non-blank text stored as submitted */
export function requiredText(field: string, max: number) {
    return z
        .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
        .max(max, `${field} must be at most ${max} characters`)
        .refine((value) => value.trim().length > 0, { message: `${field} is required` });
}

/** Optional text; "" and missing are stored as null */
export function optionalText(field: string, max: number) {
    return z.preprocess(
        emptyToNull,
        z.string({ invalid_type_error: `${field} must be a string` })
            .max(max, `${field} must be at most ${max} characters`)
            .nullable()
    );
}

/** Non-negative money amount; numeric strings from forms are accepted */
export function amountSchema(field: string) {
    return z.preprocess(
        toNumberInput,
        z.number({ required_error: `${field} is required`, invalid_type_error: `${field} must be a number` })
            .finite(`${field} must be a number`)
            .nonnegative(`${field} must not be negative`)
    );
}

/** Optional reference to a customer row */
export const customerRefSchema = z.preprocess(
    (value) => toNumberInput(emptyToNull(value)),
    z.number({ invalid_type_error: 'Customer must be a numeric id' })
        .int('Customer must be a numeric id')
        .positive('Customer must be a numeric id')
        .nullable()
);

export const idParamSchema = z.object({
    id: z.coerce.number().int().positive('Invalid id'),
});

export type IdParam = z.infer<typeof idParamSchema>;

// ============================================
// QUERY SCHEMAS
// ============================================

/** `start_date` / `end_date` query parameters, both inclusive and optional */
export const dateRangeQuerySchema = z.object({
    start_date: optionalDateSchema,
    end_date: optionalDateSchema,
});

export type DateRangeQuery = z.infer<typeof dateRangeQuerySchema>;

export const searchQuerySchema = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().max(200).optional()
);
