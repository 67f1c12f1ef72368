/**
 * @module validation
 * Zod parsing for route inputs.
 *
 * Schemas live in @storekeep/shared. These helpers run one against a
 * request part and throw ValidationError (400) with per-field details, so
 * handlers only ever see parsed, typed data.
 */

import type { z } from 'zod';
import { ValidationError } from './errors.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
}

/**
 * Parse `input` or throw ValidationError whose message is the first issue
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const details = toValidationIssues(result.error);
        throw new ValidationError(details[0]?.message ?? 'Validation failed', details);
    }
    return result.data;
}
