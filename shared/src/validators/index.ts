/**
 * Validation utilities for Storekeep
 *
 * Key patterns:
 * - Password validation: validatePassword (8+ chars, at least one letter and one digit)
 * - Search input: buildLikePattern escapes LIKE wildcards so "50%" matches literally
 */

// ============================================
// TYPES
// ============================================

export interface PasswordValidationResult {
    isValid: boolean;
    errors: string[];
}

// ============================================
// PASSWORD VALIDATION
// ============================================

export const PASSWORD_MIN_LENGTH = 8;

/**
 * Validate password strength
 *
 * @example
 * const result = validatePassword('counter42');
 * if (!result.isValid) {
 *   throw new ValidationError(result.errors[0], result.errors);
 * }
 */
export function validatePassword(password: string): PasswordValidationResult {
    const errors: string[] = [];

    if (!password || password.length < PASSWORD_MIN_LENGTH) {
        errors.push(`Password must be at least ${PASSWORD_MIN_LENGTH} characters long`);
    }

    if (!/[A-Za-z]/.test(password)) {
        errors.push('Password must contain at least one letter');
    }

    if (!/[0-9]/.test(password)) {
        errors.push('Password must contain at least one number');
    }

    return {
        isValid: errors.length === 0,
        errors,
    };
}

// ============================================
// INPUT SANITIZATION
// ============================================

/** Escape character paired with `ESCAPE '\'` in LIKE clauses */
export const LIKE_ESCAPE_CHAR = '\\';

/**
 * Build a lower-cased, contains-style LIKE pattern from user input.
 * `%`, `_` and the escape character itself are escaped.
 *
 * @example
 * buildLikePattern('Sale 50%') // "%sale 50\\%%"
 */
export function buildLikePattern(input: string): string {
    const escaped = input
        .trim()
        .toLowerCase()
        .replace(/[\\%_]/g, (ch) => `${LIKE_ESCAPE_CHAR}${ch}`);
    return `%${escaped}%`;
}
