/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import type { SignOptions } from 'jsonwebtoken';

// ============================================
// DURATIONS
// ============================================

/** Durations accepted by jsonwebtoken's `expiresIn` */
export type ExpiryString = Extract<NonNullable<SignOptions['expiresIn']>, string>;

const EXPIRY_PATTERN = /^(\d+)([smhdw])$/;

const UNIT_MS: Record<string, number> = {
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
    d: 24 * 60 * 60 * 1000,
    w: 7 * 24 * 60 * 60 * 1000,
};

/** "90s", "15m", "12h", "7d", "2w" */
export function isExpiryString(value: string): value is ExpiryString {
    return EXPIRY_PATTERN.test(value);
}

/** Milliseconds for an expiry string, used for the session cookie lifetime */
export function expiryToMs(value: string): number {
    const match = EXPIRY_PATTERN.exec(value);
    if (!match) {
        throw new Error(`Invalid duration: ${value}`);
    }
    const [, amount, unit] = match;
    return Number(amount) * (UNIT_MS[unit] ?? 0);
}

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** Secret key for signing session JWTs */
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Bind address */
    HOST: z.string().default('0.0.0.0'),

    /** Server port */
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),

    /** SQLite database file; its directory is created on startup. ":memory:" for a throwaway database */
    DATABASE_PATH: z.string().min(1).default('data/storekeep.db'),

    /** JWT token expiry duration (also the session cookie lifetime) */
    JWT_EXPIRY: z.string().default('7d').refine(isExpiryString, {
        message: 'JWT_EXPIRY must be a number followed by s, m, h, d or w (e.g. 7d)',
    }),

    /** Pino log level; defaults to debug in development, info otherwise */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    /** CORS allowed origin, for a front end served from another port */
    CORS_ORIGIN: z.string().optional(),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parsed and validated environment variables.
 *
 * Exits the process at startup if any required variables are missing
 * or if any variables fail validation.
 */
function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (result.success) {
        return result.data;
    }

    const issues = result.error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');

    console.error('Environment validation failed:\n' + issues);
    process.exit(1);
}

export const env = parseEnv();
