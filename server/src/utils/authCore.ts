/**
 * Authentication Core
 *
 * Token signing and verification plus the token-version check used by
 * the auth middleware. A password change bumps the operator's
 * tokenVersion, so every token issued before it stops validating.
 */

import jwt, { type SignOptions } from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { Operator } from '@storekeep/shared';
import type { ExpiryString } from '../config/env.js';
import type { KyselyDB } from '../db/index.js';
import type { OperatorRow } from '../db/types.js';
import { findOperatorByIdKysely } from '../db/queries/index.js';

// ============================================
// SCHEMAS & TYPES
// ============================================

/**
 * JWT payload schema - validates token structure
 */
export const JwtPayloadSchema = z.object({
    id: z.number().int().positive(),
    username: z.string(),
    tokenVersion: z.number().int(),
    iat: z.number().optional(),
    exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

/**
 * Authenticated operator context - attached to requests
 */
export interface AuthenticatedUser {
    id: number;
    username: string;
    tokenVersion: number;
}

export type AuthResult =
    | { success: true; user: AuthenticatedUser }
    | { success: false; error: string; code: 'NO_TOKEN' | 'INVALID_TOKEN' | 'SESSION_INVALIDATED' };

export const AUTH_COOKIE_NAME = 'auth_token';

const BCRYPT_ROUNDS = 10;

// ============================================
// PASSWORDS
// ============================================

export async function hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
}

// ============================================
// TOKENS
// ============================================

export function signToken(
    operator: Pick<OperatorRow, 'id' | 'username' | 'tokenVersion'>,
    secret: string,
    expiresIn: ExpiryString
): string {
    const payload: JwtPayload = {
        id: operator.id,
        username: operator.username,
        tokenVersion: operator.tokenVersion,
    };
    const options: SignOptions = { expiresIn };
    return jwt.sign(payload, secret, options);
}

/**
 * Verify and decode a JWT token
 *
 * @returns Decoded payload or null if the signature, expiry or shape is wrong
 */
export function verifyToken(token: string, secret: string): JwtPayload | null {
    try {
        const decoded = jwt.verify(token, secret);
        const parsed = JwtPayloadSchema.safeParse(decoded);
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Token version must equal the operator's stored version
 */
export async function validateTokenVersion(
    db: KyselyDB,
    operatorId: number,
    tokenVersion: number
): Promise<boolean> {
    const operator = await findOperatorByIdKysely(db, operatorId);
    if (!operator) return false;
    return operator.tokenVersion === tokenVersion;
}

/**
 * Full authentication validation: signature, payload shape, token version
 */
export async function validateAuth(
    token: string | undefined,
    db: KyselyDB,
    secret: string
): Promise<AuthResult> {
    if (!token) {
        return { success: false, error: 'Access token required', code: 'NO_TOKEN' };
    }

    const payload = verifyToken(token, secret);
    if (!payload) {
        return { success: false, error: 'Invalid or expired token', code: 'INVALID_TOKEN' };
    }

    const isValid = await validateTokenVersion(db, payload.id, payload.tokenVersion);
    if (!isValid) {
        return {
            success: false,
            error: 'Session invalidated. Please login again.',
            code: 'SESSION_INVALIDATED',
        };
    }

    return {
        success: true,
        user: { id: payload.id, username: payload.username, tokenVersion: payload.tokenVersion },
    };
}

/** Public operator shape (no hash, no token version) */
export function toOperator(row: OperatorRow): Operator {
    return { id: row.id, username: row.username, createdAt: row.createdAt };
}
