import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { AUTH_COOKIE_NAME, validateAuth } from '../utils/authCore.js';
import { authLogger } from '../utils/logger.js';

/**
 * Token from `Authorization: Bearer <token>` or the auth_token cookie
 */
export function extractToken(req: Request): string | undefined {
    const authHeader = req.headers['authorization'];
    if (authHeader?.startsWith('Bearer ')) {
        const bearer = authHeader.slice('Bearer '.length).trim();
        if (bearer) return bearer;
    }

    const cookies: Record<string, unknown> = req.cookies ?? {};
    const cookieToken = cookies[AUTH_COOKIE_NAME];
    return typeof cookieToken === 'string' && cookieToken ? cookieToken : undefined;
}

/**
 * Middleware to authenticate JWT token
 * Supports both Authorization header and HttpOnly cookie
 * Attaches the operator to req.user
 */
export const authenticateToken = async (
    req: Request,
    res: Response,
    next: NextFunction
): Promise<void> => {
    try {
        const result = await validateAuth(extractToken(req), req.db, env.JWT_SECRET);

        if (!result.success) {
            authLogger.debug({ path: req.path, code: result.code }, 'Rejected request');
            res.status(401).json({ error: result.error, type: 'UnauthorizedError', code: result.code });
            return;
        }

        req.user = result.user;
        next();
    } catch (error) {
        next(error);
    }
};
