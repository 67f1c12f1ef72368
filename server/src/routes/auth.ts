/**
 * @module routes/auth
 * @description Operator account and session cookie
 *
 * One operator per installation: /register works only until the first
 * account exists. Sessions are JWTs in an HttpOnly cookie (or a Bearer
 * header); changing the password bumps tokenVersion, ending every session.
 */

import { Router } from 'express';
import type { CookieOptions, Request, Response } from 'express';
import {
    changePasswordBodySchema,
    loginBodySchema,
    registerBodySchema,
    todayDateString,
    validatePassword,
} from '@storekeep/shared';
import { env, expiryToMs } from '../config/env.js';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    countOperatorsKysely,
    createFirstOperatorKysely,
    findOperatorByIdKysely,
    findOperatorByUsernameKysely,
    updateOperatorPasswordKysely,
} from '../db/queries/index.js';
import {
    AUTH_COOKIE_NAME,
    hashPassword,
    signToken,
    toOperator,
    verifyPassword,
} from '../utils/authCore.js';
import { ConflictError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { authLogger } from '../utils/logger.js';

const router: Router = Router();

const INVALID_CREDENTIALS = 'Invalid username or password';
const OPERATOR_EXISTS = 'An operator account already exists';

const cookieOptions: CookieOptions = {
    httpOnly: true,
    secure: env.NODE_ENV === 'production',
    sameSite: 'lax',
    path: '/',
};

function assertStrongPassword(password: string, field: string): void {
    const result = validatePassword(password);
    if (!result.isValid) {
        throw new ValidationError(
            result.errors[0] ?? 'Password is too weak',
            result.errors.map((message) => ({ path: field, message }))
        );
    }
}

/** Operator id from the verified token; authenticateToken runs first */
function currentOperatorId(req: Request): number {
    if (!req.user) {
        throw new UnauthorizedError('Access token required');
    }
    return req.user.id;
}

// ============================================
// ROUTES
// ============================================

// Create the operator account (only while none exists)
router.post(
    '/register',
    asyncHandler(async (req: Request, res: Response) => {
        const { username, password } = parseInput(registerBodySchema, req.body);
        assertStrongPassword(password, 'password');

        if (await countOperatorsKysely(req.db) > 0) {
            throw new ConflictError(OPERATOR_EXISTS, 'operator_exists');
        }

        const passwordHash = await hashPassword(password);

        // Another registration may have landed while hashing
        const operator = await createFirstOperatorKysely(req.db, {
            username,
            passwordHash,
            createdAt: todayDateString(),
        });
        if (!operator) {
            throw new ConflictError(OPERATOR_EXISTS, 'operator_exists');
        }

        authLogger.info({ operatorId: operator.id, username }, 'Operator registered');
        res.status(201).json({ operator: toOperator(operator) });
    })
);

router.post(
    '/login',
    asyncHandler(async (req: Request, res: Response) => {
        const { username, password } = parseInput(loginBodySchema, req.body);

        const operator = await findOperatorByUsernameKysely(req.db, username);
        if (!operator || !(await verifyPassword(password, operator.passwordHash))) {
            authLogger.warn({ username }, 'Failed login');
            throw new UnauthorizedError(INVALID_CREDENTIALS);
        }

        const token = signToken(operator, env.JWT_SECRET, env.JWT_EXPIRY);

        res.cookie(AUTH_COOKIE_NAME, token, {
            ...cookieOptions,
            maxAge: expiryToMs(env.JWT_EXPIRY),
        });

        authLogger.info({ operatorId: operator.id }, 'Operator logged in');
        res.json({ operator: toOperator(operator), token });
    })
);

// Logout - clear auth cookie
router.post(
    '/logout',
    asyncHandler(async (_req: Request, res: Response) => {
        res.clearCookie(AUTH_COOKIE_NAME, cookieOptions);
        res.json({ success: true });
    })
);

router.get(
    '/me',
    authenticateToken,
    asyncHandler(async (req: Request, res: Response) => {
        const operator = await findOperatorByIdKysely(req.db, currentOperatorId(req));
        if (!operator) {
            throw new UnauthorizedError('Operator no longer exists');
        }
        res.json({ operator: toOperator(operator) });
    })
);

router.post(
    '/change-password',
    authenticateToken,
    asyncHandler(async (req: Request, res: Response) => {
        const { currentPassword, newPassword } = parseInput(changePasswordBodySchema, req.body);
        assertStrongPassword(newPassword, 'newPassword');

        const operatorId = currentOperatorId(req);
        const operator = await findOperatorByIdKysely(req.db, operatorId);
        if (!operator) {
            throw new UnauthorizedError('Operator no longer exists');
        }

        if (!(await verifyPassword(currentPassword, operator.passwordHash))) {
            throw new UnauthorizedError('Current password is incorrect');
        }

        // tokenVersion is bumped in the same statement, so this session ends too
        await updateOperatorPasswordKysely(req.db, operatorId, await hashPassword(newPassword));
        res.clearCookie(AUTH_COOKIE_NAME, cookieOptions);

        authLogger.info({ operatorId }, 'Password changed');
        res.json({ message: 'Password changed successfully' });
    })
);

export default router;
