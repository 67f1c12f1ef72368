/**
 * Last middleware in the app: maps thrown errors to `{ error, type, ... }`
 * bodies and logs each one with the request it came from.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    UnauthorizedError,
    ConflictError,
    DatabaseError,
} from '../utils/errors.js';
import { toValidationIssues } from '../utils/validation.js';
import logger from '../utils/logger.js';
import { env } from '../config/env.js';

/**
 * Extended error type to handle various error shapes
 * (better-sqlite3 sets `code`, body-parser sets `status`)
 */
interface ExtendedError extends Error {
    statusCode?: number;
    status?: number;
    code?: string;
}

/**
 * Error log structure for consistent logging
 */
interface ErrorLog {
    method: string;
    path: string;
    error: string;
    type: string;
    operatorId?: number;
    code?: string;
    stack?: string;
}

const isDev = env.NODE_ENV === 'development';

function isSqliteConstraintError(err: ExtendedError): boolean {
    return typeof err.code === 'string' && err.code.startsWith('SQLITE_CONSTRAINT');
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: ExtendedError,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const errorLog: ErrorLog = {
        method: req.method,
        path: req.path,
        error: err.message,
        type: err.name,
        operatorId: req.user?.id,
        code: err.code,
    };

    // Include stack trace in development
    if (isDev) {
        errorLog.stack = err.stack;
    }

    const status = err.statusCode ?? err.status ?? 500;
    if (status >= 500 && !isSqliteConstraintError(err)) {
        logger.error(errorLog, 'Request failed');
    } else {
        logger.warn(errorLog, 'Request rejected');
    }

    // Handle custom error types
    if (err instanceof ValidationError) {
        res.status(400).json({
            error: err.message,
            type: 'ValidationError',
            details: err.details,
        });
        return;
    }

    if (err instanceof NotFoundError) {
        res.status(404).json({
            error: err.message,
            type: 'NotFoundError',
            resourceType: err.resourceType,
            resourceId: err.resourceId,
        });
        return;
    }

    if (err instanceof UnauthorizedError) {
        res.status(401).json({
            error: err.message,
            type: 'UnauthorizedError',
        });
        return;
    }

    if (err instanceof ConflictError) {
        res.status(409).json({
            error: err.message,
            type: 'ConflictError',
            conflictType: err.conflictType,
        });
        return;
    }

    if (err instanceof DatabaseError) {
        res.status(500).json({
            error: 'Database operation failed',
            type: 'DatabaseError',
            // Don't expose internal DB errors in production
            ...(isDev && { details: err.message }),
        });
        return;
    }

    // UNIQUE, CHECK and FOREIGN KEY violations from SQLite
    if (isSqliteConstraintError(err)) {
        res.status(409).json({
            error: 'Constraint violation',
            type: 'ConflictError',
            conflictType: err.code,
        });
        return;
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: toValidationIssues(err),
        });
        return;
    }

    // Default error (body-parser sets 400 on malformed JSON)
    const response: {
        error: string;
        type: string;
        stack?: string;
    } = {
        error: status >= 500 ? 'Internal server error' : err.message,
        type: err.name || 'Error',
    };

    if (isDev) {
        response.stack = err.stack;
    }

    res.status(status).json(response);
};

export default errorHandler;
