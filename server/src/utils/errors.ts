/**
 * Error classes thrown by routes and queries. The central error handler
 * turns each into a JSON body with the class's HTTP status.
 */

/** Base for every error that answers with its own status */
export abstract class HttpError extends Error {
    abstract readonly statusCode: number;

    constructor(message: string) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Bad request input. `details` holds the per-field issues from parseInput.
 *
 * @example
 * throw new ValidationError('Invalid date, expected YYYY-MM-DD', [{ path: 'start_date', message: '...' }]);
 */
export class ValidationError extends HttpError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;

    constructor(message: string, readonly details: unknown = null) {
        super(message);
    }
}

/**
 * A record id with no row behind it, or an unknown route.
 *
 * @example
 * throw new NotFoundError('Order not found', 'Order', 42);
 */
export class NotFoundError extends HttpError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;

    constructor(
        message = 'Record not found',
        readonly resourceType: string | null = null,
        readonly resourceId: string | number | null = null
    ) {
        super(message);
    }
}

/** No session, a stale session, or wrong login credentials */
export class UnauthorizedError extends HttpError {
    readonly name = 'UnauthorizedError' as const;
    readonly statusCode = 401 as const;

    constructor(message = 'Login required') {
        super(message);
    }
}

/**
 * The write clashes with stored state: a second operator account or a
 * unique column. `conflictType` is a machine-readable tag for clients.
 */
export class ConflictError extends HttpError {
    readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;

    constructor(message = 'Conflict', readonly conflictType: string | null = null) {
        super(message);
    }
}

/** The SQLite file could not be opened or used; wraps the driver error */
export class DatabaseError extends HttpError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;

    constructor(message: string, readonly originalError: Error | null = null) {
        super(message);
    }
}
