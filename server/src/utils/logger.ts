/**
 * Centralized logger using Pino
 * Structured logging for every module; use a child logger per domain.
 */
import pino from 'pino';
import type { Logger, LoggerOptions, DestinationStream, LevelWithSilent } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';

const isDev = env.NODE_ENV === 'development';
const isTest = env.NODE_ENV === 'test';

/** Requests slower than this are logged at warn level */
const SLOW_REQUEST_MS = 1000;

function defaultLevel(): LevelWithSilent {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: env.LOG_LEVEL ?? defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Pretty output in development, JSON lines everywhere else
const destination: DestinationStream = isDev
    ? pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    })
    : pino.destination(1);

// Create the logger instance
const logger: Logger = pino(options, destination);

// Create child loggers for different modules
export const serverLogger: Logger = logger.child({ module: 'server' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const authLogger: Logger = logger.child({ module: 'auth' });
export const customerLogger: Logger = logger.child({ module: 'customers' });
export const orderLogger: Logger = logger.child({ module: 'orders' });
export const ledgerLogger: Logger = logger.child({ module: 'ledger' });
export const taskLogger: Logger = logger.child({ module: 'tasks' });
export const exportLogger: Logger = logger.child({ module: 'export' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            logger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            logger.warn(logData, 'Request warning');
        } else if (duration > SLOW_REQUEST_MS) {
            logger.warn(logData, 'Slow request');
        } else {
            logger.debug(logData, 'Request completed');
        }
    });

    next();
}
