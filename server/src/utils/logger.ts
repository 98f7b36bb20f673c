/**
 * Centralized logger using Pino
 * Structured logging with one child logger per module
 */
import pino from 'pino';
import type { Logger, DestinationStream } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function defaultLevel(): string {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

// Pretty output in development only; JSON lines everywhere else
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
const logger: Logger = pino({
    level: process.env.LOG_LEVEL || defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
}, destination);

// Create child loggers for different modules
export const ledgerLogger: Logger = logger.child({ module: 'ledger' });
export const employeeLogger: Logger = logger.child({ module: 'employees' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const catalogLogger: Logger = logger.child({ module: 'catalog' });
export const reportLogger: Logger = logger.child({ module: 'reports' });
export const authLogger: Logger = logger.child({ module: 'auth' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware: tags each request with an id and logs on finish
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();
    const incoming = req.get('x-request-id');
    req.id = incoming && incoming.length <= 128 ? incoming : randomUUID();
    res.setHeader('x-request-id', req.id);

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            requestId: req.id,
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
