/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    UnauthorizedError,
    ForbiddenError,
    ConflictError,
    BusinessLogicError,
    ExternalServiceError,
    DatabaseError,
    isCustomError,
    isUniqueViolation,
    hasPgCode,
    PG_ERROR_CODES,
} from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

const isDev = (): boolean => process.env.NODE_ENV === 'development';

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const error = normalizeError(err);
    const status = statusOf(error);

    const errorLog = {
        requestId: req.id,
        method: req.method,
        path: req.path,
        error: error.message,
        type: error.name,
        ...(isDev() && { stack: error.stack }),
    };
    if (status >= 500) {
        httpLogger.error(errorLog, 'Request failed');
    } else {
        httpLogger.warn(errorLog, 'Request rejected');
    }

    // Handle custom error types
    if (error instanceof ValidationError) {
        res.status(400).json({
            error: error.message,
            type: 'ValidationError',
            details: error.details
        });
        return;
    }

    if (error instanceof NotFoundError) {
        res.status(404).json({
            error: error.message,
            type: 'NotFoundError',
            resourceType: error.resourceType,
            resourceId: error.resourceId
        });
        return;
    }

    if (error instanceof UnauthorizedError) {
        res.status(401).json({
            error: error.message,
            type: 'UnauthorizedError'
        });
        return;
    }

    if (error instanceof ForbiddenError) {
        res.status(403).json({
            error: error.message,
            type: 'ForbiddenError'
        });
        return;
    }

    if (error instanceof ConflictError) {
        res.status(409).json({
            error: error.message,
            type: 'ConflictError',
            conflictType: error.conflictType
        });
        return;
    }

    if (error instanceof BusinessLogicError) {
        res.status(422).json({
            error: error.message,
            type: 'BusinessLogicError',
            rule: error.rule
        });
        return;
    }

    if (error instanceof ExternalServiceError) {
        res.status(502).json({
            error: error.message,
            type: 'ExternalServiceError',
            service: error.serviceName
        });
        return;
    }

    if (error instanceof DatabaseError) {
        res.status(500).json({
            error: 'Database operation failed',
            type: 'DatabaseError',
            // Don't expose internal DB errors in production
            ...(isDev() && { details: error.message })
        });
        return;
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        });
        return;
    }

    // Postgres constraint errors
    if (hasPgCode(error, PG_ERROR_CODES.foreignKeyViolation)) {
        res.status(400).json({
            error: 'Referenced record does not exist',
            type: 'ValidationError'
        });
        return;
    }

    // express.json() parse failures carry a 4xx status
    if (status < 500) {
        res.status(status).json({ error: error.message, type: error.name });
        return;
    }

    res.status(500).json({
        error: isDev() ? error.message : 'Internal server error',
        type: 'Error',
        ...(isDev() && { stack: error.stack })
    });
};

/** Non-Error throws get wrapped; unique violations become ConflictError */
function normalizeError(err: unknown): Error {
    if (isUniqueViolation(err)) return new ConflictError('Unique constraint violation', 'unique');
    return err instanceof Error ? err : new Error(String(err));
}

function statusOf(error: Error): number {
    if (isCustomError(error)) return error.statusCode;
    if (error instanceof ZodError) return 400;
    if (hasPgCode(error, PG_ERROR_CODES.foreignKeyViolation)) return 400;
    if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 600) {
        return error.status;
    }
    return 500;
}

export default errorHandler;
