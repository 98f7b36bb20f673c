/**
 * Error types thrown by services and repositories. `errorHandler` turns
 * each one into a JSON response with the matching status code.
 */

/** Anything carrying its own HTTP status */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Input rejected before any write. `details` maps field names to messages.
 *
 * @example
 * throw new ValidationError('Invalid transaction', { billNo: 'Bill Number is required for Client payments.' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/** Lookup by id came back empty */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/** Missing or wrong credentials */
export class UnauthorizedError extends Error implements CustomError {
    readonly name = 'UnauthorizedError' as const;
    readonly statusCode = 401 as const;

    constructor(message: string = 'Unauthorized') {
        super(message);
        Object.setPrototypeOf(this, UnauthorizedError.prototype);
    }
}

/** Token present but not accepted */
export class ForbiddenError extends Error implements CustomError {
    readonly name = 'ForbiddenError' as const;
    readonly statusCode = 403 as const;

    constructor(message: string = 'Forbidden') {
        super(message);
        Object.setPrototypeOf(this, ForbiddenError.prototype);
    }
}

/**
 * A write collided with a unique key. Raised by `findOrInsert` when the
 * conflicting row cannot be read back, and built by the error handler
 * from Postgres unique violations.
 */
export class ConflictError extends Error implements CustomError {
    readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;
    readonly conflictType: string | null;

    constructor(message: string = 'Conflict', conflictType: string | null = null) {
        super(message);
        this.conflictType = conflictType;
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

/**
 * Well-formed request that breaks a ledger rule; `rule` names it.
 *
 * @example
 * throw new BusinessLogicError('Assignment is locked', 'assignment_locked');
 */
export class BusinessLogicError extends Error implements CustomError {
    readonly name = 'BusinessLogicError' as const;
    readonly statusCode = 422 as const;
    readonly rule: string | null;

    constructor(message: string, rule: string | null = null) {
        super(message);
        this.rule = rule;
        Object.setPrototypeOf(this, BusinessLogicError.prototype);
    }
}

/** Failure outside the process while producing a response */
export class ExternalServiceError extends Error implements CustomError {
    readonly name = 'ExternalServiceError' as const;
    readonly statusCode = 502 as const;
    readonly serviceName: string | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        serviceName: string | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ExternalServiceError.prototype);
    }
}

/** Query or migration failure; the message is only shown in development */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

export function isCustomError(error: unknown): error is CustomError {
    return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/** Postgres error codes we react to */
export const PG_ERROR_CODES = {
    uniqueViolation: '23505',
    foreignKeyViolation: '23503',
} as const;

/** pg DatabaseError (or anything shaped like it) carrying a SQLSTATE code */
export function hasPgCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

export function isUniqueViolation(error: unknown): boolean {
    return hasPgCode(error, PG_ERROR_CODES.uniqueViolation);
}
