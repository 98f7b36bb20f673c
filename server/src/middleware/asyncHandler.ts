/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler: wraps async route handlers to catch errors automatically
 * typedRoute : combines Zod validation + asyncHandler for type-safe routes
 *
 * Validation failures throw ZodError, which errorHandler turns into a 400.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void>;

/** Handler that receives its already-validated input first */
export type TypedHandler<TInput> = (
    input: TInput,
    req: Request,
    res: Response,
) => Promise<void>;

// ============================================
// asyncHandler: for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute: Zod body validation + asyncHandler
// ============================================

/**
 * Validates `req.body` and hands the parsed value to the handler.
 * Returns a RequestHandler[] to spread into router methods.
 *
 * @example
 * router.post('/', ...typedRoute(CreateTransactionSchema, async (body, req, res) => {
 *     res.status(201).json(await createTransaction(req.store, body));
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.output<T>>,
): RequestHandler[] {
    return [
        asyncHandler(async (req, res) => {
            const body: z.output<T> = schema.parse(req.body);
            await handler(body, req, res);
        }),
    ];
}

/**
 * Like typedRoute but also validates params. Pass `null` for routes without a body.
 *
 * @example
 * router.delete('/:id', ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
 *     await softDeleteTransaction(req.store, params.id);
 * }));
 */
export function typedRouteWithParams<
    TParams extends z.ZodTypeAny,
    TBody extends z.ZodTypeAny = z.ZodUndefined,
>(
    paramsSchema: TParams,
    bodySchema: TBody | null,
    handler: TypedHandler<{ params: z.output<TParams>; body: z.output<TBody> }>,
): RequestHandler[] {
    return [
        asyncHandler(async (req, res) => {
            const params: z.output<TParams> = paramsSchema.parse(req.params);
            const body: z.output<TBody> = bodySchema ? bodySchema.parse(req.body) : undefined;
            await handler({ params, body }, req, res);
        }),
    ];
}

/**
 * Validates `req.query` (strings from the URL) and hands the parsed value over.
 */
export function typedQueryRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.output<T>>,
): RequestHandler[] {
    return [
        asyncHandler(async (req, res) => {
            const query: z.output<T> = schema.parse(req.query);
            await handler(query, req, res);
        }),
    ];
}

export default asyncHandler;
