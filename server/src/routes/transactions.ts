/**
 * Transaction Routes
 *
 * GET    /              - list with totals (filters in the query string)
 * GET    /totals        - totals only
 * GET    /names         - distinct names for autocomplete
 * GET    /:id           - one row (soft-deleted rows included)
 * POST   /              - create
 * PUT    /:id           - update (type is kept)
 * DELETE /:id           - soft delete
 */

import { Router } from 'express';
import {
    CreateTransactionSchema,
    TransactionQuerySchema,
    UpdateTransactionSchema,
    idParamSchema,
} from '@workshop-ledger/shared';
import { asyncHandler, typedQueryRoute, typedRoute, typedRouteWithParams } from '../middleware/asyncHandler.js';
import {
    createTransaction,
    distinctTransactionNames,
    getTransaction,
    listTransactions,
    softDeleteTransaction,
    transactionTotals,
    updateTransaction,
} from '../services/transactionLedger.js';

const router: Router = Router();

router.get(
    '/',
    ...typedQueryRoute(TransactionQuerySchema, async (query, req, res) => {
        res.json(await listTransactions(req.store, query, query.limit));
    })
);

router.get(
    '/totals',
    ...typedQueryRoute(TransactionQuerySchema, async (query, req, res) => {
        res.json(await transactionTotals(req.store, query));
    })
);

router.get(
    '/names',
    asyncHandler(async (req, res) => {
        res.json({ names: await distinctTransactionNames(req.store) });
    })
);

router.get(
    '/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json(await getTransaction(req.store, params.id));
    })
);

router.post(
    '/',
    ...typedRoute(CreateTransactionSchema, async (body, req, res) => {
        res.status(201).json(await createTransaction(req.store, body));
    })
);

router.put(
    '/:id',
    ...typedRouteWithParams(idParamSchema, UpdateTransactionSchema, async ({ params, body }, req, res) => {
        res.json(await updateTransaction(req.store, params.id, body));
    })
);

router.delete(
    '/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        await softDeleteTransaction(req.store, params.id);
        res.json({ success: true });
    })
);

export default router;
