/**
 * Stock Adjustment Routes
 *
 * POST /stock/adjust  - signed delta with a free-form label
 * POST /stock/form    - direction + positive quantity ("Stock In" / "Stock Out")
 * GET  /stock/movements
 *
 * The adjustment is committed before the furniture rollup runs; a failed
 * rollup is reported as `rollup.warning` on a 200 response.
 */

import { Router } from 'express';
import { AdjustStockSchema, StockFormSchema, StockMovementQuerySchema } from '@workshop-ledger/shared';
import { typedQueryRoute, typedRoute } from '../../middleware/asyncHandler.js';
import { adjustStock, adjustStockFromForm, movementHistory } from '../../services/inventory/index.js';

const router: Router = Router();

router.post(
    '/stock/adjust',
    ...typedRoute(AdjustStockSchema, async (body, req, res) => {
        res.json(await adjustStock(req.store, body));
    })
);

router.post(
    '/stock/form',
    ...typedRoute(StockFormSchema, async (body, req, res) => {
        res.json(await adjustStockFromForm(req.store, body));
    })
);

router.get(
    '/stock/movements',
    ...typedQueryRoute(StockMovementQuerySchema, async (query, req, res) => {
        res.json({ movements: await movementHistory(req.store, query.limit) });
    })
);

export default router;
