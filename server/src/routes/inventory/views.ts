/**
 * Inventory Read Routes
 *
 * Dashboard counters, low-stock lists, the category tree and the
 * reference data the entry forms load (bed sizes, thicknesses, brands).
 */

import { Router } from 'express';
import { z } from 'zod';
import { CATEGORY_TYPES, NameSearchQuerySchema } from '@workshop-ledger/shared';
import { asyncHandler, typedQueryRoute } from '../../middleware/asyncHandler.js';
import { categoryTree, inventoryDashboard, lowStockReport, referenceData } from '../../services/inventory/index.js';

const router: Router = Router();

const CategoryQuerySchema = z.object({
    type: z.enum(CATEGORY_TYPES).catch('FURNITURE'),
});

router.get(
    '/dashboard',
    asyncHandler(async (req, res) => {
        res.json(await inventoryDashboard(req.store));
    })
);

router.get(
    '/low-stock',
    ...typedQueryRoute(NameSearchQuerySchema.pick({ limit: true }), async (query, req, res) => {
        res.json(await lowStockReport(req.store, query.limit));
    })
);

router.get(
    '/categories',
    ...typedQueryRoute(CategoryQuerySchema, async (query, req, res) => {
        res.json({ type: query.type, tree: await categoryTree(req.store, query.type) });
    })
);

router.get(
    '/reference',
    asyncHandler(async (req, res) => {
        res.json(await referenceData(req.store));
    })
);

export default router;
