/**
 * Furniture Routes
 *
 * Items carry the category and status; stock lives on the per-bed-size
 * variants. Saving a variant recomputes the item status, and a failed
 * recompute comes back as `rollup.warning` next to the saved variant.
 */

import { Router } from 'express';
import {
    CreateFurnitureItemSchema,
    FurnitureListQuerySchema,
    FurnitureVariantSchema,
    SaveFurnitureSchema,
    UpdateFurnitureItemSchema,
    idParamSchema,
} from '@workshop-ledger/shared';
import { typedQueryRoute, typedRoute, typedRouteWithParams } from '../../middleware/asyncHandler.js';
import {
    createFurnitureItem,
    deactivateFurnitureItem,
    getFurnitureItem,
    listFurnitureCards,
    listFurnitureVariants,
    saveFurniture,
    updateFurnitureItem,
    upsertFurnitureVariant,
} from '../../services/inventory/index.js';

const router: Router = Router();

router.get(
    '/furniture',
    ...typedQueryRoute(FurnitureListQuerySchema, async (query, req, res) => {
        res.json({ items: await listFurnitureCards(req.store, query) });
    })
);

router.post(
    '/furniture',
    ...typedRoute(CreateFurnitureItemSchema, async (body, req, res) => {
        res.status(201).json(await createFurnitureItem(req.store, body));
    })
);

// Item + variant in one call, as the entry form submits it
router.post(
    '/furniture/save',
    ...typedRoute(SaveFurnitureSchema, async (body, req, res) => {
        const result = await saveFurniture(req.store, body);
        res.status(result.itemCreated ? 201 : 200).json(result);
    })
);

router.get(
    '/furniture/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json(await getFurnitureItem(req.store, params.id));
    })
);

router.put(
    '/furniture/:id',
    ...typedRouteWithParams(idParamSchema, UpdateFurnitureItemSchema, async ({ params, body }, req, res) => {
        res.json(await updateFurnitureItem(req.store, params.id, body));
    })
);

router.delete(
    '/furniture/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        await deactivateFurnitureItem(req.store, params.id);
        res.json({ success: true });
    })
);

router.get(
    '/furniture/:id/variants',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json({ variants: await listFurnitureVariants(req.store, params.id) });
    })
);

router.put(
    '/furniture/:id/variants',
    ...typedRouteWithParams(idParamSchema, FurnitureVariantSchema, async ({ params, body }, req, res) => {
        const result = await upsertFurnitureVariant(req.store, params.id, body);
        res.status(result.created ? 201 : 200).json(result);
    })
);

export default router;
