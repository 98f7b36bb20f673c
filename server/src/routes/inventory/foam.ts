/**
 * Foam Routes
 *
 * Brand → model → variant (bed size × thickness).
 */

import { Router } from 'express';
import {
    CreateFoamModelSchema,
    FoamListQuerySchema,
    FoamVariantSchema,
    SaveFoamSchema,
    idParamSchema,
} from '@workshop-ledger/shared';
import { typedQueryRoute, typedRoute, typedRouteWithParams } from '../../middleware/asyncHandler.js';
import {
    createFoamModel,
    deactivateFoamModel,
    listFoamCards,
    listFoamVariants,
    saveFoam,
    upsertFoamVariant,
} from '../../services/inventory/index.js';

const router: Router = Router();

router.get(
    '/foam',
    ...typedQueryRoute(FoamListQuerySchema, async (query, req, res) => {
        res.json({ variants: await listFoamCards(req.store, query) });
    })
);

router.post(
    '/foam/save',
    ...typedRoute(SaveFoamSchema, async (body, req, res) => {
        const result = await saveFoam(req.store, body);
        res.status(result.created ? 201 : 200).json(result);
    })
);

router.post(
    '/foam/models',
    ...typedRoute(CreateFoamModelSchema, async (body, req, res) => {
        const result = await createFoamModel(req.store, body);
        res.status(result.created ? 201 : 200).json(result);
    })
);

router.delete(
    '/foam/models/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        await deactivateFoamModel(req.store, params.id);
        res.json({ success: true });
    })
);

router.get(
    '/foam/models/:id/variants',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json({ variants: await listFoamVariants(req.store, params.id) });
    })
);

router.put(
    '/foam/variants',
    ...typedRoute(FoamVariantSchema, async (body, req, res) => {
        const result = await upsertFoamVariant(req.store, body);
        res.status(result.created ? 201 : 200).json(result);
    })
);

export default router;
