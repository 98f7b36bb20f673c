/**
 * Sofa, Hardware and Poshish Routes
 *
 * The three flat stocked kinds share one route shape:
 *   GET /<path>  POST /<path>  GET|PUT|DELETE /<path>/:id
 * Quantity changes go through /stock, never through PUT.
 */

import { Router } from 'express';
import type { z } from 'zod';
import {
    CreateHardwareMaterialSchema,
    CreatePoshishMaterialSchema,
    CreateSofaItemSchema,
    NameSearchQuerySchema,
    UpdateHardwareMaterialSchema,
    UpdatePoshishMaterialSchema,
    UpdateSofaItemSchema,
    idParamSchema,
    type StockFields,
} from '@workshop-ledger/shared';
import type { StockedItemChanges } from '../../db/store.js';
import { typedQueryRoute, typedRoute, typedRouteWithParams } from '../../middleware/asyncHandler.js';
import {
    hardwareMaterials,
    newHardwareMaterial,
    newPoshishMaterial,
    newSofaItem,
    poshishMaterials,
    sofaItems,
    type StockedItemService,
} from '../../services/inventory/index.js';

const router: Router = Router();

type StockedRow = StockFields & { id: number };

interface StockedItemRouteConfig<TRow extends StockedRow, TNew, TCreate extends z.ZodTypeAny, TUpdate extends z.ZodTypeAny> {
    path: string;
    service: StockedItemService<TRow, TNew>;
    createSchema: TCreate;
    toRow: (input: z.output<TCreate>) => TNew;
    updateSchema: TUpdate;
    toChanges: (input: z.output<TUpdate>) => StockedItemChanges<TNew>;
}

function mountStockedItemRoutes<TRow extends StockedRow, TNew, TCreate extends z.ZodTypeAny, TUpdate extends z.ZodTypeAny>(
    config: StockedItemRouteConfig<TRow, TNew, TCreate, TUpdate>
): void {
    const { path, service } = config;

    router.get(
        path,
        ...typedQueryRoute(NameSearchQuerySchema, async (query, req, res) => {
            res.json({ items: await service.list(req.store, query.q, query.limit) });
        })
    );

    router.post(
        path,
        ...typedRoute(config.createSchema, async (body, req, res) => {
            res.status(201).json(await service.create(req.store, config.toRow(body)));
        })
    );

    router.get(
        `${path}/:id`,
        ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
            res.json(await service.get(req.store, params.id));
        })
    );

    router.put(
        `${path}/:id`,
        ...typedRouteWithParams(idParamSchema, config.updateSchema, async ({ params, body }, req, res) => {
            res.json(await service.update(req.store, params.id, config.toChanges(body)));
        })
    );

    router.delete(
        `${path}/:id`,
        ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
            await service.deactivate(req.store, params.id);
            res.json({ success: true });
        })
    );
}

mountStockedItemRoutes({
    path: '/sofas',
    service: sofaItems,
    createSchema: CreateSofaItemSchema,
    toRow: newSofaItem,
    updateSchema: UpdateSofaItemSchema,
    toChanges: (input) => input,
});

mountStockedItemRoutes({
    path: '/hardware',
    service: hardwareMaterials,
    createSchema: CreateHardwareMaterialSchema,
    toRow: newHardwareMaterial,
    updateSchema: UpdateHardwareMaterialSchema,
    toChanges: (input) => input,
});

mountStockedItemRoutes({
    path: '/poshish',
    service: poshishMaterials,
    createSchema: CreatePoshishMaterialSchema,
    toRow: newPoshishMaterial,
    updateSchema: UpdatePoshishMaterialSchema,
    toChanges: (input) => input,
});

export default router;
