/**
 * @fileoverview Inventory Routes
 *
 * Five stocked kinds share one quantity model: qty_on_hand on the row,
 * every change written to stock_movements in the same transaction.
 *
 * Router Structure:
 * - views.ts: dashboard, low stock, categories, reference data
 * - stock.ts: adjustments and movement history
 * - furniture.ts: items and per-bed-size variants
 * - foam.ts: models and size × thickness variants
 * - items.ts: sofas, hardware and poshish materials
 */

import { Router } from 'express';
import viewsRouter from './views.js';
import stockRouter from './stock.js';
import furnitureRouter from './furniture.js';
import foamRouter from './foam.js';
import itemsRouter from './items.js';

const router: Router = Router();

// Mount sub-routers
// Order matters: literal paths before parameterized ones
router.use('/', viewsRouter);
router.use('/', stockRouter);
router.use('/', furnitureRouter);
router.use('/', foamRouter);
router.use('/', itemsRouter);

export default router;
