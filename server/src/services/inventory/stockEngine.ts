/**
 * Stock Engine
 *
 * The one place quantities change after a row is created.
 *
 * adjustStock:
 *   1. Validate kind and delta (nothing written on failure)
 *   2. In ONE transaction: qty_on_hand += delta, append a StockMovement
 *   3. After commit, furniture variants roll their quantity up into the
 *      item's cached status. That step is best effort: a failure comes back
 *      as a warning and the adjustment stays committed.
 *
 * Quantities may go negative.
 */

import {
    StockTargetSchema,
    hasParentRollup,
    rollupFurnitureStatus,
    toSignedDelta,
    type FurnitureStatus,
    type StockFormInput,
    type StockMovement,
    type StockTarget,
} from '@workshop-ledger/shared';
import type { Store } from '../../db/store.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { inventoryLogger } from '../../utils/logger.js';

// ============================================
// TYPES
// ============================================

export interface AdjustStockCommand {
    /** Raw kind; anything outside INVENTORY_KINDS is rejected */
    kind: string;
    itemId: number;
    delta: number;
    label: string;
    note?: string | null;
    unitCost?: number | null;
}

export interface RecomputeWarning {
    furnitureItemId: number | null;
    variantId: number;
    message: string;
}

/** Outcome of the best-effort furniture status rollup */
export type RollupResult =
    | { ok: true; status: FurnitureStatus | null }
    | { ok: false; warning: RecomputeWarning };

export interface AdjustStockResult {
    movement: StockMovement;
    quantityAfter: number;
    /** null for kinds without a parent row */
    rollup: RollupResult | null;
}

// ============================================
// TARGET PARSING
// ============================================

/** Raw `(inventory_type, variant_id)` → StockTarget */
export function parseStockTarget(kind: string, id: number): StockTarget {
    const parsed = StockTargetSchema.safeParse({ kind, id });
    if (!parsed.success) {
        throw new ValidationError('Invalid inventory target', { kind: `Unknown inventory kind: ${kind}` });
    }
    return parsed.data;
}

// ============================================
// STATUS ROLLUP
// ============================================

/**
 * Re-establish the cached status of a furniture item from its active
 * variants. Missing item → null. MADE_TO_ORDER is left alone.
 */
export async function recomputeFurnitureStatus(store: Store, furnitureItemId: number): Promise<FurnitureStatus | null> {
    const item = await store.furniture.findItem(furnitureItemId);
    if (!item) return null;
    if (item.status === 'MADE_TO_ORDER') return item.status;

    const quantities = await store.furniture.activeQuantities(furnitureItemId);
    const status = rollupFurnitureStatus(item.status, quantities);
    await store.furniture.setStatus(furnitureItemId, status);
    return status;
}

/**
 * Best-effort rollup after a furniture variant changed. Never throws.
 */
export async function rollupAfterVariantChange(
    store: Store,
    variantId: number,
    knownItemId: number | null = null
): Promise<RollupResult> {
    let furnitureItemId = knownItemId;
    try {
        if (furnitureItemId === null) {
            const variant = await store.furniture.findVariant(variantId);
            if (!variant) return { ok: true, status: null };
            furnitureItemId = variant.furnitureItemId;
        }
        const status = await recomputeFurnitureStatus(store, furnitureItemId);
        return { ok: true, status };
    } catch (error: unknown) {
        const warning: RecomputeWarning = {
            furnitureItemId,
            variantId,
            message: error instanceof Error ? error.message : String(error),
        };
        inventoryLogger.warn(warning, 'Furniture status recompute failed');
        return { ok: false, warning };
    }
}

// ============================================
// ADJUST
// ============================================

export async function adjustStock(store: Store, command: AdjustStockCommand): Promise<AdjustStockResult> {
    const target = parseStockTarget(command.kind, command.itemId);
    if (!Number.isInteger(command.delta) || command.delta === 0) {
        throw new ValidationError('Invalid stock adjustment', { delta: 'Quantity change must be a non-zero whole number.' });
    }

    const { movement, quantityAfter } = await store.transaction(async (tx) => {
        const qty = await tx.stock.applyDelta(target, command.delta);
        if (qty === null) {
            throw new NotFoundError('Inventory item not found', target.kind, target.id);
        }
        const row = await tx.stock.recordMovement({
            target,
            movementType: command.label,
            qtyChange: command.delta,
            unitCost: command.unitCost ?? null,
            referenceType: null,
            referenceId: null,
            notes: command.note ?? null,
        });
        return { movement: row, quantityAfter: qty };
    });

    inventoryLogger.info(
        { kind: target.kind, id: target.id, delta: command.delta, quantityAfter, movementId: movement.id },
        'Stock adjusted'
    );

    const rollup = hasParentRollup(target.kind) ? await rollupAfterVariantChange(store, target.id) : null;
    return { movement, quantityAfter, rollup };
}

/**
 * Form variant: direction + positive quantity → "Stock In" / "Stock Out".
 */
export async function adjustStockFromForm(store: Store, input: StockFormInput): Promise<AdjustStockResult> {
    const signed = toSignedDelta(input.direction, input.quantity);
    if (!signed) {
        throw new ValidationError('Invalid stock adjustment', { quantity: 'Quantity must be greater than 0.' });
    }
    return adjustStock(store, {
        kind: input.kind,
        itemId: input.itemId,
        delta: signed.delta,
        label: signed.label,
        note: input.notes ?? null,
    });
}
