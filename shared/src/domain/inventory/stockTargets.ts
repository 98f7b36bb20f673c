/**
 * Stock targets
 *
 * A StockMovement row stores `(inventory_type, variant_id)`. In code that pair
 * is a tagged union so the kind decides which table holds the row.
 */

import type { InventoryKind } from '../constants.js';

export type StockTarget = { [K in InventoryKind]: { kind: K; id: number } }[InventoryKind];

export const STOCK_DIRECTIONS = ['in', 'out'] as const;
export type StockDirection = (typeof STOCK_DIRECTIONS)[number];

export const MOVEMENT_LABELS = {
    in: 'Stock In',
    out: 'Stock Out',
} as const;

/** Kinds whose quantity change must be rolled up into a parent row */
const KINDS_WITH_PARENT: ReadonlySet<InventoryKind> = new Set<InventoryKind>(['FURNITURE_VARIANT']);

export function hasParentRollup(kind: InventoryKind): boolean {
    return KINDS_WITH_PARENT.has(kind);
}

export function stockTarget<K extends InventoryKind>(kind: K, id: number): { kind: K; id: number } {
    return { kind, id };
}

/**
 * Form input (direction + positive quantity) → signed delta and label.
 * Returns null for a non-positive or non-integer quantity.
 */
export function toSignedDelta(
    direction: StockDirection,
    quantity: number
): { delta: number; label: string } | null {
    if (!Number.isInteger(quantity) || quantity <= 0) return null;
    return direction === 'in'
        ? { delta: quantity, label: MOVEMENT_LABELS.in }
        : { delta: -quantity, label: MOVEMENT_LABELS.out };
}

/** Human names for each kind, used in movement history and exports */
export const INVENTORY_KIND_LABELS: Record<InventoryKind, string> = {
    FURNITURE_VARIANT: 'Furniture',
    FOAM_VARIANT: 'Foam',
    SOFA_ITEM: 'Sofa',
    HARDWARE_MATERIAL: 'Hardware',
    POSHISH_MATERIAL: 'Poshish',
};
