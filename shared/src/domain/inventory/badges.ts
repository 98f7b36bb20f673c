/**
 * Stock badges
 *
 * Pure derivation of the stock badge shown for a variant, a stocked item or a
 * furniture item card. Out of Stock is always checked before Low Stock.
 */

import { DEFAULT_LOW_STOCK_THRESHOLD, type FurnitureStatus } from '../constants.js';

export const STOCK_BADGES = ['In Stock', 'Low Stock', 'Out of Stock', 'Made to Order'] as const;
export type StockBadge = (typeof STOCK_BADGES)[number];

export type BadgeTone = 'success' | 'warning' | 'danger' | 'secondary';

const BADGE_TONES: Record<StockBadge, BadgeTone> = {
    'In Stock': 'success',
    'Low Stock': 'warning',
    'Out of Stock': 'danger',
    'Made to Order': 'secondary',
};

export interface StockLevel {
    qtyOnHand: number;
    reorderLevel: number;
}

/**
 * Variant low rule: `qty <= reorder` when a reorder level is set,
 * otherwise `qty < DEFAULT_LOW_STOCK_THRESHOLD`. Includes qty <= 0.
 */
export function isLowStock({ qtyOnHand, reorderLevel }: StockLevel): boolean {
    return reorderLevel > 0 ? qtyOnHand <= reorderLevel : qtyOnHand < DEFAULT_LOW_STOCK_THRESHOLD;
}

export function deriveStockBadge(level: StockLevel): StockBadge {
    if (level.qtyOnHand <= 0) return 'Out of Stock';
    return isLowStock(level) ? 'Low Stock' : 'In Stock';
}

/**
 * Badge for a furniture item card from its cached status and ACTIVE variants.
 * Made to Order wins; otherwise Out when the total is <= 0, Low when any
 * variant is low.
 */
export function deriveFurnitureBadge(status: FurnitureStatus, variants: readonly StockLevel[]): StockBadge {
    if (status === 'MADE_TO_ORDER') return 'Made to Order';
    const total = variants.reduce((sum, v) => sum + v.qtyOnHand, 0);
    if (total <= 0) return 'Out of Stock';
    return variants.some(isLowStock) ? 'Low Stock' : 'In Stock';
}

export function badgeTone(badge: StockBadge): BadgeTone {
    return BADGE_TONES[badge];
}

/**
 * Cached furniture status after a variant mutation.
 * MADE_TO_ORDER is sticky; otherwise OUT_OF_STOCK iff total <= 0.
 */
export function rollupFurnitureStatus(current: FurnitureStatus, activeQuantities: readonly number[]): FurnitureStatus {
    if (current === 'MADE_TO_ORDER') return current;
    const total = activeQuantities.reduce((sum, qty) => sum + qty, 0);
    return total <= 0 ? 'OUT_OF_STOCK' : 'IN_STOCK';
}

export interface VariantSummary {
    totalQty: number;
    minCost: number;
    minSale: number;
}

/** Totals for a card; min prices are 0 when there are no variants */
export function summarizeVariants(
    variants: readonly { qtyOnHand: number; costPrice: number; salePrice: number }[]
): VariantSummary {
    if (variants.length === 0) return { totalQty: 0, minCost: 0, minSale: 0 };
    return {
        totalQty: variants.reduce((sum, v) => sum + v.qtyOnHand, 0),
        minCost: Math.min(...variants.map((v) => v.costPrice)),
        minSale: Math.min(...variants.map((v) => v.salePrice)),
    };
}
