/**
 * Inventory read views: movement history, low stock, dashboard counters,
 * and the category / reference lists the entry forms need.
 */

import {
    INVENTORY_KIND_LABELS,
    LIST_LIMITS,
    badgeTone,
    deriveStockBadge,
    type BadgeTone,
    type BedSize,
    type CategoryType,
    type FoamBrand,
    type FoamModel,
    type FoamThickness,
    type FoamVariant,
    type FurnitureVariant,
    type InventoryCategory,
    type InventoryKind,
    type StockBadge,
    type StockMovement,
} from '@workshop-ledger/shared';
import type { FurnitureVariantDetail, StockSummary, Store } from '../../db/store.js';
import { foamVariantLabel } from './foam.js';

// ============================================
// LABELS
// ============================================

const CUSTOM_SIZE_LABEL = 'Custom Size';

/** "Cushion Bed · King (72×78)" */
export function furnitureVariantLabel(detail: Omit<FurnitureVariantDetail, 'variant'>): string {
    return `${detail.item.name} · ${detail.bedSize ? detail.bedSize.label : CUSTOM_SIZE_LABEL}`;
}

export function labelKey(kind: InventoryKind, id: number): string {
    return `${kind}:${id}`;
}

function fallbackLabel(kind: InventoryKind, id: number): string {
    return `${INVENTORY_KIND_LABELS[kind]} #${id}`;
}

/** Resolve a display label for every (kind, id) pair, one lookup per kind */
export async function resolveItemLabels(
    store: Store,
    targets: readonly { kind: InventoryKind; id: number }[]
): Promise<Map<string, string>> {
    const idsByKind = new Map<InventoryKind, number[]>();
    for (const { kind, id } of targets) {
        const ids = idsByKind.get(kind) ?? [];
        if (!ids.includes(id)) ids.push(id);
        idsByKind.set(kind, ids);
    }

    const labels = new Map<string, string>();
    for (const [kind, ids] of idsByKind) {
        switch (kind) {
            case 'FURNITURE_VARIANT':
                for (const detail of await store.furniture.variantDetails(ids)) {
                    labels.set(labelKey(kind, detail.variant.id), furnitureVariantLabel(detail));
                }
                break;
            case 'FOAM_VARIANT':
                for (const detail of await store.foam.variantDetails(ids)) {
                    labels.set(labelKey(kind, detail.variant.id), foamVariantLabel(detail));
                }
                break;
            case 'SOFA_ITEM':
                for (const row of await store.sofas.findByIds(ids)) labels.set(labelKey(kind, row.id), row.name);
                break;
            case 'HARDWARE_MATERIAL':
                for (const row of await store.hardware.findByIds(ids)) labels.set(labelKey(kind, row.id), row.name);
                break;
            case 'POSHISH_MATERIAL':
                for (const row of await store.poshish.findByIds(ids)) labels.set(labelKey(kind, row.id), row.name);
                break;
        }
    }
    return labels;
}

// ============================================
// MOVEMENT HISTORY
// ============================================

export interface MovementHistoryRow {
    movement: StockMovement;
    kindLabel: string;
    itemLabel: string;
}

/** Newest first */
export async function movementHistory(
    store: Store,
    limit: number = LIST_LIMITS.stockMovements
): Promise<MovementHistoryRow[]> {
    const movements = await store.stock.listMovements(Math.min(limit, LIST_LIMITS.stockMovementsMax));
    const labels = await resolveItemLabels(
        store,
        movements.map((m) => ({ kind: m.inventoryType, id: m.variantId }))
    );
    return movements.map((movement) => ({
        movement,
        kindLabel: INVENTORY_KIND_LABELS[movement.inventoryType],
        itemLabel:
            labels.get(labelKey(movement.inventoryType, movement.variantId)) ??
            fallbackLabel(movement.inventoryType, movement.variantId),
    }));
}

// ============================================
// LOW STOCK
// ============================================

export interface LowStockRow<TVariant> {
    variant: TVariant;
    label: string;
    badge: StockBadge;
    badgeTone: BadgeTone;
}

export interface LowStockReport {
    furniture: LowStockRow<FurnitureVariant>[];
    foam: LowStockRow<FoamVariant>[];
}

function lowStockRows<TVariant extends FurnitureVariant | FoamVariant>(
    variants: readonly TVariant[],
    kind: InventoryKind,
    labels: Map<string, string>
): LowStockRow<TVariant>[] {
    return variants.map((variant) => {
        const badge = deriveStockBadge(variant);
        return {
            variant,
            label: labels.get(labelKey(kind, variant.id)) ?? fallbackLabel(kind, variant.id),
            badge,
            badgeTone: badgeTone(badge),
        };
    });
}

/** Active variants under the low rule (including qty ≤ 0), lowest quantity first */
export async function lowStockReport(store: Store, limit: number = LIST_LIMITS.inventoryList): Promise<LowStockReport> {
    const furniture = await store.furniture.lowStock(limit);
    const foam = await store.foam.lowStock(limit);
    const labels = await resolveItemLabels(store, [
        ...furniture.map((v) => ({ kind: 'FURNITURE_VARIANT' as const, id: v.id })),
        ...foam.map((v) => ({ kind: 'FOAM_VARIANT' as const, id: v.id })),
    ]);
    return {
        furniture: lowStockRows(furniture, 'FURNITURE_VARIANT', labels),
        foam: lowStockRows(foam, 'FOAM_VARIANT', labels),
    };
}

// ============================================
// DASHBOARD
// ============================================

export interface InventoryDashboard {
    furnitureItems: number;
    byKind: Record<InventoryKind, StockSummary>;
    lowStockTotal: number;
    movementsLast7Days: number;
}

const DASHBOARD_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export async function inventoryDashboard(store: Store, now: Date = new Date()): Promise<InventoryDashboard> {
    const byKind: Record<InventoryKind, StockSummary> = {
        FURNITURE_VARIANT: await store.stock.summarize('FURNITURE_VARIANT'),
        FOAM_VARIANT: await store.stock.summarize('FOAM_VARIANT'),
        SOFA_ITEM: await store.stock.summarize('SOFA_ITEM'),
        HARDWARE_MATERIAL: await store.stock.summarize('HARDWARE_MATERIAL'),
        POSHISH_MATERIAL: await store.stock.summarize('POSHISH_MATERIAL'),
    };

    return {
        furnitureItems: await store.furniture.countActiveItems(),
        byKind,
        lowStockTotal: Object.values(byKind).reduce((sum, summary) => sum + summary.low, 0),
        movementsLast7Days: await store.stock.countMovementsSince(new Date(now.getTime() - DASHBOARD_WINDOW_MS)),
    };
}

// ============================================
// CATEGORIES & REFERENCE DATA
// ============================================

export interface CategoryNode {
    category: InventoryCategory;
    children: CategoryNode[];
}

async function categoryChildren(store: Store, type: CategoryType, parentId: number, depth: number): Promise<CategoryNode[]> {
    if (depth <= 0) return [];
    const rows = await store.catalog.listCategories(type, parentId);
    const nodes: CategoryNode[] = [];
    for (const category of rows) {
        nodes.push({ category, children: await categoryChildren(store, type, category.id, depth - 1) });
    }
    return nodes;
}

/** Roots of one type with two levels below them */
export async function categoryTree(store: Store, type: CategoryType): Promise<CategoryNode[]> {
    const roots = await store.catalog.listCategories(type, null);
    const tree: CategoryNode[] = [];
    for (const category of roots) {
        tree.push({ category, children: await categoryChildren(store, type, category.id, 2) });
    }
    return tree;
}

/** Names of the sub-categories under Furniture → Sofa */
export async function sofaTypes(store: Store): Promise<string[]> {
    const root = await store.catalog.findCategory({ type: 'FURNITURE', parentId: null, name: 'Furniture' });
    if (!root) return [];
    const sofa = await store.catalog.findCategory({ type: 'FURNITURE', parentId: root.id, name: 'Sofa' });
    if (!sofa) return [];
    const children = await store.catalog.listCategories('FURNITURE', sofa.id);
    return children.map((c) => c.name);
}

export interface ReferenceData {
    bedSizes: BedSize[];
    thicknesses: FoamThickness[];
    brands: FoamBrand[];
    models: FoamModel[];
    sofaTypes: string[];
}

export async function referenceData(store: Store): Promise<ReferenceData> {
    return {
        bedSizes: await store.catalog.listBedSizes(),
        thicknesses: await store.catalog.listThicknesses(),
        brands: await store.catalog.listBrands(),
        models: await store.catalog.listModels(null),
        sofaTypes: await sofaTypes(store),
    };
}
