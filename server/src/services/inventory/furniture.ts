/**
 * Furniture Service
 *
 * Items, their per-bed-size variants, and the cards the inventory screen
 * shows. Every variant write is followed by the best-effort status rollup
 * from the stock engine.
 */

import {
    badgeTone,
    deriveFurnitureBadge,
    summarizeVariants,
    type BadgeTone,
    type CreateFurnitureItemInput,
    type FurnitureItem,
    type FurnitureListQuery,
    type FurnitureVariant,
    type FurnitureVariantInput,
    type SaveFurnitureInput,
    type StockBadge,
    type UpdateFurnitureItemInput,
    type VariantSummary,
} from '@workshop-ledger/shared';
import type { FurnitureVariantFields, Store } from '../../db/store.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { inventoryLogger } from '../../utils/logger.js';
import { recomputeFurnitureStatus, rollupAfterVariantChange, type RollupResult } from './stockEngine.js';

// ============================================
// TYPES
// ============================================

export interface FurnitureCard extends VariantSummary {
    item: FurnitureItem;
    variants: FurnitureVariant[];
    badge: StockBadge;
    badgeTone: BadgeTone;
    categoryName: string | null;
    subCategoryName: string | null;
}

export interface VariantUpsertResult {
    variant: FurnitureVariant;
    created: boolean;
    rollup: RollupResult;
}

export interface SaveFurnitureResult extends VariantUpsertResult {
    item: FurnitureItem;
    itemCreated: boolean;
}

// ============================================
// HELPERS
// ============================================

/** `FUR-<unix seconds>` */
export function generateFurnitureSku(now: Date = new Date()): string {
    return `FUR-${Math.floor(now.getTime() / 1000)}`;
}

async function assertFurnitureCategories(
    store: Store,
    categoryId: number | undefined,
    subCategoryId: number | null | undefined
): Promise<void> {
    const errors: Record<string, string> = {};
    if (categoryId !== undefined) {
        const category = await store.catalog.findCategoryById(categoryId);
        if (!category || category.type !== 'FURNITURE') errors.categoryId = 'Unknown furniture category.';
    }
    if (subCategoryId !== undefined && subCategoryId !== null) {
        const sub = await store.catalog.findCategoryById(subCategoryId);
        if (!sub || sub.type !== 'FURNITURE') errors.subCategoryId = 'Unknown furniture sub-category.';
    }
    if (Object.keys(errors).length > 0) {
        throw new ValidationError('Invalid furniture item', errors);
    }
}

function variantFields(input: FurnitureVariantInput): FurnitureVariantFields {
    return {
        qtyOnHand: input.qtyOnHand,
        reorderLevel: input.reorderLevel,
        costPrice: input.costPrice,
        salePrice: input.salePrice,
    };
}

/** Category by name anywhere under the furniture roots; null when unknown */
export async function resolveFurnitureCategoryId(store: Store, name: string): Promise<number | null> {
    const roots = await store.catalog.listCategories('FURNITURE', null);
    for (const root of roots) {
        if (root.name.toLowerCase() === name.trim().toLowerCase()) return root.id;
        const child = await store.catalog.findCategory({ type: 'FURNITURE', parentId: root.id, name: name.trim() });
        if (child) return child.id;
    }
    return null;
}

// ============================================
// ITEMS
// ============================================

export async function createFurnitureItem(
    store: Store,
    input: CreateFurnitureItemInput,
    now: Date = new Date()
): Promise<FurnitureItem> {
    await assertFurnitureCategories(store, input.categoryId, input.subCategoryId);

    const item = await store.furniture.createItem({
        name: input.name,
        sku: input.sku ?? generateFurnitureSku(now),
        materialType: input.materialType,
        colorFinish: input.colorFinish ?? null,
        status: input.status === 'MADE_TO_ORDER' ? 'MADE_TO_ORDER' : 'IN_STOCK',
        categoryId: input.categoryId,
        subCategoryId: input.subCategoryId ?? null,
        notes: input.notes ?? null,
    });

    inventoryLogger.info({ itemId: item.id, sku: item.sku }, 'Furniture item created');
    return item;
}

/**
 * Leaving MADE_TO_ORDER hands the status back to the rollup, so it is
 * recomputed from the variants right away.
 */
export async function updateFurnitureItem(
    store: Store,
    id: number,
    input: UpdateFurnitureItemInput
): Promise<FurnitureItem> {
    await assertFurnitureCategories(store, input.categoryId, input.subCategoryId);

    return store.transaction(async (tx) => {
        const updated = await tx.furniture.updateItem(id, input);
        if (!updated) throw new NotFoundError('Furniture item not found', 'FurnitureItem', id);

        if (updated.status !== 'MADE_TO_ORDER') {
            await recomputeFurnitureStatus(tx, id);
        }
        const item = await tx.furniture.findItem(id);
        if (!item) throw new NotFoundError('Furniture item not found', 'FurnitureItem', id);

        inventoryLogger.info({ itemId: id, status: item.status }, 'Furniture item updated');
        return item;
    });
}

export async function getFurnitureItem(store: Store, id: number): Promise<FurnitureCard> {
    const item = await store.furniture.findItem(id);
    if (!item) throw new NotFoundError('Furniture item not found', 'FurnitureItem', id);
    const [card] = await buildFurnitureCards(store, [item]);
    return card;
}

/** Item and all its variants become inactive; movements are untouched */
export async function deactivateFurnitureItem(store: Store, id: number): Promise<void> {
    const done = await store.transaction((tx) => tx.furniture.deactivateItem(id));
    if (!done) throw new NotFoundError('Furniture item not found', 'FurnitureItem', id);
    inventoryLogger.info({ itemId: id }, 'Furniture item deactivated');
}

// ============================================
// VARIANTS
// ============================================

async function assertBedSize(store: Store, bedSizeId: number | null): Promise<void> {
    if (bedSizeId !== null && !(await store.catalog.findBedSize(bedSizeId))) {
        throw new NotFoundError('Bed size not found', 'BedSize', bedSizeId);
    }
}

async function writeFurnitureVariant(
    tx: Store,
    furnitureItemId: number,
    input: FurnitureVariantInput
): Promise<{ row: FurnitureVariant; created: boolean }> {
    const item = await tx.furniture.findItem(furnitureItemId);
    if (!item) throw new NotFoundError('Furniture item not found', 'FurnitureItem', furnitureItemId);
    await assertBedSize(tx, input.bedSizeId);
    return tx.furniture.upsertVariant({ furnitureItemId, bedSizeId: input.bedSizeId }, variantFields(input));
}

function logVariantSaved(furnitureItemId: number, row: FurnitureVariant, created: boolean): void {
    inventoryLogger.info(
        { itemId: furnitureItemId, variantId: row.id, bedSizeId: row.bedSizeId, created, qty: row.qtyOnHand },
        'Furniture variant saved'
    );
}

/**
 * Find-or-create the variant for (item, bed size); found → fields
 * overwritten and reactivated. The item must exist, and so must the bed
 * size unless it is null (custom size).
 */
export async function upsertFurnitureVariant(
    store: Store,
    furnitureItemId: number,
    input: FurnitureVariantInput
): Promise<VariantUpsertResult> {
    const { row, created } = await store.transaction((tx) => writeFurnitureVariant(tx, furnitureItemId, input));
    logVariantSaved(furnitureItemId, row, created);

    const rollup = await rollupAfterVariantChange(store, row.id, furnitureItemId);
    return { variant: row, created, rollup };
}

export async function listFurnitureVariants(store: Store, furnitureItemId: number): Promise<FurnitureVariant[]> {
    const item = await store.furniture.findItem(furnitureItemId);
    if (!item) throw new NotFoundError('Furniture item not found', 'FurnitureItem', furnitureItemId);
    return store.furniture.listVariants([furnitureItemId]);
}

/**
 * Form save: create the item (or update it when `itemId` is given) and
 * upsert the variant for the chosen bed size in one transaction. Lookups
 * are checked before anything is written; only the rollup runs after
 * commit.
 */
export async function saveFurniture(
    store: Store,
    input: SaveFurnitureInput,
    now: Date = new Date()
): Promise<SaveFurnitureResult> {
    const { itemId, variant, sku, ...fields } = input;

    await assertFurnitureCategories(store, fields.categoryId, fields.subCategoryId);
    await assertBedSize(store, variant.bedSizeId);

    const { item, row, created } = await store.transaction(async (tx) => {
        const saved =
            itemId === undefined
                ? await createFurnitureItem(tx, { ...fields, sku }, now)
                : await updateFurnitureItem(tx, itemId, fields);
        const written = await writeFurnitureVariant(tx, saved.id, variant);
        return { item: saved, ...written };
    });
    logVariantSaved(item.id, row, created);

    const rollup = await rollupAfterVariantChange(store, row.id, item.id);
    const refreshed = await store.furniture.findItem(item.id);

    return { variant: row, created, rollup, item: refreshed ?? item, itemCreated: itemId === undefined };
}

// ============================================
// CARDS
// ============================================

export async function buildFurnitureCards(store: Store, items: readonly FurnitureItem[]): Promise<FurnitureCard[]> {
    const variants = await store.furniture.listVariants(items.map((item) => item.id));
    const byItem = new Map<number, FurnitureVariant[]>();
    for (const variant of variants) {
        const list = byItem.get(variant.furnitureItemId) ?? [];
        list.push(variant);
        byItem.set(variant.furnitureItemId, list);
    }

    const categoryNames = new Map<number, string | null>();
    const categoryName = async (id: number | null): Promise<string | null> => {
        if (id === null) return null;
        if (!categoryNames.has(id)) {
            const category = await store.catalog.findCategoryById(id);
            categoryNames.set(id, category ? category.name : null);
        }
        return categoryNames.get(id) ?? null;
    };

    const cards: FurnitureCard[] = [];
    for (const item of items) {
        const itemVariants = byItem.get(item.id) ?? [];
        const badge = deriveFurnitureBadge(item.status, itemVariants);
        cards.push({
            item,
            variants: itemVariants,
            ...summarizeVariants(itemVariants),
            badge,
            badgeTone: badgeTone(badge),
            categoryName: await categoryName(item.categoryId),
            subCategoryName: await categoryName(item.subCategoryId),
        });
    }
    return cards;
}

export async function listFurnitureCards(store: Store, query: FurnitureListQuery): Promise<FurnitureCard[]> {
    let categoryId = query.categoryId ?? null;
    if (categoryId === null && query.category) {
        categoryId = await resolveFurnitureCategoryId(store, query.category);
        if (categoryId === null) return [];
    }

    const items = await store.furniture.listItems({
        q: query.q?.trim() || null,
        categoryId,
        limit: query.limit,
    });
    return buildFurnitureCards(store, items);
}
