/**
 * Foam Service
 *
 * Models under brands, and variants keyed by (model, bed size, thickness).
 */

import {
    badgeTone,
    deriveStockBadge,
    formatInches,
    type BadgeTone,
    type CreateFoamModelInput,
    type FoamListQuery,
    type FoamModel,
    type FoamVariant,
    type FoamVariantInput,
    type SaveFoamInput,
    type StockBadge,
} from '@workshop-ledger/shared';
import type { FoamVariantDetail, Store } from '../../db/store.js';
import { NotFoundError } from '../../utils/errors.js';
import { inventoryLogger } from '../../utils/logger.js';

export interface FoamCard extends FoamVariantDetail {
    label: string;
    badge: StockBadge;
    badgeTone: BadgeTone;
}

export interface FoamVariantResult {
    variant: FoamVariant;
    created: boolean;
}

/** "MoltyFoam Master · King (72×78) · 6in" */
export function foamVariantLabel(detail: Omit<FoamVariantDetail, 'variant'>): string {
    return `${detail.brand.name} ${detail.model.name} · ${detail.bedSize.label} · ${formatInches(detail.thickness.inches)}`;
}

// ============================================
// MODELS
// ============================================

export async function createFoamModel(
    store: Store,
    input: CreateFoamModelInput
): Promise<{ model: FoamModel; created: boolean }> {
    const brand = await store.catalog.findBrand(input.brandId);
    if (!brand) throw new NotFoundError('Foam brand not found', 'FoamBrand', input.brandId);

    const { row, created } = await store.catalog.upsertModel(brand.id, input.name, input.notes ?? undefined);
    inventoryLogger.info({ modelId: row.id, brandId: brand.id, created }, 'Foam model saved');
    return { model: row, created };
}

/** Model and all its variants become inactive */
export async function deactivateFoamModel(store: Store, modelId: number): Promise<void> {
    const done = await store.transaction((tx) => tx.foam.deactivateModel(modelId));
    if (!done) throw new NotFoundError('Foam model not found', 'FoamModel', modelId);
    inventoryLogger.info({ modelId }, 'Foam model deactivated');
}

// ============================================
// VARIANTS
// ============================================

async function assertFoamSize(store: Store, bedSizeId: number, thicknessId: number): Promise<void> {
    if (!(await store.catalog.findBedSize(bedSizeId))) {
        throw new NotFoundError('Bed size not found', 'BedSize', bedSizeId);
    }
    if (!(await store.catalog.findThickness(thicknessId))) {
        throw new NotFoundError('Foam thickness not found', 'FoamThickness', thicknessId);
    }
}

async function writeFoamVariant(tx: Store, input: FoamVariantInput): Promise<FoamVariantResult> {
    if (!(await tx.catalog.findModel(input.foamModelId))) {
        throw new NotFoundError('Foam model not found', 'FoamModel', input.foamModelId);
    }
    await assertFoamSize(tx, input.bedSizeId, input.thicknessId);

    const { row, created } = await tx.foam.upsertVariant(
        { foamModelId: input.foamModelId, bedSizeId: input.bedSizeId, thicknessId: input.thicknessId },
        {
            densityType: input.densityType ?? null,
            qtyOnHand: input.qtyOnHand,
            reorderLevel: input.reorderLevel,
            purchaseCost: input.purchaseCost,
            salePrice: input.salePrice,
        }
    );
    return { variant: row, created };
}

function logFoamVariantSaved({ variant, created }: FoamVariantResult): void {
    inventoryLogger.info(
        { variantId: variant.id, modelId: variant.foamModelId, created, qty: variant.qtyOnHand },
        'Foam variant saved'
    );
}

export async function upsertFoamVariant(store: Store, input: FoamVariantInput): Promise<FoamVariantResult> {
    const result = await store.transaction((tx) => writeFoamVariant(tx, input));
    logFoamVariantSaved(result);
    return result;
}

/**
 * Form save: find or create the model by name under the brand, then upsert
 * the variant. Brand, bed size and thickness are checked first and both
 * writes share one transaction, so a bad variant leaves no model behind.
 */
export async function saveFoam(store: Store, input: SaveFoamInput): Promise<FoamVariantResult & { model: FoamModel }> {
    const { brandId, modelName, modelNotes, ...variant } = input;

    if (!(await store.catalog.findBrand(brandId))) {
        throw new NotFoundError('Foam brand not found', 'FoamBrand', brandId);
    }
    await assertFoamSize(store, variant.bedSizeId, variant.thicknessId);

    const saved = await store.transaction(async (tx) => {
        const { model } = await createFoamModel(tx, { brandId, name: modelName, notes: modelNotes });
        const result = await writeFoamVariant(tx, { ...variant, foamModelId: model.id });
        return { ...result, model };
    });
    logFoamVariantSaved(saved);
    return saved;
}

export async function listFoamVariants(store: Store, modelId: number): Promise<FoamVariant[]> {
    if (!(await store.catalog.findModel(modelId))) {
        throw new NotFoundError('Foam model not found', 'FoamModel', modelId);
    }
    return store.foam.listVariants(modelId);
}

// ============================================
// CARDS
// ============================================

/** Active variants, lowest quantity first */
export async function listFoamCards(store: Store, query: FoamListQuery): Promise<FoamCard[]> {
    const details = await store.foam.cards({
        q: query.q?.trim() || null,
        brandId: query.brandId ?? null,
        limit: query.limit,
    });
    return details.map((detail) => {
        const badge = deriveStockBadge(detail.variant);
        return { ...detail, label: foamVariantLabel(detail), badge, badgeTone: badgeTone(badge) };
    });
}
