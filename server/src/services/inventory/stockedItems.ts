/**
 * Flat stocked items: sofas, hardware and poshish materials.
 *
 * One row per item, no variants. Quantity is set at creation and changes
 * afterwards only through the stock engine.
 */

import {
    badgeTone,
    deriveStockBadge,
    type BadgeTone,
    type CreateHardwareMaterialInput,
    type CreatePoshishMaterialInput,
    type CreateSofaItemInput,
    type HardwareMaterial,
    type InventoryKind,
    type PoshishMaterial,
    type SofaItem,
    type StockBadge,
    type StockFields,
} from '@workshop-ledger/shared';
import type {
    NewHardwareMaterial,
    NewPoshishMaterial,
    NewSofaItem,
    StockedItemChanges,
    StockedItemRepository,
    Store,
} from '../../db/store.js';
import { NotFoundError } from '../../utils/errors.js';
import { inventoryLogger } from '../../utils/logger.js';

export interface StockedItemCard<TRow> {
    item: TRow;
    badge: StockBadge;
    badgeTone: BadgeTone;
}

type RepositorySelector<TRow, TNew> = (store: Store) => StockedItemRepository<TRow, TNew>;

export class StockedItemService<TRow extends StockFields & { id: number }, TNew> {
    constructor(
        readonly resourceType: string,
        readonly kind: InventoryKind,
        private readonly select: RepositorySelector<TRow, TNew>
    ) {}

    async create(store: Store, data: TNew): Promise<TRow> {
        const row = await this.select(store).create(data);
        inventoryLogger.info({ kind: this.kind, id: row.id, qty: row.qtyOnHand }, `${this.resourceType} created`);
        return row;
    }

    async update(store: Store, id: number, changes: StockedItemChanges<TNew>): Promise<TRow> {
        const row = await this.select(store).update(id, changes);
        if (!row) throw new NotFoundError(`${this.resourceType} not found`, this.resourceType, id);
        inventoryLogger.info({ kind: this.kind, id }, `${this.resourceType} updated`);
        return row;
    }

    async get(store: Store, id: number): Promise<StockedItemCard<TRow>> {
        const row = await this.select(store).findById(id);
        if (!row) throw new NotFoundError(`${this.resourceType} not found`, this.resourceType, id);
        return toCard(row);
    }

    async deactivate(store: Store, id: number): Promise<void> {
        const done = await this.select(store).deactivate(id);
        if (!done) throw new NotFoundError(`${this.resourceType} not found`, this.resourceType, id);
        inventoryLogger.info({ kind: this.kind, id }, `${this.resourceType} deactivated`);
    }

    async list(store: Store, q: string | null | undefined, limit: number): Promise<StockedItemCard<TRow>[]> {
        const rows = await this.select(store).list(q?.trim() || null, limit);
        return rows.map(toCard);
    }
}

function toCard<TRow extends StockFields>(item: TRow): StockedItemCard<TRow> {
    const badge = deriveStockBadge(item);
    return { item, badge, badgeTone: badgeTone(badge) };
}

// ============================================
// INPUT → ROW
// ============================================

export function newSofaItem(input: CreateSofaItemInput): NewSofaItem {
    return {
        ...input,
        hardwareMaterial: input.hardwareMaterial ?? null,
        poshishMaterial: input.poshishMaterial ?? null,
        seatingCapacity: input.seatingCapacity ?? null,
        notes: input.notes ?? null,
    };
}

export function newHardwareMaterial(input: CreateHardwareMaterialInput): NewHardwareMaterial {
    return { ...input, notes: input.notes ?? null };
}

export function newPoshishMaterial(input: CreatePoshishMaterialInput): NewPoshishMaterial {
    return { ...input, color: input.color ?? null, notes: input.notes ?? null };
}

// ============================================
// SERVICES
// ============================================

export const sofaItems = new StockedItemService<SofaItem, NewSofaItem>('Sofa', 'SOFA_ITEM', (store) => store.sofas);

export const hardwareMaterials = new StockedItemService<HardwareMaterial, NewHardwareMaterial>(
    'Hardware material',
    'HARDWARE_MATERIAL',
    (store) => store.hardware
);

export const poshishMaterials = new StockedItemService<PoshishMaterial, NewPoshishMaterial>(
    'Poshish material',
    'POSHISH_MATERIAL',
    (store) => store.poshish
);
