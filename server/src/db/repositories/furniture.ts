/**
 * Kysely Furniture Repository
 *
 * Furniture items and their per-bed-size variants. The item's `status`
 * column is a cache maintained by the stock engine, never derived here.
 */

import type { BedSize, FurnitureItem, FurnitureStatus, FurnitureVariant } from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type {
    FurnitureItemChanges,
    FurnitureRepository,
    FurnitureVariantDetail,
    FurnitureVariantFields,
    FurnitureVariantKey,
    ItemListFilter,
    NewFurnitureItem,
    Upserted,
} from '../store.js';
import { containsPattern, findOrInsert, lowStockCondition, toNumber } from './sqlHelpers.js';

export class KyselyFurnitureRepository implements FurnitureRepository {
    constructor(private readonly db: KyselyDB) {}

    // ============================================
    // ITEMS
    // ============================================

    async createItem(data: NewFurnitureItem): Promise<FurnitureItem> {
        return this.db
            .insertInto('furnitureItems')
            .values({ ...data, isActive: true })
            .returningAll()
            .executeTakeFirstOrThrow();
    }

    async updateItem(id: number, data: FurnitureItemChanges): Promise<FurnitureItem | null> {
        const row = await this.db
            .updateTable('furnitureItems')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }

    async findItem(id: number): Promise<FurnitureItem | null> {
        const row = await this.db.selectFrom('furnitureItems').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async listItems(filter: ItemListFilter): Promise<FurnitureItem[]> {
        let query = this.db.selectFrom('furnitureItems').selectAll().where('isActive', '=', true);
        if (filter.categoryId !== null) {
            query = query.where('categoryId', '=', filter.categoryId);
        }
        if (filter.q !== null) {
            query = query.where('name', 'ilike', containsPattern(filter.q));
        }
        return query.orderBy('id', 'desc').limit(filter.limit).execute();
    }

    async setStatus(id: number, status: FurnitureStatus): Promise<void> {
        await this.db
            .updateTable('furnitureItems')
            .set({ status, updatedAt: new Date() })
            .where('id', '=', id)
            .execute();
    }

    async deactivateItem(id: number): Promise<boolean> {
        const result = await this.db
            .updateTable('furnitureItems')
            .set({ isActive: false, updatedAt: new Date() })
            .where('id', '=', id)
            .executeTakeFirst();
        if (result.numUpdatedRows === 0n) return false;

        await this.db
            .updateTable('furnitureVariants')
            .set({ isActive: false, updatedAt: new Date() })
            .where('furnitureItemId', '=', id)
            .execute();
        return true;
    }

    async countActiveItems(): Promise<number> {
        const row = await this.db
            .selectFrom('furnitureItems')
            .select((eb) => eb.fn.countAll<string>().as('count'))
            .where('isActive', '=', true)
            .executeTakeFirst();
        return toNumber(row?.count);
    }

    // ============================================
    // VARIANTS
    // ============================================

    async findVariant(id: number): Promise<FurnitureVariant | null> {
        const row = await this.db.selectFrom('furnitureVariants').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async upsertVariant(
        key: FurnitureVariantKey,
        fields: FurnitureVariantFields
    ): Promise<Upserted<FurnitureVariant>> {
        const result = await findOrInsert(
            () => {
                const query = this.db
                    .selectFrom('furnitureVariants')
                    .selectAll()
                    .where('furnitureItemId', '=', key.furnitureItemId);
                return (
                    key.bedSizeId === null
                        ? query.where('bedSizeId', 'is', null)
                        : query.where('bedSizeId', '=', key.bedSizeId)
                ).executeTakeFirst();
            },
            () =>
                this.db
                    .insertInto('furnitureVariants')
                    .values({ ...key, ...fields, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created) return result;

        const row = await this.db
            .updateTable('furnitureVariants')
            .set({ ...fields, isActive: true, updatedAt: new Date() })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    async listVariants(itemIds: readonly number[]): Promise<FurnitureVariant[]> {
        if (itemIds.length === 0) return [];
        return this.db
            .selectFrom('furnitureVariants')
            .selectAll()
            .where('isActive', '=', true)
            .where('furnitureItemId', 'in', [...itemIds])
            .orderBy('furnitureItemId', 'asc')
            .orderBy('bedSizeId', 'asc')
            .execute();
    }

    async activeQuantities(itemId: number): Promise<number[]> {
        const rows = await this.db
            .selectFrom('furnitureVariants')
            .select('qtyOnHand')
            .where('isActive', '=', true)
            .where('furnitureItemId', '=', itemId)
            .execute();
        return rows.map((row) => row.qtyOnHand);
    }

    async variantDetails(variantIds: readonly number[]): Promise<FurnitureVariantDetail[]> {
        if (variantIds.length === 0) return [];

        const variants = await this.db
            .selectFrom('furnitureVariants')
            .selectAll()
            .where('id', 'in', [...variantIds])
            .execute();
        if (variants.length === 0) return [];

        const items = await this.db
            .selectFrom('furnitureItems')
            .selectAll()
            .where('id', 'in', [...new Set(variants.map((v) => v.furnitureItemId))])
            .execute();
        const sizeIds = [...new Set(variants.flatMap((v) => (v.bedSizeId === null ? [] : [v.bedSizeId])))];
        const sizes: BedSize[] =
            sizeIds.length === 0
                ? []
                : await this.db.selectFrom('bedSizes').selectAll().where('id', 'in', sizeIds).execute();

        const itemById = new Map(items.map((item) => [item.id, item]));
        const sizeById = new Map(sizes.map((size) => [size.id, size]));

        return variants.flatMap((variant) => {
            const item = itemById.get(variant.furnitureItemId);
            if (!item) return [];
            const bedSize = variant.bedSizeId === null ? null : sizeById.get(variant.bedSizeId) ?? null;
            return [{ variant, item, bedSize }];
        });
    }

    async lowStock(limit: number): Promise<FurnitureVariant[]> {
        return this.db
            .selectFrom('furnitureVariants')
            .selectAll()
            .where('isActive', '=', true)
            .where(lowStockCondition())
            .orderBy('qtyOnHand', 'asc')
            .orderBy('id', 'asc')
            .limit(limit)
            .execute();
    }
}
