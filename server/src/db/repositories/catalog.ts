/**
 * Kysely Reference Catalog Repository
 *
 * Categories, bed sizes, foam thicknesses, brands and models. Every upsert
 * is a find-or-create on the natural key backed by a unique index
 * (see migrations/0001_initial.ts).
 */

import { sql } from 'kysely';
import type {
    BedSize,
    CategoryType,
    FoamBrand,
    FoamModel,
    FoamThickness,
    InventoryCategory,
} from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type { BedSizeSpec, CatalogRepository, CategoryKey, Upserted } from '../store.js';
import { findOrInsert } from './sqlHelpers.js';

const lowerName = sql<string>`lower(${sql.ref('name')})`;

export class KyselyCatalogRepository implements CatalogRepository {
    constructor(private readonly db: KyselyDB) {}

    // ============================================
    // CATEGORIES
    // ============================================

    private async findCategoryAnyState(key: CategoryKey): Promise<InventoryCategory | undefined> {
        let query = this.db
            .selectFrom('inventoryCategories')
            .selectAll()
            .where('type', '=', key.type)
            .where(lowerName, '=', key.name.toLowerCase());
        query = key.parentId === null ? query.where('parentId', 'is', null) : query.where('parentId', '=', key.parentId);
        return query.executeTakeFirst();
    }

    async upsertCategory(key: CategoryKey): Promise<Upserted<InventoryCategory>> {
        const result = await findOrInsert(
            () => this.findCategoryAnyState(key),
            () =>
                this.db
                    .insertInto('inventoryCategories')
                    .values({ type: key.type, parentId: key.parentId, name: key.name, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );

        if (!result.created && !result.row.isActive) {
            const row = await this.db
                .updateTable('inventoryCategories')
                .set({ isActive: true, updatedAt: new Date() })
                .where('id', '=', result.row.id)
                .returningAll()
                .executeTakeFirstOrThrow();
            return { row, created: false };
        }
        return result;
    }

    async findCategory(key: CategoryKey): Promise<InventoryCategory | null> {
        const row = await this.findCategoryAnyState(key);
        return row && row.isActive ? row : null;
    }

    async findCategoryById(id: number): Promise<InventoryCategory | null> {
        const row = await this.db.selectFrom('inventoryCategories').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async listCategories(type: CategoryType, parentId: number | null): Promise<InventoryCategory[]> {
        let query = this.db
            .selectFrom('inventoryCategories')
            .selectAll()
            .where('isActive', '=', true)
            .where('type', '=', type);
        query = parentId === null ? query.where('parentId', 'is', null) : query.where('parentId', '=', parentId);
        return query.orderBy('name', 'asc').execute();
    }

    // ============================================
    // BED SIZES & THICKNESSES
    // ============================================

    async upsertBedSize(spec: BedSizeSpec): Promise<Upserted<BedSize>> {
        const result = await findOrInsert(
            () =>
                this.db
                    .selectFrom('bedSizes')
                    .selectAll()
                    .where('widthIn', '=', spec.widthIn)
                    .where('lengthIn', '=', spec.lengthIn)
                    .executeTakeFirst(),
            () =>
                this.db
                    .insertInto('bedSizes')
                    .values({ ...spec, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created) return result;

        const row = await this.db
            .updateTable('bedSizes')
            .set({
                label: spec.label,
                widthFtX100: spec.widthFtX100,
                lengthFtX100: spec.lengthFtX100,
                sortOrder: spec.sortOrder,
                isActive: true,
                updatedAt: new Date(),
            })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    async upsertThickness(inches: number, sortOrder: number): Promise<Upserted<FoamThickness>> {
        const result = await findOrInsert(
            () => this.db.selectFrom('foamThicknesses').selectAll().where('inches', '=', inches).executeTakeFirst(),
            () =>
                this.db
                    .insertInto('foamThicknesses')
                    .values({ inches, sortOrder, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created) return result;

        const row = await this.db
            .updateTable('foamThicknesses')
            .set({ sortOrder, isActive: true, updatedAt: new Date() })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    // ============================================
    // BRANDS & MODELS
    // ============================================

    async upsertBrand(name: string): Promise<Upserted<FoamBrand>> {
        const result = await findOrInsert(
            () =>
                this.db
                    .selectFrom('foamBrands')
                    .selectAll()
                    .where(lowerName, '=', name.toLowerCase())
                    .executeTakeFirst(),
            () =>
                this.db
                    .insertInto('foamBrands')
                    .values({ name, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created || result.row.isActive) return result;

        const row = await this.db
            .updateTable('foamBrands')
            .set({ isActive: true, updatedAt: new Date() })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    async upsertModel(brandId: number, name: string, notes?: string | null): Promise<Upserted<FoamModel>> {
        const result = await findOrInsert(
            () =>
                this.db
                    .selectFrom('foamModels')
                    .selectAll()
                    .where('brandId', '=', brandId)
                    .where(lowerName, '=', name.toLowerCase())
                    .executeTakeFirst(),
            () =>
                this.db
                    .insertInto('foamModels')
                    .values({ brandId, name, notes: notes ?? null, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created) return result;
        if (result.row.isActive && notes === undefined) return result;

        const row = await this.db
            .updateTable('foamModels')
            .set({ isActive: true, notes, updatedAt: new Date() })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    // ============================================
    // READS
    // ============================================

    async listBedSizes(): Promise<BedSize[]> {
        return this.db
            .selectFrom('bedSizes')
            .selectAll()
            .where('isActive', '=', true)
            .orderBy('sortOrder', 'asc')
            .orderBy('widthIn', 'asc')
            .execute();
    }

    async listThicknesses(): Promise<FoamThickness[]> {
        return this.db
            .selectFrom('foamThicknesses')
            .selectAll()
            .where('isActive', '=', true)
            .orderBy('sortOrder', 'asc')
            .orderBy('inches', 'asc')
            .execute();
    }

    async listBrands(): Promise<FoamBrand[]> {
        return this.db.selectFrom('foamBrands').selectAll().where('isActive', '=', true).orderBy('name', 'asc').execute();
    }

    async listModels(brandId: number | null): Promise<FoamModel[]> {
        let query = this.db.selectFrom('foamModels').selectAll().where('isActive', '=', true);
        if (brandId !== null) {
            query = query.where('brandId', '=', brandId);
        }
        return query.orderBy('brandId', 'asc').orderBy('name', 'asc').execute();
    }

    async findBedSize(id: number): Promise<BedSize | null> {
        return (await this.db.selectFrom('bedSizes').selectAll().where('id', '=', id).executeTakeFirst()) ?? null;
    }

    async findThickness(id: number): Promise<FoamThickness | null> {
        return (await this.db.selectFrom('foamThicknesses').selectAll().where('id', '=', id).executeTakeFirst()) ?? null;
    }

    async findBrand(id: number): Promise<FoamBrand | null> {
        return (await this.db.selectFrom('foamBrands').selectAll().where('id', '=', id).executeTakeFirst()) ?? null;
    }

    async findModel(id: number): Promise<FoamModel | null> {
        return (await this.db.selectFrom('foamModels').selectAll().where('id', '=', id).executeTakeFirst()) ?? null;
    }
}
