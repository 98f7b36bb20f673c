/**
 * Kysely repositories for flat stocked items: sofas, hardware and
 * poshish (upholstery) materials. Each row carries its own quantity;
 * there are no variants.
 */

import type { HardwareMaterial, PoshishMaterial, SofaItem } from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type {
    NewHardwareMaterial,
    NewPoshishMaterial,
    NewSofaItem,
    StockedItemChanges,
    StockedItemRepository,
} from '../store.js';
import { containsPattern } from './sqlHelpers.js';

// ============================================
// SOFAS
// ============================================

export class KyselySofaRepository implements StockedItemRepository<SofaItem, NewSofaItem> {
    constructor(private readonly db: KyselyDB) {}

    async create(data: NewSofaItem): Promise<SofaItem> {
        return this.db
            .insertInto('sofaItems')
            .values({ ...data, isActive: true })
            .returningAll()
            .executeTakeFirstOrThrow();
    }

    async update(id: number, data: StockedItemChanges<NewSofaItem>): Promise<SofaItem | null> {
        const row = await this.db
            .updateTable('sofaItems')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }

    async findById(id: number): Promise<SofaItem | null> {
        return (await this.db.selectFrom('sofaItems').selectAll().where('id', '=', id).executeTakeFirst()) ?? null;
    }

    async findByIds(ids: readonly number[]): Promise<SofaItem[]> {
        if (ids.length === 0) return [];
        return this.db.selectFrom('sofaItems').selectAll().where('id', 'in', [...ids]).execute();
    }

    async list(q: string | null, limit: number): Promise<SofaItem[]> {
        let query = this.db.selectFrom('sofaItems').selectAll().where('isActive', '=', true);
        if (q !== null) {
            query = query.where('name', 'ilike', containsPattern(q));
        }
        return query.orderBy('id', 'desc').limit(limit).execute();
    }

    async deactivate(id: number): Promise<boolean> {
        const result = await this.db
            .updateTable('sofaItems')
            .set({ isActive: false, updatedAt: new Date() })
            .where('id', '=', id)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }
}

// ============================================
// HARDWARE
// ============================================

export class KyselyHardwareRepository implements StockedItemRepository<HardwareMaterial, NewHardwareMaterial> {
    constructor(private readonly db: KyselyDB) {}

    async create(data: NewHardwareMaterial): Promise<HardwareMaterial> {
        return this.db
            .insertInto('hardwareMaterials')
            .values({ ...data, isActive: true })
            .returningAll()
            .executeTakeFirstOrThrow();
    }

    async update(id: number, data: StockedItemChanges<NewHardwareMaterial>): Promise<HardwareMaterial | null> {
        const row = await this.db
            .updateTable('hardwareMaterials')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }

    async findById(id: number): Promise<HardwareMaterial | null> {
        return (
            (await this.db.selectFrom('hardwareMaterials').selectAll().where('id', '=', id).executeTakeFirst()) ?? null
        );
    }

    async findByIds(ids: readonly number[]): Promise<HardwareMaterial[]> {
        if (ids.length === 0) return [];
        return this.db.selectFrom('hardwareMaterials').selectAll().where('id', 'in', [...ids]).execute();
    }

    async list(q: string | null, limit: number): Promise<HardwareMaterial[]> {
        let query = this.db.selectFrom('hardwareMaterials').selectAll().where('isActive', '=', true);
        if (q !== null) {
            query = query.where('name', 'ilike', containsPattern(q));
        }
        return query.orderBy('id', 'desc').limit(limit).execute();
    }

    async deactivate(id: number): Promise<boolean> {
        const result = await this.db
            .updateTable('hardwareMaterials')
            .set({ isActive: false, updatedAt: new Date() })
            .where('id', '=', id)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }
}

// ============================================
// POSHISH
// ============================================

export class KyselyPoshishRepository implements StockedItemRepository<PoshishMaterial, NewPoshishMaterial> {
    constructor(private readonly db: KyselyDB) {}

    async create(data: NewPoshishMaterial): Promise<PoshishMaterial> {
        return this.db
            .insertInto('poshishMaterials')
            .values({ ...data, isActive: true })
            .returningAll()
            .executeTakeFirstOrThrow();
    }

    async update(id: number, data: StockedItemChanges<NewPoshishMaterial>): Promise<PoshishMaterial | null> {
        const row = await this.db
            .updateTable('poshishMaterials')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }

    async findById(id: number): Promise<PoshishMaterial | null> {
        return (
            (await this.db.selectFrom('poshishMaterials').selectAll().where('id', '=', id).executeTakeFirst()) ?? null
        );
    }

    async findByIds(ids: readonly number[]): Promise<PoshishMaterial[]> {
        if (ids.length === 0) return [];
        return this.db.selectFrom('poshishMaterials').selectAll().where('id', 'in', [...ids]).execute();
    }

    async list(q: string | null, limit: number): Promise<PoshishMaterial[]> {
        let query = this.db.selectFrom('poshishMaterials').selectAll().where('isActive', '=', true);
        if (q !== null) {
            query = query.where('name', 'ilike', containsPattern(q));
        }
        return query.orderBy('id', 'desc').limit(limit).execute();
    }

    async deactivate(id: number): Promise<boolean> {
        const result = await this.db
            .updateTable('poshishMaterials')
            .set({ isActive: false, updatedAt: new Date() })
            .where('id', '=', id)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }
}
