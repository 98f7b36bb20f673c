/**
 * Kysely Foam Repository
 *
 * Foam variants keyed by (model, bed size, thickness). Card and history
 * reads hydrate the model, brand, size and thickness of each variant with
 * one query per table.
 */

import type {
    BedSize,
    FoamBrand,
    FoamModel,
    FoamThickness,
    FoamVariant,
} from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type {
    FoamCardFilter,
    FoamRepository,
    FoamVariantDetail,
    FoamVariantFields,
    FoamVariantKey,
    Upserted,
} from '../store.js';
import { containsPattern, findOrInsert, lowStockCondition } from './sqlHelpers.js';

function uniqueIds(values: readonly number[]): number[] {
    return [...new Set(values)];
}

export class KyselyFoamRepository implements FoamRepository {
    constructor(private readonly db: KyselyDB) {}

    async findVariant(id: number): Promise<FoamVariant | null> {
        const row = await this.db.selectFrom('foamVariants').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async upsertVariant(key: FoamVariantKey, fields: FoamVariantFields): Promise<Upserted<FoamVariant>> {
        const result = await findOrInsert(
            () =>
                this.db
                    .selectFrom('foamVariants')
                    .selectAll()
                    .where('foamModelId', '=', key.foamModelId)
                    .where('bedSizeId', '=', key.bedSizeId)
                    .where('thicknessId', '=', key.thicknessId)
                    .executeTakeFirst(),
            () =>
                this.db
                    .insertInto('foamVariants')
                    .values({ ...key, ...fields, isActive: true })
                    .onConflict((oc) => oc.doNothing())
                    .returningAll()
                    .executeTakeFirst()
        );
        if (result.created) return result;

        const row = await this.db
            .updateTable('foamVariants')
            .set({ ...fields, isActive: true, updatedAt: new Date() })
            .where('id', '=', result.row.id)
            .returningAll()
            .executeTakeFirstOrThrow();
        return { row, created: false };
    }

    async listVariants(modelId: number): Promise<FoamVariant[]> {
        return this.db
            .selectFrom('foamVariants')
            .selectAll()
            .where('foamModelId', '=', modelId)
            .where('isActive', '=', true)
            .orderBy('bedSizeId', 'asc')
            .orderBy('thicknessId', 'asc')
            .execute();
    }

    async cards(filter: FoamCardFilter): Promise<FoamVariantDetail[]> {
        let query = this.db
            .selectFrom('foamVariants')
            .innerJoin('foamModels', 'foamModels.id', 'foamVariants.foamModelId')
            .innerJoin('foamBrands', 'foamBrands.id', 'foamModels.brandId')
            .selectAll('foamVariants')
            .where('foamVariants.isActive', '=', true)
            .where('foamModels.isActive', '=', true)
            .where('foamBrands.isActive', '=', true);

        if (filter.brandId !== null) {
            query = query.where('foamModels.brandId', '=', filter.brandId);
        }
        if (filter.q !== null) {
            query = query.where('foamModels.name', 'ilike', containsPattern(filter.q));
        }

        const variants = await query
            .orderBy('foamVariants.qtyOnHand', 'asc')
            .orderBy('foamVariants.id', 'desc')
            .limit(filter.limit)
            .execute();
        return this.hydrate(variants);
    }

    async variantDetails(variantIds: readonly number[]): Promise<FoamVariantDetail[]> {
        if (variantIds.length === 0) return [];
        const variants = await this.db
            .selectFrom('foamVariants')
            .selectAll()
            .where('id', 'in', [...variantIds])
            .execute();
        return this.hydrate(variants);
    }

    async deactivateModel(modelId: number): Promise<boolean> {
        const result = await this.db
            .updateTable('foamModels')
            .set({ isActive: false, updatedAt: new Date() })
            .where('id', '=', modelId)
            .executeTakeFirst();
        if (result.numUpdatedRows === 0n) return false;

        await this.db
            .updateTable('foamVariants')
            .set({ isActive: false, updatedAt: new Date() })
            .where('foamModelId', '=', modelId)
            .execute();
        return true;
    }

    async lowStock(limit: number): Promise<FoamVariant[]> {
        return this.db
            .selectFrom('foamVariants')
            .selectAll()
            .where('isActive', '=', true)
            .where(lowStockCondition())
            .orderBy('qtyOnHand', 'asc')
            .orderBy('id', 'asc')
            .limit(limit)
            .execute();
    }

    /** Attach model, brand, size and thickness; variants missing any of them are dropped */
    private async hydrate(variants: FoamVariant[]): Promise<FoamVariantDetail[]> {
        if (variants.length === 0) return [];

        const models: FoamModel[] = await this.db
            .selectFrom('foamModels')
            .selectAll()
            .where('id', 'in', uniqueIds(variants.map((v) => v.foamModelId)))
            .execute();
        const brands: FoamBrand[] =
            models.length === 0
                ? []
                : await this.db
                      .selectFrom('foamBrands')
                      .selectAll()
                      .where('id', 'in', uniqueIds(models.map((m) => m.brandId)))
                      .execute();
        const sizes: BedSize[] = await this.db
            .selectFrom('bedSizes')
            .selectAll()
            .where('id', 'in', uniqueIds(variants.map((v) => v.bedSizeId)))
            .execute();
        const thicknesses: FoamThickness[] = await this.db
            .selectFrom('foamThicknesses')
            .selectAll()
            .where('id', 'in', uniqueIds(variants.map((v) => v.thicknessId)))
            .execute();

        const modelById = new Map(models.map((m) => [m.id, m]));
        const brandById = new Map(brands.map((b) => [b.id, b]));
        const sizeById = new Map(sizes.map((s) => [s.id, s]));
        const thicknessById = new Map(thicknesses.map((t) => [t.id, t]));

        return variants.flatMap((variant) => {
            const model = modelById.get(variant.foamModelId);
            const brand = model ? brandById.get(model.brandId) : undefined;
            const bedSize = sizeById.get(variant.bedSizeId);
            const thickness = thicknessById.get(variant.thicknessId);
            if (!model || !brand || !bedSize || !thickness) return [];
            return [{ variant, model, brand, bedSize, thickness }];
        });
    }
}
