/**
 * Catalog Seeder
 *
 * Makes sure the reference catalog (categories, bed sizes, thicknesses,
 * brands, models) exists. Every entry is a natural-key upsert, so running it
 * again changes nothing and keeps the same ids.
 *
 * CatalogGuard runs it once per process at startup; the admin seed endpoint
 * calls ensureCatalog directly.
 */

import type { Store, Upserted } from '../db/store.js';
import { INVENTORY_CATALOG, type InventoryCatalog } from '../config/inventory/catalog.js';
import { catalogLogger } from '../utils/logger.js';

export interface SeedSummary {
    created: number;
    existing: number;
}

class SeedTally {
    created = 0;
    existing = 0;

    count<T>(result: Upserted<T>): T {
        if (result.created) this.created++;
        else this.existing++;
        return result.row;
    }

    summary(): SeedSummary {
        return { created: this.created, existing: this.existing };
    }
}

export async function ensureCatalog(store: Store, catalog: InventoryCatalog = INVENTORY_CATALOG): Promise<SeedSummary> {
    const summary = await store.transaction(async (tx) => {
        const tally = new SeedTally();

        for (const root of catalog.categories) {
            const rootRow = tally.count(
                await tx.catalog.upsertCategory({ type: root.type, parentId: null, name: root.name })
            );
            for (const child of root.children) {
                const childRow = tally.count(
                    await tx.catalog.upsertCategory({ type: root.type, parentId: rootRow.id, name: child.name })
                );
                for (const leaf of child.children) {
                    tally.count(await tx.catalog.upsertCategory({ type: root.type, parentId: childRow.id, name: leaf }));
                }
            }
        }

        for (const size of catalog.bedSizes) {
            tally.count(await tx.catalog.upsertBedSize(size));
        }

        for (const [index, inches] of catalog.thicknesses.entries()) {
            tally.count(await tx.catalog.upsertThickness(inches, index + 1));
        }

        for (const brand of catalog.brands) {
            const brandRow = tally.count(await tx.catalog.upsertBrand(brand.name));
            for (const model of brand.models) {
                tally.count(await tx.catalog.upsertModel(brandRow.id, model));
            }
        }

        return tally.summary();
    });

    catalogLogger.info(summary, 'Reference catalog ensured');
    return summary;
}

// ============================================
// STARTUP GUARD
// ============================================

/**
 * Runs ensureCatalog at most once per process. A failed run is forgotten so
 * the next call retries.
 */
export class CatalogGuard {
    private pending: Promise<SeedSummary> | null = null;

    constructor(private readonly catalog: InventoryCatalog = INVENTORY_CATALOG) {}

    ensure(store: Store): Promise<SeedSummary> {
        if (!this.pending) {
            this.pending = ensureCatalog(store, this.catalog).catch((error: unknown) => {
                this.pending = null;
                throw error;
            });
        }
        return this.pending;
    }
}

export const catalogGuard = new CatalogGuard();
