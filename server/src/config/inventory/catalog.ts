/**
 * Inventory Reference Catalog
 *
 * Starter catalog ensured at startup: category tree, bed sizes, foam
 * thicknesses, brands and their models. The data lives in catalog.json and
 * is validated here once at import.
 *
 * TO CHANGE THE CATALOG:
 * 1. Edit catalog.json (entries are matched by natural key, never by id)
 * 2. Restart the server or call POST /api/admin/seed
 *
 * Removing an entry does not deactivate rows that already exist.
 */

import { z } from 'zod';
import { CATEGORY_TYPES } from '@workshop-ledger/shared';
import catalogJson from './catalog.json' with { type: 'json' };

// ============================================
// SCHEMA
// ============================================

const SubCategorySchema = z.object({
    name: z.string().min(1),
    /** Third level, e.g. Bed Set → Cushion Bed Set */
    children: z.array(z.string().min(1)).default([]),
});

const RootCategorySchema = z.object({
    type: z.enum(CATEGORY_TYPES),
    name: z.string().min(1),
    children: z.array(SubCategorySchema).default([]),
});

const BedSizeSchema = z.object({
    label: z.string().min(1),
    widthIn: z.number().int().nonnegative(),
    lengthIn: z.number().int().nonnegative(),
    widthFtX100: z.number().int().positive().nullable(),
    lengthFtX100: z.number().int().positive().nullable(),
    sortOrder: z.number().int(),
});

const BrandSchema = z.object({
    name: z.string().min(1),
    models: z.array(z.string().min(1)).default([]),
});

export const InventoryCatalogSchema = z.object({
    categories: z.array(RootCategorySchema),
    bedSizes: z.array(BedSizeSchema),
    /** Inches; sort order follows array position starting at 1 */
    thicknesses: z.array(z.number().int().positive()),
    brands: z.array(BrandSchema),
});

export type InventoryCatalog = z.infer<typeof InventoryCatalogSchema>;
export type RootCategorySpec = z.infer<typeof RootCategorySchema>;

// ============================================
// DATA
// ============================================

export const INVENTORY_CATALOG: InventoryCatalog = InventoryCatalogSchema.parse(catalogJson);
