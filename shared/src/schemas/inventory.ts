/**
 * Inventory Zod Schemas
 *
 * Furniture, foam, sofa, hardware and poshish inputs plus stock adjustment.
 */

import { z } from 'zod';
import {
  DEFAULT_HARDWARE_UNIT,
  DEFAULT_MATERIAL_TYPE,
  DEFAULT_POSHISH_UNIT,
  FURNITURE_STATUSES,
  INVENTORY_KINDS,
  LIST_LIMITS,
} from '../domain/constants.js';
import { STOCK_DIRECTIONS } from '../domain/inventory/stockTargets.js';
import {
  idSchema,
  moneySchema,
  optionalTextSchema,
  queryLimitSchema,
  queryTextSchema,
  requiredTextSchema,
} from './common.js';

/** Quantity on hand may go negative through adjustments; entry forms start it anywhere */
const quantitySchema = z.number().int();
const reorderLevelSchema = z.number().int().nonnegative();

// ============================================
// STOCK ADJUSTMENT
// ============================================

export const InventoryKindSchema = z.enum(INVENTORY_KINDS);

/** Raw `(inventory_type, variant_id)` pair → StockTarget */
export const StockTargetSchema = z.object({ kind: InventoryKindSchema, id: idSchema });

export const AdjustStockSchema = z.object({
  kind: InventoryKindSchema,
  itemId: idSchema,
  delta: z.number().int(),
  label: z.string().trim().min(1).max(32).default('Adjustment'),
  note: optionalTextSchema,
  unitCost: moneySchema.nullable().optional(),
});
export type AdjustStockInput = z.infer<typeof AdjustStockSchema>;

/** Form-style adjustment: direction plus a positive quantity */
export const StockFormSchema = z.object({
  kind: InventoryKindSchema,
  itemId: idSchema,
  direction: z.enum(STOCK_DIRECTIONS).default('in'),
  quantity: z.number().int(),
  notes: optionalTextSchema,
});
export type StockFormInput = z.infer<typeof StockFormSchema>;

export const StockMovementQuerySchema = z.object({
  limit: queryLimitSchema(LIST_LIMITS.stockMovements, LIST_LIMITS.stockMovementsMax),
});

// ============================================
// FURNITURE
// ============================================

export const CreateFurnitureItemSchema = z.object({
  name: requiredTextSchema,
  sku: optionalTextSchema,
  materialType: z.string().trim().min(1).default(DEFAULT_MATERIAL_TYPE),
  colorFinish: optionalTextSchema,
  status: z.enum(FURNITURE_STATUSES).default('IN_STOCK'),
  categoryId: idSchema,
  subCategoryId: idSchema.nullable().optional(),
  notes: optionalTextSchema,
});
export type CreateFurnitureItemInput = z.infer<typeof CreateFurnitureItemSchema>;

export const UpdateFurnitureItemSchema = CreateFurnitureItemSchema.omit({ sku: true }).partial();
export type UpdateFurnitureItemInput = z.infer<typeof UpdateFurnitureItemSchema>;

export const FurnitureVariantSchema = z.object({
  /** null = custom size */
  bedSizeId: idSchema.nullable().default(null),
  qtyOnHand: quantitySchema.default(0),
  reorderLevel: reorderLevelSchema.default(0),
  costPrice: moneySchema.default(0),
  salePrice: moneySchema.default(0),
});
export type FurnitureVariantInput = z.infer<typeof FurnitureVariantSchema>;

/** Item fields + one variant; `itemId` updates an existing item instead of creating one */
export const SaveFurnitureSchema = CreateFurnitureItemSchema.extend({
  itemId: idSchema.optional(),
  variant: FurnitureVariantSchema,
});
export type SaveFurnitureInput = z.infer<typeof SaveFurnitureSchema>;

export const FurnitureListQuerySchema = z.object({
  q: queryTextSchema,
  categoryId: idSchema.optional().catch(undefined),
  category: queryTextSchema,
  limit: queryLimitSchema(LIST_LIMITS.inventoryList, LIST_LIMITS.inventory),
});
export type FurnitureListQuery = z.infer<typeof FurnitureListQuerySchema>;

// ============================================
// FOAM
// ============================================

export const CreateFoamModelSchema = z.object({
  brandId: idSchema,
  name: requiredTextSchema,
  notes: optionalTextSchema,
});
export type CreateFoamModelInput = z.infer<typeof CreateFoamModelSchema>;

export const FoamVariantSchema = z.object({
  foamModelId: idSchema,
  bedSizeId: idSchema,
  thicknessId: idSchema,
  densityType: optionalTextSchema,
  qtyOnHand: quantitySchema.default(0),
  reorderLevel: reorderLevelSchema.default(0),
  purchaseCost: moneySchema.default(0),
  salePrice: moneySchema.default(0),
});
export type FoamVariantInput = z.infer<typeof FoamVariantSchema>;

/** Form save: model found or created by (brand, name), then the variant upserted */
export const SaveFoamSchema = FoamVariantSchema.omit({ foamModelId: true }).extend({
  brandId: idSchema,
  modelName: requiredTextSchema,
  modelNotes: optionalTextSchema,
});
export type SaveFoamInput = z.infer<typeof SaveFoamSchema>;

export const FoamListQuerySchema = z.object({
  q: queryTextSchema,
  brandId: idSchema.optional().catch(undefined),
  limit: queryLimitSchema(LIST_LIMITS.inventoryList, LIST_LIMITS.inventory),
});
export type FoamListQuery = z.infer<typeof FoamListQuerySchema>;

// ============================================
// SOFA / HARDWARE / POSHISH
// ============================================

const stockFields = {
  qtyOnHand: quantitySchema.default(0),
  reorderLevel: reorderLevelSchema.default(0),
  costPrice: moneySchema.default(0),
  salePrice: moneySchema.default(0),
  notes: optionalTextSchema,
};

export const CreateSofaItemSchema = z.object({
  name: requiredTextSchema,
  sofaType: requiredTextSchema,
  hardwareMaterial: optionalTextSchema,
  poshishMaterial: optionalTextSchema,
  seatingCapacity: optionalTextSchema,
  ...stockFields,
});
export type CreateSofaItemInput = z.infer<typeof CreateSofaItemSchema>;

export const CreateHardwareMaterialSchema = z.object({
  name: requiredTextSchema,
  unit: z.string().trim().min(1).default(DEFAULT_HARDWARE_UNIT),
  ...stockFields,
});
export type CreateHardwareMaterialInput = z.infer<typeof CreateHardwareMaterialSchema>;

export const CreatePoshishMaterialSchema = z.object({
  name: requiredTextSchema,
  color: optionalTextSchema,
  unit: z.string().trim().min(1).default(DEFAULT_POSHISH_UNIT),
  ...stockFields,
});
export type CreatePoshishMaterialInput = z.infer<typeof CreatePoshishMaterialSchema>;

/** Updates never touch quantity; that goes through stock adjustment */
export const UpdateSofaItemSchema = CreateSofaItemSchema.omit({ qtyOnHand: true }).partial();
export type UpdateSofaItemInput = z.infer<typeof UpdateSofaItemSchema>;

export const UpdateHardwareMaterialSchema = CreateHardwareMaterialSchema.omit({ qtyOnHand: true }).partial();
export type UpdateHardwareMaterialInput = z.infer<typeof UpdateHardwareMaterialSchema>;

export const UpdatePoshishMaterialSchema = CreatePoshishMaterialSchema.omit({ qtyOnHand: true }).partial();
export type UpdatePoshishMaterialInput = z.infer<typeof UpdatePoshishMaterialSchema>;

export const NameSearchQuerySchema = z.object({
  q: queryTextSchema,
  limit: queryLimitSchema(LIST_LIMITS.inventoryList, LIST_LIMITS.inventory),
});
export type NameSearchQuery = z.infer<typeof NameSearchQuerySchema>;
