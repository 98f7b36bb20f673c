/**
 * Database schema types for Kysely
 *
 * Hand-maintained to match migrations/. Identifiers are camelCase here and
 * snake_case in Postgres (CamelCasePlugin). DATE columns come back as
 * `YYYY-MM-DD` strings (see kysely.ts type parser).
 */

import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';
import type {
    AssignmentStatus,
    CategoryType,
    EmployeeStatus,
    EmployeeTxType,
    FurnitureStatus,
    InventoryKind,
    TxType,
} from '@workshop-ledger/shared';

/** Set by the column default, never written */
type CreatedAt = ColumnType<Date, never, never>;
/** Set by the column default, bumped on update */
type UpdatedAt = ColumnType<Date, never, Date>;

interface Timestamps {
    createdAt: CreatedAt;
    updatedAt: UpdatedAt;
}

interface StockColumns {
    qtyOnHand: Generated<number>;
    reorderLevel: Generated<number>;
    salePrice: Generated<number>;
    isActive: Generated<boolean>;
}

// ============================================
// LEDGER
// ============================================

export interface TransactionsTable extends Timestamps {
    id: Generated<number>;
    type: TxType;
    date: string;
    amount: number;
    category: string;
    name: string | null;
    billNo: string | null;
    notes: string | null;
    employeeId: number | null;
    employeeTxType: EmployeeTxType | null;
    paymentMethod: string | null;
    assignmentId: number | null;
    reference: string | null;
    isDeleted: Generated<boolean>;
}

export interface EmployeesTable extends Timestamps {
    id: Generated<number>;
    fullName: string;
    fatherName: string | null;
    cnic: string | null;
    mobileNumber: string | null;
    address: string | null;
    emergencyContact: string | null;
    joiningDate: string;
    status: EmployeeStatus;
    category: string;
    workType: string;
    roleDescription: string | null;
    paymentRate: number | null;
}

export interface WeeklyAssignmentsTable extends Timestamps {
    id: Generated<number>;
    employeeId: number;
    weekStart: string;
    weekEnd: string;
    description: string;
    quantity: number | null;
    status: AssignmentStatus;
    isLocked: Generated<boolean>;
}

// ============================================
// REFERENCE CATALOG
// ============================================

export interface InventoryCategoriesTable extends Timestamps {
    id: Generated<number>;
    type: CategoryType;
    name: string;
    parentId: number | null;
    isActive: Generated<boolean>;
}

export interface BedSizesTable extends Timestamps {
    id: Generated<number>;
    label: string;
    widthIn: number;
    lengthIn: number;
    widthFtX100: number | null;
    lengthFtX100: number | null;
    sortOrder: Generated<number>;
    isActive: Generated<boolean>;
}

export interface FoamThicknessesTable extends Timestamps {
    id: Generated<number>;
    inches: number;
    sortOrder: Generated<number>;
    isActive: Generated<boolean>;
}

export interface FoamBrandsTable extends Timestamps {
    id: Generated<number>;
    name: string;
    isActive: Generated<boolean>;
}

export interface FoamModelsTable extends Timestamps {
    id: Generated<number>;
    brandId: number;
    name: string;
    notes: string | null;
    isActive: Generated<boolean>;
}

// ============================================
// STOCKED ITEMS
// ============================================

export interface FurnitureItemsTable extends Timestamps {
    id: Generated<number>;
    name: string;
    sku: string;
    materialType: string;
    colorFinish: string | null;
    status: FurnitureStatus;
    categoryId: number;
    subCategoryId: number | null;
    notes: string | null;
    isActive: Generated<boolean>;
}

export interface FurnitureVariantsTable extends StockColumns, Timestamps {
    id: Generated<number>;
    furnitureItemId: number;
    bedSizeId: number | null;
    costPrice: Generated<number>;
}

export interface FoamVariantsTable extends StockColumns, Timestamps {
    id: Generated<number>;
    foamModelId: number;
    bedSizeId: number;
    thicknessId: number;
    densityType: string | null;
    purchaseCost: Generated<number>;
}

export interface SofaItemsTable extends StockColumns, Timestamps {
    id: Generated<number>;
    name: string;
    sofaType: string;
    hardwareMaterial: string | null;
    poshishMaterial: string | null;
    seatingCapacity: string | null;
    costPrice: Generated<number>;
    notes: string | null;
}

export interface HardwareMaterialsTable extends StockColumns, Timestamps {
    id: Generated<number>;
    name: string;
    unit: string;
    costPrice: Generated<number>;
    notes: string | null;
}

export interface PoshishMaterialsTable extends StockColumns, Timestamps {
    id: Generated<number>;
    name: string;
    color: string | null;
    unit: string;
    costPrice: Generated<number>;
    notes: string | null;
}

export interface StockMovementsTable {
    id: Generated<number>;
    inventoryType: InventoryKind;
    variantId: number;
    movementType: string;
    qtyChange: number;
    unitCost: number | null;
    referenceType: string | null;
    referenceId: number | null;
    notes: string | null;
    createdAt: CreatedAt;
}

// ============================================
// DATABASE
// ============================================

export interface Database {
    transactions: TransactionsTable;
    employees: EmployeesTable;
    weeklyAssignments: WeeklyAssignmentsTable;
    inventoryCategories: InventoryCategoriesTable;
    bedSizes: BedSizesTable;
    foamThicknesses: FoamThicknessesTable;
    foamBrands: FoamBrandsTable;
    foamModels: FoamModelsTable;
    furnitureItems: FurnitureItemsTable;
    furnitureVariants: FurnitureVariantsTable;
    foamVariants: FoamVariantsTable;
    sofaItems: SofaItemsTable;
    hardwareMaterials: HardwareMaterialsTable;
    poshishMaterials: PoshishMaterialsTable;
    stockMovements: StockMovementsTable;
}

/** Tables whose rows carry qty_on_hand, keyed by the StockMovement kind */
export const STOCK_TABLES = {
    FURNITURE_VARIANT: 'furnitureVariants',
    FOAM_VARIANT: 'foamVariants',
    SOFA_ITEM: 'sofaItems',
    HARDWARE_MATERIAL: 'hardwareMaterials',
    POSHISH_MATERIAL: 'poshishMaterials',
} as const satisfies Record<InventoryKind, keyof Database>;

export type StockTableName = (typeof STOCK_TABLES)[InventoryKind];

export type NewTransactionRow = Insertable<TransactionsTable>;
export type TransactionRowUpdate = Updateable<TransactionsTable>;
export type EmployeeRow = Selectable<EmployeesTable>;
