/**
 * Entity types
 *
 * Row shapes as they come out of the store. Columns are snake_case in
 * Postgres and camelCase here (Kysely CamelCasePlugin does the mapping).
 * Calendar dates are `YYYY-MM-DD` strings; timestamps are Date objects.
 */

import type {
    AssignmentStatus,
    CategoryType,
    EmployeeStatus,
    EmployeeTxType,
    FurnitureStatus,
    InventoryKind,
    TxType,
} from '../domain/constants.js';

interface Timestamps {
    createdAt: Date;
    updatedAt: Date;
}

// ============================================
// LEDGER
// ============================================

export interface Transaction extends Timestamps {
    id: number;
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
    isDeleted: boolean;
}

export interface Employee extends Timestamps {
    id: number;
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

export interface WeeklyAssignment extends Timestamps {
    id: number;
    employeeId: number;
    weekStart: string;
    weekEnd: string;
    description: string;
    quantity: number | null;
    status: AssignmentStatus;
    isLocked: boolean;
}

// ============================================
// REFERENCE CATALOG
// ============================================

export interface InventoryCategory extends Timestamps {
    id: number;
    type: CategoryType;
    name: string;
    parentId: number | null;
    isActive: boolean;
}

export interface BedSize extends Timestamps {
    id: number;
    label: string;
    widthIn: number;
    lengthIn: number;
    widthFtX100: number | null;
    lengthFtX100: number | null;
    sortOrder: number;
    isActive: boolean;
}

export interface FoamThickness extends Timestamps {
    id: number;
    inches: number;
    sortOrder: number;
    isActive: boolean;
}

export interface FoamBrand extends Timestamps {
    id: number;
    name: string;
    isActive: boolean;
}

export interface FoamModel extends Timestamps {
    id: number;
    brandId: number;
    name: string;
    notes: string | null;
    isActive: boolean;
}

// ============================================
// STOCKED ITEMS
// ============================================

/** Fields every quantity-tracked row carries */
export interface StockFields {
    qtyOnHand: number;
    reorderLevel: number;
    salePrice: number;
    isActive: boolean;
}

export interface FurnitureItem extends Timestamps {
    id: number;
    name: string;
    sku: string;
    materialType: string;
    colorFinish: string | null;
    status: FurnitureStatus;
    categoryId: number;
    subCategoryId: number | null;
    notes: string | null;
    isActive: boolean;
}

export interface FurnitureVariant extends StockFields, Timestamps {
    id: number;
    furnitureItemId: number;
    bedSizeId: number | null;
    costPrice: number;
}

export interface FoamVariant extends StockFields, Timestamps {
    id: number;
    foamModelId: number;
    bedSizeId: number;
    thicknessId: number;
    densityType: string | null;
    purchaseCost: number;
}

export interface SofaItem extends StockFields, Timestamps {
    id: number;
    name: string;
    sofaType: string;
    hardwareMaterial: string | null;
    poshishMaterial: string | null;
    seatingCapacity: string | null;
    costPrice: number;
    notes: string | null;
}

export interface HardwareMaterial extends StockFields, Timestamps {
    id: number;
    name: string;
    unit: string;
    costPrice: number;
    notes: string | null;
}

export interface PoshishMaterial extends StockFields, Timestamps {
    id: number;
    name: string;
    color: string | null;
    unit: string;
    costPrice: number;
    notes: string | null;
}

/** Append-only audit row; `(inventoryType, variantId)` names the stocked row */
export interface StockMovement {
    id: number;
    inventoryType: InventoryKind;
    variantId: number;
    movementType: string;
    qtyChange: number;
    unitCost: number | null;
    referenceType: string | null;
    referenceId: number | null;
    notes: string | null;
    createdAt: Date;
}
