/**
 * Domain Constants
 *
 * Business constants shared across packages: transaction types and categories,
 * employee classifications, inventory kinds and stock thresholds.
 * Change here → takes effect everywhere.
 */

// ============================================
// CASH TRANSACTIONS
// ============================================

export const TX_TYPES = ['incoming', 'outgoing'] as const;
export type TxType = (typeof TX_TYPES)[number];

/** Sources of money coming into the workshop */
export const INCOMING_CATEGORIES = [
    'Client',
    'Advance Booking',
    'Scrap Sale',
    'Owner Investment',
    'Other Income',
] as const;

/** Where money goes out. The first four are employee payout categories. */
export const OUTGOING_CATEGORIES = [
    'Employee',
    'Karkhanay Wala',
    'Polish Wala',
    'Poshish Wala',
    'Wood Supplier',
    'Foam Supplier',
    'Hardware Supplier',
    'Poshish Supplier',
    'Rent',
    'Utilities',
    'Transport',
    'Food',
    'Other Expense',
] as const;

/** Incoming category that requires a bill number */
export const BILLED_INCOMING_CATEGORY = 'Client';

export const PAYMENT_METHODS = ['cash', 'bank_transfer', 'easypaisa', 'jazzcash', 'cheque'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export function isTxType(value: unknown): value is TxType {
    return typeof value === 'string' && (TX_TYPES as readonly string[]).includes(value);
}

// ============================================
// EMPLOYEES
// ============================================

export const EMPLOYEE_STATUSES = ['active', 'inactive'] as const;
export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

export const EMPLOYEE_CATEGORIES = [
    'Factory Worker (Karkhanay Wala)',
    'Polish Worker',
    'Upholstery / Poshish Worker',
    'Helper / Mazdoor',
    'Office Staff',
] as const;

export const EMPLOYEE_WORK_TYPES = ['daily', 'weekly', 'monthly', 'per_work'] as const;
export type EmployeeWorkType = (typeof EMPLOYEE_WORK_TYPES)[number];

/**
 * How an outgoing payment relates to an employee.
 * `advance` increases what the employee owes; the others pay it down.
 */
export const EMPLOYEE_TX_TYPES = ['advance', 'salary', 'per_work'] as const;
export type EmployeeTxType = (typeof EMPLOYEE_TX_TYPES)[number];

export const ASSIGNMENT_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export type AssignmentStatus = (typeof ASSIGNMENT_STATUSES)[number];

// ============================================
// INVENTORY
// ============================================

export const CATEGORY_TYPES = ['FURNITURE', 'FOAM'] as const;
export type CategoryType = (typeof CATEGORY_TYPES)[number];

export const FURNITURE_STATUSES = ['IN_STOCK', 'OUT_OF_STOCK', 'MADE_TO_ORDER'] as const;
export type FurnitureStatus = (typeof FURNITURE_STATUSES)[number];

/** Every stocked entity kind a StockMovement can point at */
export const INVENTORY_KINDS = [
    'FURNITURE_VARIANT',
    'FOAM_VARIANT',
    'SOFA_ITEM',
    'HARDWARE_MATERIAL',
    'POSHISH_MATERIAL',
] as const;
export type InventoryKind = (typeof INVENTORY_KINDS)[number];

export function isInventoryKind(value: unknown): value is InventoryKind {
    return typeof value === 'string' && (INVENTORY_KINDS as readonly string[]).includes(value);
}

/**
 * Low-stock threshold used when a row has no reorder level (reorder level 0).
 * Quantities below this count as Low Stock.
 */
export const DEFAULT_LOW_STOCK_THRESHOLD = 3;

export const DEFAULT_MATERIAL_TYPE = 'Wood';
export const DEFAULT_HARDWARE_UNIT = 'pieces';
export const DEFAULT_POSHISH_UNIT = 'meters';

// ============================================
// LIST LIMITS
// ============================================

export const LIST_LIMITS = {
    transactions: 500,
    reportTransactions: 2000,
    recentTransactions: 10,
    exportTransactions: 3000,
    employeeLedger: 500,
    assignments: 100,
    inventoryList: 200,
    inventory: 500,
    stockMovements: 200,
    stockMovementsMax: 500,
    distinctNames: 200,
} as const;
