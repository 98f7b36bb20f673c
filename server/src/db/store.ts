/**
 * Store
 *
 * Data access seam for services. One repository per aggregate plus
 * `transaction(fn)`, which runs `fn` against a store bound to a single
 * database transaction. Production uses the Kysely implementation in
 * kyselyStore.ts.
 */

import type {
    AssignmentStatus,
    BedSize,
    CategoryType,
    Employee,
    EmployeeFinancialSummary,
    EmployeeStatus,
    EmployeeTxType,
    FoamBrand,
    FoamModel,
    FoamThickness,
    FoamVariant,
    FurnitureItem,
    FurnitureStatus,
    FurnitureVariant,
    HardwareMaterial,
    InventoryCategory,
    InventoryKind,
    PoshishMaterial,
    SofaItem,
    StockMovement,
    StockTarget,
    Transaction,
    TransactionFilter,
    TransactionTotals,
    TxType,
    WeeklyAssignment,
} from '@workshop-ledger/shared';

/** Result of a natural-key find-or-create */
export interface Upserted<T> {
    row: T;
    created: boolean;
}

// ============================================
// LEDGER
// ============================================

export interface NewTransaction {
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
}

/** Update replaces every editable field; `type` is fixed at creation */
export type TransactionChanges = Omit<NewTransaction, 'type'>;

export interface EmployeeRef {
    id: number;
    fullName: string;
}

export interface NameCategoryCount {
    name: string;
    category: string;
    count: number;
}

export interface TransactionRepository {
    /** Ordered date desc, id desc */
    list(filter: TransactionFilter, limit: number): Promise<Transaction[]>;
    totals(filter: TransactionFilter): Promise<TransactionTotals>;
    /** Includes soft-deleted rows */
    findById(id: number): Promise<Transaction | null>;
    create(data: NewTransaction): Promise<Transaction>;
    /** Null when the row is missing or deleted */
    update(id: number, data: TransactionChanges): Promise<Transaction | null>;
    /** False when the row is missing or already deleted */
    markDeleted(id: number): Promise<boolean>;
    /** First spelling per lower(name), sorted by lower(name) */
    distinctNames(limit: number): Promise<string[]>;
    /** Non-deleted, named rows grouped by (name, category) */
    nameCategoryCounts(type: TxType | null): Promise<NameCategoryCount[]>;
    /** Linked or legacy-name outgoing rows, date asc, id asc */
    forEmployee(employee: EmployeeRef, limit: number): Promise<Transaction[]>;
    summaryForEmployee(employee: EmployeeRef): Promise<EmployeeFinancialSummary>;
    /**
     * Link unlinked outgoing rows whose trimmed name matches case-insensitively.
     * Untyped rows become `salary`. Returns the number of rows linked.
     */
    linkByName(name: string, employeeId: number): Promise<number>;
}

export interface NewEmployee {
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

export type EmployeeChanges = Partial<NewEmployee>;

export interface EmployeeRepository {
    /** Ordered status, then full name */
    list(status: EmployeeStatus | null): Promise<Employee[]>;
    findById(id: number): Promise<Employee | null>;
    /** Case-insensitive match on the trimmed name */
    findByName(name: string): Promise<Employee | null>;
    create(data: NewEmployee): Promise<Employee>;
    update(id: number, data: EmployeeChanges): Promise<Employee | null>;
}

export interface NewAssignment {
    employeeId: number;
    weekStart: string;
    weekEnd: string;
    description: string;
    quantity: number | null;
    status: AssignmentStatus;
    isLocked: boolean;
}

export type AssignmentChanges = Partial<Pick<NewAssignment, 'description' | 'quantity' | 'status' | 'isLocked'>>;

export interface AssignmentRepository {
    /** Ordered week_start desc, id desc */
    listForEmployee(employeeId: number, limit: number): Promise<WeeklyAssignment[]>;
    findById(id: number): Promise<WeeklyAssignment | null>;
    create(data: NewAssignment): Promise<WeeklyAssignment>;
    update(id: number, data: AssignmentChanges): Promise<WeeklyAssignment | null>;
}

// ============================================
// REFERENCE CATALOG
// ============================================

export interface CategoryKey {
    type: CategoryType;
    parentId: number | null;
    name: string;
}

export interface BedSizeSpec {
    label: string;
    widthIn: number;
    lengthIn: number;
    widthFtX100: number | null;
    lengthFtX100: number | null;
    sortOrder: number;
}

export interface CatalogRepository {
    /** Found → reactivated if inactive */
    upsertCategory(key: CategoryKey): Promise<Upserted<InventoryCategory>>;
    /** Active category by (type, parent, lower(name)) */
    findCategory(key: CategoryKey): Promise<InventoryCategory | null>;
    findCategoryById(id: number): Promise<InventoryCategory | null>;
    /** Active children of `parentId` (roots when null), by name */
    listCategories(type: CategoryType, parentId: number | null): Promise<InventoryCategory[]>;

    /** Keyed by width × length; found → label, ft and sort refreshed, reactivated */
    upsertBedSize(spec: BedSizeSpec): Promise<Upserted<BedSize>>;
    /** Keyed by inches; found → sort refreshed, reactivated */
    upsertThickness(inches: number, sortOrder: number): Promise<Upserted<FoamThickness>>;
    /** Keyed by lower(name) */
    upsertBrand(name: string): Promise<Upserted<FoamBrand>>;
    /** Keyed by (brand, lower(name)); notes are replaced only when given */
    upsertModel(brandId: number, name: string, notes?: string | null): Promise<Upserted<FoamModel>>;

    listBedSizes(): Promise<BedSize[]>;
    listThicknesses(): Promise<FoamThickness[]>;
    listBrands(): Promise<FoamBrand[]>;
    listModels(brandId: number | null): Promise<FoamModel[]>;

    findBedSize(id: number): Promise<BedSize | null>;
    findThickness(id: number): Promise<FoamThickness | null>;
    findBrand(id: number): Promise<FoamBrand | null>;
    findModel(id: number): Promise<FoamModel | null>;
}

// ============================================
// FURNITURE & FOAM VARIANTS
// ============================================

export interface NewFurnitureItem {
    name: string;
    sku: string;
    materialType: string;
    colorFinish: string | null;
    status: FurnitureStatus;
    categoryId: number;
    subCategoryId: number | null;
    notes: string | null;
}

export type FurnitureItemChanges = Partial<Omit<NewFurnitureItem, 'sku'>>;

export interface FurnitureVariantKey {
    furnitureItemId: number;
    /** null = custom size */
    bedSizeId: number | null;
}

export interface FurnitureVariantFields {
    qtyOnHand: number;
    reorderLevel: number;
    costPrice: number;
    salePrice: number;
}

export interface ItemListFilter {
    q: string | null;
    categoryId: number | null;
    limit: number;
}

export interface FurnitureVariantDetail {
    variant: FurnitureVariant;
    item: FurnitureItem;
    bedSize: BedSize | null;
}

export interface FurnitureRepository {
    createItem(data: NewFurnitureItem): Promise<FurnitureItem>;
    updateItem(id: number, data: FurnitureItemChanges): Promise<FurnitureItem | null>;
    findItem(id: number): Promise<FurnitureItem | null>;
    /** Active items, newest first */
    listItems(filter: ItemListFilter): Promise<FurnitureItem[]>;
    setStatus(id: number, status: FurnitureStatus): Promise<void>;
    /** Item and all its variants inactive; false when the item is missing */
    deactivateItem(id: number): Promise<boolean>;
    countActiveItems(): Promise<number>;

    findVariant(id: number): Promise<FurnitureVariant | null>;
    /** Found → fields overwritten and reactivated */
    upsertVariant(key: FurnitureVariantKey, fields: FurnitureVariantFields): Promise<Upserted<FurnitureVariant>>;
    /** Active variants of the given items, by bed size */
    listVariants(itemIds: readonly number[]): Promise<FurnitureVariant[]>;
    activeQuantities(itemId: number): Promise<number[]>;
    variantDetails(variantIds: readonly number[]): Promise<FurnitureVariantDetail[]>;
    /** Active variants under the low rule, qty asc, id asc */
    lowStock(limit: number): Promise<FurnitureVariant[]>;
}

export interface FoamVariantKey {
    foamModelId: number;
    bedSizeId: number;
    thicknessId: number;
}

export interface FoamVariantFields {
    densityType: string | null;
    qtyOnHand: number;
    reorderLevel: number;
    purchaseCost: number;
    salePrice: number;
}

export interface FoamVariantDetail {
    variant: FoamVariant;
    model: FoamModel;
    brand: FoamBrand;
    bedSize: BedSize;
    thickness: FoamThickness;
}

export interface FoamCardFilter {
    q: string | null;
    brandId: number | null;
    limit: number;
}

export interface FoamRepository {
    findVariant(id: number): Promise<FoamVariant | null>;
    upsertVariant(key: FoamVariantKey, fields: FoamVariantFields): Promise<Upserted<FoamVariant>>;
    /** Active variants of a model, by bed size then thickness */
    listVariants(modelId: number): Promise<FoamVariant[]>;
    /** Active variant rows joined with active model/brand, qty asc, id desc */
    cards(filter: FoamCardFilter): Promise<FoamVariantDetail[]>;
    variantDetails(variantIds: readonly number[]): Promise<FoamVariantDetail[]>;
    /** Model and all its variants inactive; false when the model is missing */
    deactivateModel(modelId: number): Promise<boolean>;
    /** Active variants under the low rule, qty asc, id asc */
    lowStock(limit: number): Promise<FoamVariant[]>;
}

// ============================================
// FLAT STOCKED ITEMS
// ============================================

interface NewStockedItemBase {
    qtyOnHand: number;
    reorderLevel: number;
    costPrice: number;
    salePrice: number;
    notes: string | null;
}

export interface NewSofaItem extends NewStockedItemBase {
    name: string;
    sofaType: string;
    hardwareMaterial: string | null;
    poshishMaterial: string | null;
    seatingCapacity: string | null;
}

export interface NewHardwareMaterial extends NewStockedItemBase {
    name: string;
    unit: string;
}

export interface NewPoshishMaterial extends NewStockedItemBase {
    name: string;
    color: string | null;
    unit: string;
}

/** Quantity changes only through stock adjustment */
export type StockedItemChanges<TNew> = Partial<Omit<TNew, 'qtyOnHand'>>;

export interface StockedItemRepository<TRow, TNew> {
    create(data: TNew): Promise<TRow>;
    update(id: number, data: StockedItemChanges<TNew>): Promise<TRow | null>;
    findById(id: number): Promise<TRow | null>;
    findByIds(ids: readonly number[]): Promise<TRow[]>;
    /** Active rows, optional case-insensitive name search, newest first */
    list(q: string | null, limit: number): Promise<TRow[]>;
    /** False when the row is missing */
    deactivate(id: number): Promise<boolean>;
}

// ============================================
// STOCK MOVEMENTS
// ============================================

export interface NewStockMovement {
    target: StockTarget;
    movementType: string;
    qtyChange: number;
    unitCost: number | null;
    referenceType: string | null;
    referenceId: number | null;
    notes: string | null;
}

export interface StockSummary {
    /** Active rows */
    rows: number;
    /** Active rows under the low rule */
    low: number;
    /** Σ qty_on_hand over active rows */
    units: number;
}

export interface StockRepository {
    /**
     * `qty_on_hand = qty_on_hand + delta` as one UPDATE.
     * Returns the new quantity, or null when the row does not exist.
     */
    applyDelta(target: StockTarget, delta: number): Promise<number | null>;
    recordMovement(data: NewStockMovement): Promise<StockMovement>;
    /** Newest first */
    listMovements(limit: number): Promise<StockMovement[]>;
    countMovementsSince(since: Date): Promise<number>;
    summarize(kind: InventoryKind): Promise<StockSummary>;
}

// ============================================
// STORE
// ============================================

export interface Store {
    transactions: TransactionRepository;
    employees: EmployeeRepository;
    assignments: AssignmentRepository;
    catalog: CatalogRepository;
    furniture: FurnitureRepository;
    foam: FoamRepository;
    sofas: StockedItemRepository<SofaItem, NewSofaItem>;
    hardware: StockedItemRepository<HardwareMaterial, NewHardwareMaterial>;
    poshish: StockedItemRepository<PoshishMaterial, NewPoshishMaterial>;
    stock: StockRepository;
    /**
     * Run `fn` in one database transaction. Nested calls reuse the
     * outer transaction.
     */
    transaction<T>(fn: (store: Store) => Promise<T>): Promise<T>;
}
