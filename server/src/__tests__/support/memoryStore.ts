/**
 * In-memory Store for tests
 *
 * Mirrors the ordering, filtering and upsert rules of the Kysely
 * repositories closely enough for service and HTTP tests. `transaction`
 * snapshots the whole state and restores it when `fn` throws.
 */

import {
    belongsToEmployee,
    compareLedgerOrder,
    compareNewestFirst,
    computeTotals,
    isLowStock,
    matchesTransactionFilter,
    normalizePersonName,
    summarizeEmployeeTransactions,
    type BedSize,
    type CategoryType,
    type Employee,
    type EmployeeFinancialSummary,
    type EmployeeStatus,
    type FoamBrand,
    type FoamModel,
    type FoamThickness,
    type FoamVariant,
    type FurnitureItem,
    type FurnitureStatus,
    type FurnitureVariant,
    type HardwareMaterial,
    type InventoryCategory,
    type InventoryKind,
    type PoshishMaterial,
    type SofaItem,
    type StockFields,
    type StockMovement,
    type StockTarget,
    type Transaction,
    type TransactionFilter,
    type TransactionTotals,
    type TxType,
    type WeeklyAssignment,
} from '@workshop-ledger/shared';
import type {
    AssignmentChanges,
    AssignmentRepository,
    BedSizeSpec,
    CatalogRepository,
    CategoryKey,
    EmployeeChanges,
    EmployeeRef,
    EmployeeRepository,
    FoamCardFilter,
    FoamRepository,
    FoamVariantDetail,
    FoamVariantFields,
    FoamVariantKey,
    FurnitureItemChanges,
    FurnitureRepository,
    FurnitureVariantDetail,
    FurnitureVariantFields,
    FurnitureVariantKey,
    ItemListFilter,
    NameCategoryCount,
    NewAssignment,
    NewEmployee,
    NewFurnitureItem,
    NewHardwareMaterial,
    NewPoshishMaterial,
    NewSofaItem,
    NewStockMovement,
    NewTransaction,
    StockRepository,
    StockSummary,
    StockedItemChanges,
    StockedItemRepository,
    Store,
    TransactionChanges,
    TransactionRepository,
    Upserted,
} from '../../db/store.js';

// ============================================
// STATE
// ============================================

interface MemoryState {
    nextId: number;
    transactions: Transaction[];
    employees: Employee[];
    assignments: WeeklyAssignment[];
    categories: InventoryCategory[];
    bedSizes: BedSize[];
    thicknesses: FoamThickness[];
    brands: FoamBrand[];
    models: FoamModel[];
    furnitureItems: FurnitureItem[];
    furnitureVariants: FurnitureVariant[];
    foamVariants: FoamVariant[];
    sofas: SofaItem[];
    hardware: HardwareMaterial[];
    poshish: PoshishMaterial[];
    movements: StockMovement[];
}

function emptyState(): MemoryState {
    return {
        nextId: 1,
        transactions: [],
        employees: [],
        assignments: [],
        categories: [],
        bedSizes: [],
        thicknesses: [],
        brands: [],
        models: [],
        furnitureItems: [],
        furnitureVariants: [],
        foamVariants: [],
        sofas: [],
        hardware: [],
        poshish: [],
        movements: [],
    };
}

/** Shared by every repository of one store; `state` is swapped on rollback */
class MemoryDb {
    state: MemoryState = emptyState();

    constructor(readonly now: () => Date) {}

    id(): number {
        return this.state.nextId++;
    }

    stamps(): { createdAt: Date; updatedAt: Date } {
        const at = this.now();
        return { createdAt: at, updatedAt: at };
    }
}

function copy<T extends object>(row: T): T {
    return { ...row };
}

/** Changes with undefined values skipped, like Kysely's `set` */
function withChanges<T extends object>(row: T, changes: object): T {
    const defined = Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
    return { ...row, ...defined };
}

function replaceRow<T extends { id: number }>(rows: T[], next: T): T {
    const index = rows.findIndex((row) => row.id === next.id);
    rows[index] = next;
    return copy(next);
}

type CatalogTable = 'categories' | 'bedSizes' | 'thicknesses' | 'brands' | 'models';

function withInactive<T extends { id: number; isActive: boolean }>(rows: readonly T[], id: number): T[] {
    return rows.map((row) => (row.id === id ? { ...row, isActive: false } : row));
}

function byId<T extends { id: number }>(rows: readonly T[], id: number): T | null {
    const row = rows.find((r) => r.id === id);
    return row ? copy(row) : null;
}

function compareText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/** Postgres ASC puts NULL last */
function compareNullableAsc(a: number | null, b: number | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return a - b;
}

function containsIgnoreCase(haystack: string | null, needle: string): boolean {
    return haystack !== null && haystack.toLowerCase().includes(needle.toLowerCase());
}

// ============================================
// LEDGER
// ============================================

class MemoryTransactionRepository implements TransactionRepository {
    constructor(private readonly db: MemoryDb) {}

    private matching(filter: TransactionFilter): Transaction[] {
        return this.db.state.transactions.filter((tx) => matchesTransactionFilter(tx, filter));
    }

    async list(filter: TransactionFilter, limit: number): Promise<Transaction[]> {
        return this.matching(filter).sort(compareNewestFirst).slice(0, limit).map(copy);
    }

    async totals(filter: TransactionFilter): Promise<TransactionTotals> {
        return computeTotals(this.matching(filter));
    }

    async findById(id: number): Promise<Transaction | null> {
        return byId(this.db.state.transactions, id);
    }

    async create(data: NewTransaction): Promise<Transaction> {
        const row: Transaction = { id: this.db.id(), ...data, isDeleted: false, ...this.db.stamps() };
        this.db.state.transactions.push(row);
        return copy(row);
    }

    async update(id: number, data: TransactionChanges): Promise<Transaction | null> {
        const row = this.db.state.transactions.find((tx) => tx.id === id && !tx.isDeleted);
        if (!row) return null;
        return replaceRow(this.db.state.transactions, { ...withChanges(row, data), updatedAt: this.db.now() });
    }

    async markDeleted(id: number): Promise<boolean> {
        const row = this.db.state.transactions.find((tx) => tx.id === id && !tx.isDeleted);
        if (!row) return false;
        replaceRow(this.db.state.transactions, { ...row, isDeleted: true, updatedAt: this.db.now() });
        return true;
    }

    async distinctNames(limit: number): Promise<string[]> {
        const firstByKey = new Map<string, string>();
        for (const tx of this.db.state.transactions) {
            if (tx.isDeleted || tx.name === null || tx.name.trim() === '') continue;
            const key = tx.name.toLowerCase();
            const current = firstByKey.get(key);
            if (current === undefined || tx.name < current) firstByKey.set(key, tx.name);
        }
        return [...firstByKey.entries()]
            .sort(([a], [b]) => compareText(a, b))
            .slice(0, limit)
            .map(([, name]) => name);
    }

    async nameCategoryCounts(type: TxType | null): Promise<NameCategoryCount[]> {
        const groups = new Map<string, { key: string; name: string; category: string; count: number }>();
        for (const tx of this.db.state.transactions) {
            if (tx.isDeleted || tx.name === null || tx.name.trim() === '') continue;
            if (type !== null && tx.type !== type) continue;
            const trimmed = tx.name.trim();
            const key = trimmed.toLowerCase();
            const groupKey = `${key}\u0000${tx.category}`;
            const group = groups.get(groupKey);
            if (group) {
                group.count += 1;
                if (trimmed < group.name) group.name = trimmed;
            } else {
                groups.set(groupKey, { key, name: trimmed, category: tx.category, count: 1 });
            }
        }
        return [...groups.values()]
            .sort((a, b) => b.count - a.count || compareText(a.key, b.key) || compareText(a.category, b.category))
            .map(({ name, category, count }) => ({ name, category, count }));
    }

    private scoped(employee: EmployeeRef): Transaction[] {
        return this.db.state.transactions.filter((tx) => belongsToEmployee(tx, employee)).sort(compareLedgerOrder);
    }

    async forEmployee(employee: EmployeeRef, limit: number): Promise<Transaction[]> {
        return this.scoped(employee).slice(0, limit).map(copy);
    }

    async summaryForEmployee(employee: EmployeeRef): Promise<EmployeeFinancialSummary> {
        return summarizeEmployeeTransactions(this.scoped(employee));
    }

    async linkByName(name: string, employeeId: number): Promise<number> {
        const target = normalizePersonName(name);
        let linked = 0;
        for (const tx of this.db.state.transactions) {
            if (tx.isDeleted || tx.type !== 'outgoing' || tx.employeeId !== null || tx.name === null) continue;
            if (normalizePersonName(tx.name) !== target) continue;
            replaceRow(this.db.state.transactions, {
                ...tx,
                employeeId,
                employeeTxType: tx.employeeTxType ?? 'salary',
                updatedAt: this.db.now(),
            });
            linked += 1;
        }
        return linked;
    }
}

class MemoryEmployeeRepository implements EmployeeRepository {
    constructor(private readonly db: MemoryDb) {}

    async list(status: EmployeeStatus | null): Promise<Employee[]> {
        return this.db.state.employees
            .filter((e) => status === null || e.status === status)
            .sort((a, b) => compareText(a.status, b.status) || compareText(a.fullName, b.fullName))
            .map(copy);
    }

    async findById(id: number): Promise<Employee | null> {
        return byId(this.db.state.employees, id);
    }

    async findByName(name: string): Promise<Employee | null> {
        const target = normalizePersonName(name);
        const row = [...this.db.state.employees]
            .sort((a, b) => a.id - b.id)
            .find((e) => normalizePersonName(e.fullName) === target);
        return row ? copy(row) : null;
    }

    async create(data: NewEmployee): Promise<Employee> {
        const row: Employee = { id: this.db.id(), ...data, ...this.db.stamps() };
        this.db.state.employees.push(row);
        return copy(row);
    }

    async update(id: number, data: EmployeeChanges): Promise<Employee | null> {
        const row = this.db.state.employees.find((e) => e.id === id);
        if (!row) return null;
        return replaceRow(this.db.state.employees, { ...withChanges(row, data), updatedAt: this.db.now() });
    }
}

class MemoryAssignmentRepository implements AssignmentRepository {
    constructor(private readonly db: MemoryDb) {}

    async listForEmployee(employeeId: number, limit: number): Promise<WeeklyAssignment[]> {
        return this.db.state.assignments
            .filter((a) => a.employeeId === employeeId)
            .sort((a, b) => compareText(b.weekStart, a.weekStart) || b.id - a.id)
            .slice(0, limit)
            .map(copy);
    }

    async findById(id: number): Promise<WeeklyAssignment | null> {
        return byId(this.db.state.assignments, id);
    }

    async create(data: NewAssignment): Promise<WeeklyAssignment> {
        const row: WeeklyAssignment = { id: this.db.id(), ...data, ...this.db.stamps() };
        this.db.state.assignments.push(row);
        return copy(row);
    }

    async update(id: number, data: AssignmentChanges): Promise<WeeklyAssignment | null> {
        const row = this.db.state.assignments.find((a) => a.id === id);
        if (!row) return null;
        return replaceRow(this.db.state.assignments, { ...withChanges(row, data), updatedAt: this.db.now() });
    }
}

// ============================================
// REFERENCE CATALOG
// ============================================

class MemoryCatalogRepository implements CatalogRepository {
    constructor(private readonly db: MemoryDb) {}

    private findCategoryAnyState(key: CategoryKey): InventoryCategory | undefined {
        return this.db.state.categories.find(
            (c) => c.type === key.type && c.parentId === key.parentId && c.name.toLowerCase() === key.name.toLowerCase()
        );
    }

    async upsertCategory(key: CategoryKey): Promise<Upserted<InventoryCategory>> {
        const existing = this.findCategoryAnyState(key);
        if (existing) {
            const row = existing.isActive
                ? copy(existing)
                : replaceRow(this.db.state.categories, { ...existing, isActive: true, updatedAt: this.db.now() });
            return { row, created: false };
        }
        const row: InventoryCategory = { id: this.db.id(), ...key, isActive: true, ...this.db.stamps() };
        this.db.state.categories.push(row);
        return { row: copy(row), created: true };
    }

    async findCategory(key: CategoryKey): Promise<InventoryCategory | null> {
        const row = this.findCategoryAnyState(key);
        return row && row.isActive ? copy(row) : null;
    }

    async findCategoryById(id: number): Promise<InventoryCategory | null> {
        return byId(this.db.state.categories, id);
    }

    async listCategories(type: CategoryType, parentId: number | null): Promise<InventoryCategory[]> {
        return this.db.state.categories
            .filter((c) => c.isActive && c.type === type && c.parentId === parentId)
            .sort((a, b) => compareText(a.name, b.name))
            .map(copy);
    }

    async upsertBedSize(spec: BedSizeSpec): Promise<Upserted<BedSize>> {
        const existing = this.db.state.bedSizes.find((s) => s.widthIn === spec.widthIn && s.lengthIn === spec.lengthIn);
        if (existing) {
            const row = replaceRow(this.db.state.bedSizes, {
                ...existing,
                label: spec.label,
                widthFtX100: spec.widthFtX100,
                lengthFtX100: spec.lengthFtX100,
                sortOrder: spec.sortOrder,
                isActive: true,
                updatedAt: this.db.now(),
            });
            return { row, created: false };
        }
        const row: BedSize = { id: this.db.id(), ...spec, isActive: true, ...this.db.stamps() };
        this.db.state.bedSizes.push(row);
        return { row: copy(row), created: true };
    }

    async upsertThickness(inches: number, sortOrder: number): Promise<Upserted<FoamThickness>> {
        const existing = this.db.state.thicknesses.find((t) => t.inches === inches);
        if (existing) {
            const row = replaceRow(this.db.state.thicknesses, {
                ...existing,
                sortOrder,
                isActive: true,
                updatedAt: this.db.now(),
            });
            return { row, created: false };
        }
        const row: FoamThickness = { id: this.db.id(), inches, sortOrder, isActive: true, ...this.db.stamps() };
        this.db.state.thicknesses.push(row);
        return { row: copy(row), created: true };
    }

    async upsertBrand(name: string): Promise<Upserted<FoamBrand>> {
        const existing = this.db.state.brands.find((b) => b.name.toLowerCase() === name.toLowerCase());
        if (existing) {
            const row = existing.isActive
                ? copy(existing)
                : replaceRow(this.db.state.brands, { ...existing, isActive: true, updatedAt: this.db.now() });
            return { row, created: false };
        }
        const row: FoamBrand = { id: this.db.id(), name, isActive: true, ...this.db.stamps() };
        this.db.state.brands.push(row);
        return { row: copy(row), created: true };
    }

    async upsertModel(brandId: number, name: string, notes?: string | null): Promise<Upserted<FoamModel>> {
        const existing = this.db.state.models.find(
            (m) => m.brandId === brandId && m.name.toLowerCase() === name.toLowerCase()
        );
        if (existing) {
            if (existing.isActive && notes === undefined) return { row: copy(existing), created: false };
            const row = replaceRow(this.db.state.models, {
                ...existing,
                isActive: true,
                notes: notes === undefined ? existing.notes : notes,
                updatedAt: this.db.now(),
            });
            return { row, created: false };
        }
        const row: FoamModel = {
            id: this.db.id(),
            brandId,
            name,
            notes: notes ?? null,
            isActive: true,
            ...this.db.stamps(),
        };
        this.db.state.models.push(row);
        return { row: copy(row), created: true };
    }

    async listBedSizes(): Promise<BedSize[]> {
        return this.db.state.bedSizes
            .filter((s) => s.isActive)
            .sort((a, b) => a.sortOrder - b.sortOrder || a.widthIn - b.widthIn)
            .map(copy);
    }

    async listThicknesses(): Promise<FoamThickness[]> {
        return this.db.state.thicknesses
            .filter((t) => t.isActive)
            .sort((a, b) => a.sortOrder - b.sortOrder || a.inches - b.inches)
            .map(copy);
    }

    async listBrands(): Promise<FoamBrand[]> {
        return this.db.state.brands
            .filter((b) => b.isActive)
            .sort((a, b) => compareText(a.name, b.name))
            .map(copy);
    }

    async listModels(brandId: number | null): Promise<FoamModel[]> {
        return this.db.state.models
            .filter((m) => m.isActive && (brandId === null || m.brandId === brandId))
            .sort((a, b) => a.brandId - b.brandId || compareText(a.name, b.name))
            .map(copy);
    }

    async findBedSize(id: number): Promise<BedSize | null> {
        return byId(this.db.state.bedSizes, id);
    }

    async findThickness(id: number): Promise<FoamThickness | null> {
        return byId(this.db.state.thicknesses, id);
    }

    async findBrand(id: number): Promise<FoamBrand | null> {
        return byId(this.db.state.brands, id);
    }

    async findModel(id: number): Promise<FoamModel | null> {
        return byId(this.db.state.models, id);
    }
}

// ============================================
// FURNITURE & FOAM
// ============================================

function lowStockRows<T extends StockFields & { id: number }>(rows: readonly T[], limit: number): T[] {
    return rows
        .filter((row) => row.isActive && isLowStock(row))
        .sort((a, b) => a.qtyOnHand - b.qtyOnHand || a.id - b.id)
        .slice(0, limit)
        .map(copy);
}

class MemoryFurnitureRepository implements FurnitureRepository {
    constructor(private readonly db: MemoryDb) {}

    async createItem(data: NewFurnitureItem): Promise<FurnitureItem> {
        const row: FurnitureItem = { id: this.db.id(), ...data, isActive: true, ...this.db.stamps() };
        this.db.state.furnitureItems.push(row);
        return copy(row);
    }

    async updateItem(id: number, data: FurnitureItemChanges): Promise<FurnitureItem | null> {
        const row = this.db.state.furnitureItems.find((item) => item.id === id);
        if (!row) return null;
        return replaceRow(this.db.state.furnitureItems, { ...withChanges(row, data), updatedAt: this.db.now() });
    }

    async findItem(id: number): Promise<FurnitureItem | null> {
        return byId(this.db.state.furnitureItems, id);
    }

    async listItems(filter: ItemListFilter): Promise<FurnitureItem[]> {
        const q = filter.q;
        return this.db.state.furnitureItems
            .filter((item) => item.isActive)
            .filter((item) => filter.categoryId === null || item.categoryId === filter.categoryId)
            .filter((item) => q === null || containsIgnoreCase(item.name, q))
            .sort((a, b) => b.id - a.id)
            .slice(0, filter.limit)
            .map(copy);
    }

    async setStatus(id: number, status: FurnitureStatus): Promise<void> {
        const row = this.db.state.furnitureItems.find((item) => item.id === id);
        if (row) replaceRow(this.db.state.furnitureItems, { ...row, status, updatedAt: this.db.now() });
    }

    async deactivateItem(id: number): Promise<boolean> {
        const row = this.db.state.furnitureItems.find((item) => item.id === id);
        if (!row) return false;
        const at = this.db.now();
        replaceRow(this.db.state.furnitureItems, { ...row, isActive: false, updatedAt: at });
        this.db.state.furnitureVariants = this.db.state.furnitureVariants.map((v) =>
            v.furnitureItemId === id ? { ...v, isActive: false, updatedAt: at } : v
        );
        return true;
    }

    async countActiveItems(): Promise<number> {
        return this.db.state.furnitureItems.filter((item) => item.isActive).length;
    }

    async findVariant(id: number): Promise<FurnitureVariant | null> {
        return byId(this.db.state.furnitureVariants, id);
    }

    async upsertVariant(key: FurnitureVariantKey, fields: FurnitureVariantFields): Promise<Upserted<FurnitureVariant>> {
        const existing = this.db.state.furnitureVariants.find(
            (v) => v.furnitureItemId === key.furnitureItemId && v.bedSizeId === key.bedSizeId
        );
        if (existing) {
            const row = replaceRow(this.db.state.furnitureVariants, {
                ...existing,
                ...fields,
                isActive: true,
                updatedAt: this.db.now(),
            });
            return { row, created: false };
        }
        const row: FurnitureVariant = { id: this.db.id(), ...key, ...fields, isActive: true, ...this.db.stamps() };
        this.db.state.furnitureVariants.push(row);
        return { row: copy(row), created: true };
    }

    async listVariants(itemIds: readonly number[]): Promise<FurnitureVariant[]> {
        return this.db.state.furnitureVariants
            .filter((v) => v.isActive && itemIds.includes(v.furnitureItemId))
            .sort((a, b) => a.furnitureItemId - b.furnitureItemId || compareNullableAsc(a.bedSizeId, b.bedSizeId))
            .map(copy);
    }

    async activeQuantities(itemId: number): Promise<number[]> {
        return this.db.state.furnitureVariants
            .filter((v) => v.isActive && v.furnitureItemId === itemId)
            .map((v) => v.qtyOnHand);
    }

    async variantDetails(variantIds: readonly number[]): Promise<FurnitureVariantDetail[]> {
        const { furnitureItems, bedSizes } = this.db.state;
        return this.db.state.furnitureVariants
            .filter((v) => variantIds.includes(v.id))
            .flatMap((variant) => {
                const item = furnitureItems.find((i) => i.id === variant.furnitureItemId);
                if (!item) return [];
                const bedSize =
                    variant.bedSizeId === null ? null : bedSizes.find((s) => s.id === variant.bedSizeId) ?? null;
                return [{ variant: copy(variant), item: copy(item), bedSize: bedSize ? copy(bedSize) : null }];
            });
    }

    async lowStock(limit: number): Promise<FurnitureVariant[]> {
        return lowStockRows(this.db.state.furnitureVariants, limit);
    }
}

class MemoryFoamRepository implements FoamRepository {
    constructor(private readonly db: MemoryDb) {}

    async findVariant(id: number): Promise<FoamVariant | null> {
        return byId(this.db.state.foamVariants, id);
    }

    async upsertVariant(key: FoamVariantKey, fields: FoamVariantFields): Promise<Upserted<FoamVariant>> {
        const existing = this.db.state.foamVariants.find(
            (v) => v.foamModelId === key.foamModelId && v.bedSizeId === key.bedSizeId && v.thicknessId === key.thicknessId
        );
        if (existing) {
            const row = replaceRow(this.db.state.foamVariants, {
                ...existing,
                ...fields,
                isActive: true,
                updatedAt: this.db.now(),
            });
            return { row, created: false };
        }
        const row: FoamVariant = { id: this.db.id(), ...key, ...fields, isActive: true, ...this.db.stamps() };
        this.db.state.foamVariants.push(row);
        return { row: copy(row), created: true };
    }

    async listVariants(modelId: number): Promise<FoamVariant[]> {
        return this.db.state.foamVariants
            .filter((v) => v.isActive && v.foamModelId === modelId)
            .sort((a, b) => a.bedSizeId - b.bedSizeId || a.thicknessId - b.thicknessId)
            .map(copy);
    }

    async cards(filter: FoamCardFilter): Promise<FoamVariantDetail[]> {
        const q = filter.q;
        const variants = this.hydrate(this.db.state.foamVariants).filter(
            ({ variant, model, brand }) =>
                variant.isActive &&
                model.isActive &&
                brand.isActive &&
                (filter.brandId === null || model.brandId === filter.brandId) &&
                (q === null || containsIgnoreCase(model.name, q))
        );
        return variants
            .sort((a, b) => a.variant.qtyOnHand - b.variant.qtyOnHand || b.variant.id - a.variant.id)
            .slice(0, filter.limit);
    }

    async variantDetails(variantIds: readonly number[]): Promise<FoamVariantDetail[]> {
        return this.hydrate(this.db.state.foamVariants.filter((v) => variantIds.includes(v.id)));
    }

    async deactivateModel(modelId: number): Promise<boolean> {
        const model = this.db.state.models.find((m) => m.id === modelId);
        if (!model) return false;
        const at = this.db.now();
        replaceRow(this.db.state.models, { ...model, isActive: false, updatedAt: at });
        this.db.state.foamVariants = this.db.state.foamVariants.map((v) =>
            v.foamModelId === modelId ? { ...v, isActive: false, updatedAt: at } : v
        );
        return true;
    }

    async lowStock(limit: number): Promise<FoamVariant[]> {
        return lowStockRows(this.db.state.foamVariants, limit);
    }

    private hydrate(variants: readonly FoamVariant[]): FoamVariantDetail[] {
        const { models, brands, bedSizes, thicknesses } = this.db.state;
        return variants.flatMap((variant) => {
            const model = models.find((m) => m.id === variant.foamModelId);
            const brand = model ? brands.find((b) => b.id === model.brandId) : undefined;
            const bedSize = bedSizes.find((s) => s.id === variant.bedSizeId);
            const thickness = thicknesses.find((t) => t.id === variant.thicknessId);
            if (!model || !brand || !bedSize || !thickness) return [];
            return [
                {
                    variant: copy(variant),
                    model: copy(model),
                    brand: copy(brand),
                    bedSize: copy(bedSize),
                    thickness: copy(thickness),
                },
            ];
        });
    }
}

// ============================================
// FLAT STOCKED ITEMS
// ============================================

type StockedRow = StockFields & { id: number; name: string; createdAt: Date; updatedAt: Date };

type StockedTable = 'sofas' | 'hardware' | 'poshish';

class MemoryStockedItemRepository<TRow extends StockedRow, TNew extends object> implements StockedItemRepository<TRow, TNew> {
    constructor(
        private readonly db: MemoryDb,
        private readonly rows: (state: MemoryState) => TRow[],
        private readonly build: (id: number, data: TNew, at: Date) => TRow
    ) {}

    async create(data: TNew): Promise<TRow> {
        const row = this.build(this.db.id(), data, this.db.now());
        this.rows(this.db.state).push(row);
        return copy(row);
    }

    async update(id: number, data: StockedItemChanges<TNew>): Promise<TRow | null> {
        const rows = this.rows(this.db.state);
        const row = rows.find((r) => r.id === id);
        if (!row) return null;
        return replaceRow(rows, { ...withChanges(row, data), updatedAt: this.db.now() });
    }

    async findById(id: number): Promise<TRow | null> {
        return byId(this.rows(this.db.state), id);
    }

    async findByIds(ids: readonly number[]): Promise<TRow[]> {
        return this.rows(this.db.state)
            .filter((r) => ids.includes(r.id))
            .map(copy);
    }

    async list(q: string | null, limit: number): Promise<TRow[]> {
        return this.rows(this.db.state)
            .filter((r) => r.isActive && (q === null || containsIgnoreCase(r.name, q)))
            .sort((a, b) => b.id - a.id)
            .slice(0, limit)
            .map(copy);
    }

    async deactivate(id: number): Promise<boolean> {
        const rows = this.rows(this.db.state);
        const row = rows.find((r) => r.id === id);
        if (!row) return false;
        replaceRow(rows, { ...row, isActive: false, updatedAt: this.db.now() });
        return true;
    }
}

// ============================================
// STOCK
// ============================================

type QuantityRow = StockFields & { id: number; updatedAt: Date };

function rowsForKind(state: MemoryState, kind: InventoryKind): QuantityRow[] {
    switch (kind) {
        case 'FURNITURE_VARIANT':
            return state.furnitureVariants;
        case 'FOAM_VARIANT':
            return state.foamVariants;
        case 'SOFA_ITEM':
            return state.sofas;
        case 'HARDWARE_MATERIAL':
            return state.hardware;
        case 'POSHISH_MATERIAL':
            return state.poshish;
    }
}

class MemoryStockRepository implements StockRepository {
    constructor(private readonly db: MemoryDb) {}

    async applyDelta(target: StockTarget, delta: number): Promise<number | null> {
        const row = rowsForKind(this.db.state, target.kind).find((r) => r.id === target.id);
        if (!row) return null;
        row.qtyOnHand += delta;
        row.updatedAt = this.db.now();
        return row.qtyOnHand;
    }

    async recordMovement(data: NewStockMovement): Promise<StockMovement> {
        const row: StockMovement = {
            id: this.db.id(),
            inventoryType: data.target.kind,
            variantId: data.target.id,
            movementType: data.movementType,
            qtyChange: data.qtyChange,
            unitCost: data.unitCost,
            referenceType: data.referenceType,
            referenceId: data.referenceId,
            notes: data.notes,
            createdAt: this.db.now(),
        };
        this.db.state.movements.push(row);
        return copy(row);
    }

    async listMovements(limit: number): Promise<StockMovement[]> {
        return [...this.db.state.movements]
            .sort((a, b) => b.id - a.id)
            .slice(0, limit)
            .map(copy);
    }

    async countMovementsSince(since: Date): Promise<number> {
        return this.db.state.movements.filter((m) => m.createdAt.getTime() >= since.getTime()).length;
    }

    async summarize(kind: InventoryKind): Promise<StockSummary> {
        const active = rowsForKind(this.db.state, kind).filter((r) => r.isActive);
        return {
            rows: active.length,
            low: active.filter((r) => isLowStock(r)).length,
            units: active.reduce((sum, r) => sum + r.qtyOnHand, 0),
        };
    }
}

// ============================================
// STORE
// ============================================

export interface MemoryStoreOptions {
    now?: () => Date;
}

export class MemoryStore implements Store {
    readonly transactions: TransactionRepository;
    readonly employees: EmployeeRepository;
    readonly assignments: AssignmentRepository;
    readonly catalog: CatalogRepository;
    readonly furniture: FurnitureRepository;
    readonly foam: FoamRepository;
    readonly sofas: StockedItemRepository<SofaItem, NewSofaItem>;
    readonly hardware: StockedItemRepository<HardwareMaterial, NewHardwareMaterial>;
    readonly poshish: StockedItemRepository<PoshishMaterial, NewPoshishMaterial>;
    readonly stock: StockRepository;

    private readonly db: MemoryDb;
    private depth = 0;

    constructor(options: MemoryStoreOptions = {}) {
        this.db = new MemoryDb(options.now ?? (() => new Date()));
        this.transactions = new MemoryTransactionRepository(this.db);
        this.employees = new MemoryEmployeeRepository(this.db);
        this.assignments = new MemoryAssignmentRepository(this.db);
        this.catalog = new MemoryCatalogRepository(this.db);
        this.furniture = new MemoryFurnitureRepository(this.db);
        this.foam = new MemoryFoamRepository(this.db);
        this.sofas = new MemoryStockedItemRepository<SofaItem, NewSofaItem>(
            this.db,
            (state) => state.sofas,
            (id, data, at) => ({ id, ...data, isActive: true, createdAt: at, updatedAt: at })
        );
        this.hardware = new MemoryStockedItemRepository<HardwareMaterial, NewHardwareMaterial>(
            this.db,
            (state) => state.hardware,
            (id, data, at) => ({ id, ...data, isActive: true, createdAt: at, updatedAt: at })
        );
        this.poshish = new MemoryStockedItemRepository<PoshishMaterial, NewPoshishMaterial>(
            this.db,
            (state) => state.poshish,
            (id, data, at) => ({ id, ...data, isActive: true, createdAt: at, updatedAt: at })
        );
        this.stock = new MemoryStockRepository(this.db);
    }

    async transaction<T>(fn: (store: Store) => Promise<T>): Promise<T> {
        if (this.depth > 0) return fn(this);

        const snapshot = structuredClone(this.db.state);
        this.depth += 1;
        try {
            return await fn(this);
        } catch (error) {
            this.db.state = snapshot;
            throw error;
        } finally {
            this.depth -= 1;
        }
    }

    /** Rows of one stocked table, for assertions */
    rows(table: StockedTable | 'furnitureVariants' | 'foamVariants'): readonly QuantityRow[] {
        return this.db.state[table];
    }

    movementCount(): number {
        return this.db.state.movements.length;
    }

    /** Marks a catalog row inactive, as if retired by hand in the database */
    retireCatalogRow(table: CatalogTable, id: number): void {
        const state = this.db.state;
        switch (table) {
            case 'categories':
                state.categories = withInactive(state.categories, id);
                break;
            case 'bedSizes':
                state.bedSizes = withInactive(state.bedSizes, id);
                break;
            case 'thicknesses':
                state.thicknesses = withInactive(state.thicknesses, id);
                break;
            case 'brands':
                state.brands = withInactive(state.brands, id);
                break;
            case 'models':
                state.models = withInactive(state.models, id);
                break;
        }
    }
}
