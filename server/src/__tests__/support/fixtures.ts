/**
 * Test fixtures built straight through the repositories
 */

import type { FurnitureItem, FurnitureStatus, FurnitureVariant } from '@workshop-ledger/shared';
import type { NewHardwareMaterial, NewTransaction, Store } from '../../db/store.js';

export async function furnitureCategory(store: Store): Promise<number> {
    const { row: root } = await store.catalog.upsertCategory({ type: 'FURNITURE', parentId: null, name: 'Furniture' });
    const { row: bedSet } = await store.catalog.upsertCategory({ type: 'FURNITURE', parentId: root.id, name: 'Bed Set' });
    return bedSet.id;
}

export async function furnitureItem(
    store: Store,
    overrides: { name?: string; status?: FurnitureStatus; categoryId?: number } = {}
): Promise<FurnitureItem> {
    const categoryId = overrides.categoryId ?? (await furnitureCategory(store));
    return store.furniture.createItem({
        name: overrides.name ?? 'Cushion Bed',
        sku: `FUR-${Date.now()}`,
        materialType: 'Wood',
        colorFinish: null,
        status: overrides.status ?? 'IN_STOCK',
        categoryId,
        subCategoryId: null,
        notes: null,
    });
}

export async function furnitureVariant(
    store: Store,
    furnitureItemId: number,
    qtyOnHand: number,
    bedSizeId: number | null = null,
    reorderLevel: number = 0
): Promise<FurnitureVariant> {
    const { row } = await store.furniture.upsertVariant(
        { furnitureItemId, bedSizeId },
        { qtyOnHand, reorderLevel, costPrice: 30000, salePrice: 45000 }
    );
    return row;
}

export function hardwareInput(overrides: Partial<NewHardwareMaterial> = {}): NewHardwareMaterial {
    return {
        name: 'Hinges',
        unit: 'pieces',
        qtyOnHand: 10,
        reorderLevel: 0,
        costPrice: 50,
        salePrice: 80,
        notes: null,
        ...overrides,
    };
}

export function newTransaction(overrides: Partial<NewTransaction> = {}): NewTransaction {
    return {
        type: 'outgoing',
        date: '2024-03-10',
        amount: 1000,
        category: 'Rent',
        name: null,
        billNo: null,
        notes: null,
        employeeId: null,
        employeeTxType: null,
        paymentMethod: null,
        assignmentId: null,
        reference: null,
        ...overrides,
    };
}
