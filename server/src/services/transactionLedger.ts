/**
 * Transaction Ledger Service
 *
 * Cash in / cash out. Rows are never hard-deleted: soft-deleted rows drop
 * out of every list and total but stay reachable by id.
 *
 * Payments to an employee (outgoing with employeeId) take their category
 * from the employee's profile and default the name to the employee's.
 */

import {
    LIST_LIMITS,
    hasFieldErrors,
    employeeOutgoingCategory,
    normalizeTransactionFilter,
    todayIsoDate,
    validateTransactionDraft,
    type CreateTransactionInput,
    type EmployeeTxType,
    type FieldErrors,
    type Transaction,
    type TransactionFilter,
    type TransactionFilterInput,
    type TransactionTotals,
    type TxType,
    type UpdateTransactionInput,
} from '@workshop-ledger/shared';
import type { NewTransaction, Store, TransactionChanges } from '../db/store.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { ledgerLogger } from '../utils/logger.js';

export interface TransactionListResult {
    filter: TransactionFilter;
    transactions: Transaction[];
    totals: TransactionTotals;
}

// ============================================
// READ
// ============================================

export async function listTransactions(
    store: Store,
    input: TransactionFilterInput,
    limit: number = LIST_LIMITS.transactions
): Promise<TransactionListResult> {
    const filter = normalizeTransactionFilter(input);
    const transactions = await store.transactions.list(filter, limit);
    const totals = await store.transactions.totals(filter);
    return { filter, transactions, totals };
}

export async function transactionTotals(store: Store, input: TransactionFilterInput): Promise<TransactionTotals> {
    return store.transactions.totals(normalizeTransactionFilter(input));
}

/** Direct lookup; soft-deleted rows are returned too */
export async function getTransaction(store: Store, id: number): Promise<Transaction> {
    const tx = await store.transactions.findById(id);
    if (!tx) throw new NotFoundError('Transaction not found', 'Transaction', id);
    return tx;
}

export async function distinctTransactionNames(
    store: Store,
    limit: number = LIST_LIMITS.distinctNames
): Promise<string[]> {
    return store.transactions.distinctNames(limit);
}

// ============================================
// WRITE
// ============================================

/**
 * Apply the employee link and the category rules to form input.
 * Throws ValidationError with a field → message map.
 */
async function resolveChanges(
    store: Store,
    type: TxType,
    input: UpdateTransactionInput,
    fallbackDate: string
): Promise<TransactionChanges> {
    const errors: FieldErrors = {};
    let category = input.category;
    let name = input.name ?? null;
    let employeeId: number | null = null;
    let employeeTxType: EmployeeTxType | null = null;

    if (type === 'outgoing' && input.employeeId) {
        const employee = await store.employees.findById(input.employeeId);
        if (!employee) {
            errors.employeeId = 'Selected employee was not found.';
        } else {
            employeeId = employee.id;
            employeeTxType = input.employeeTxType ?? null;
            category = employeeOutgoingCategory(employee.category);
            name = name ?? employee.fullName;
        }
    }

    Object.assign(errors, validateTransactionDraft({ type, category, amount: input.amount, billNo: input.billNo }));
    if (hasFieldErrors(errors)) {
        throw new ValidationError('Invalid transaction', errors);
    }

    return {
        date: input.date ?? fallbackDate,
        amount: input.amount,
        category,
        name,
        billNo: input.billNo ?? null,
        notes: input.notes ?? null,
        employeeId,
        employeeTxType,
        paymentMethod: input.paymentMethod ?? null,
        assignmentId: null,
        reference: input.reference ?? null,
    };
}

export async function createTransaction(
    store: Store,
    input: CreateTransactionInput,
    today: string = todayIsoDate()
): Promise<Transaction> {
    const changes = await resolveChanges(store, input.type, input, today);
    const data: NewTransaction = { type: input.type, ...changes };
    const tx = await store.transactions.create(data);

    ledgerLogger.info(
        { txId: tx.id, type: tx.type, amount: tx.amount, category: tx.category, employeeId: tx.employeeId },
        'Transaction created'
    );
    return tx;
}

/** `type` never changes; a missing or deleted row is NotFound */
export async function updateTransaction(store: Store, id: number, input: UpdateTransactionInput): Promise<Transaction> {
    const existing = await store.transactions.findById(id);
    if (!existing || existing.isDeleted) {
        throw new NotFoundError('Transaction not found', 'Transaction', id);
    }

    const changes = await resolveChanges(store, existing.type, input, existing.date);
    const updated = await store.transactions.update(id, { ...changes, assignmentId: existing.assignmentId });
    if (!updated) throw new NotFoundError('Transaction not found', 'Transaction', id);

    ledgerLogger.info({ txId: id, amount: updated.amount, category: updated.category }, 'Transaction updated');
    return updated;
}

export async function softDeleteTransaction(store: Store, id: number): Promise<void> {
    const deleted = await store.transactions.markDeleted(id);
    if (!deleted) throw new NotFoundError('Transaction not found', 'Transaction', id);
    ledgerLogger.info({ txId: id }, 'Transaction soft-deleted');
}
