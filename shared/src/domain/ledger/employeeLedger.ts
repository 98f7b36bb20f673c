/**
 * Employee Ledger
 *
 * Advance vs. salary bookkeeping over an employee's outgoing transactions.
 *
 * An outgoing transaction belongs to an employee when it is linked by
 * `employeeId`, or when it is unlinked and its name matches the employee's
 * full name after trim + lowercase. The name fallback covers rows entered
 * before employees existed; two people sharing a name will be merged.
 *
 * Signs:
 *   advance            → debit, raises what the employee owes
 *   salary / per_work  → credit, pays it down
 *   untyped            → credit
 */

import type { EmployeeTxType, TxType } from '../constants.js';

export interface LedgerTransaction {
    id: number;
    type: TxType;
    date: string;
    amount: number;
    name: string | null;
    employeeId: number | null;
    employeeTxType: EmployeeTxType | null;
    isDeleted: boolean;
}

export interface EmployeeFinancialSummary {
    advanceTotal: number;
    paidTotal: number;
    /** max(0, advanceTotal - paidTotal) */
    advanceBalance: number;
    count: number;
}

export interface LedgerRow<T extends LedgerTransaction = LedgerTransaction> {
    transaction: T;
    debit: number;
    credit: number;
    /** Running balance; may go negative in the row view */
    balance: number;
}

export const EMPTY_FINANCIAL_SUMMARY: EmployeeFinancialSummary = {
    advanceTotal: 0,
    paidTotal: 0,
    advanceBalance: 0,
    count: 0,
};

export function normalizePersonName(name: string | null | undefined): string {
    return (name ?? '').trim().toLowerCase();
}

export function belongsToEmployee(
    tx: LedgerTransaction,
    employee: { id: number; fullName: string }
): boolean {
    if (tx.isDeleted || tx.type !== 'outgoing') return false;
    if (tx.employeeId === employee.id) return true;
    return (
        tx.employeeId === null &&
        tx.name !== null &&
        normalizePersonName(tx.name) === normalizePersonName(employee.fullName)
    );
}

export function isAdvance(tx: Pick<LedgerTransaction, 'employeeTxType'>): boolean {
    return tx.employeeTxType === 'advance';
}

export function summarizeEmployeeTransactions(txs: readonly LedgerTransaction[]): EmployeeFinancialSummary {
    let advanceTotal = 0;
    let paidTotal = 0;
    for (const tx of txs) {
        if (isAdvance(tx)) advanceTotal += tx.amount;
        else paidTotal += tx.amount;
    }
    return {
        advanceTotal,
        paidTotal,
        advanceBalance: Math.max(0, advanceTotal - paidTotal),
        count: txs.length,
    };
}

/** Rows keep the input order; callers pass them date asc, id asc. */
export function buildEmployeeLedger<T extends LedgerTransaction>(txs: readonly T[]): LedgerRow<T>[] {
    let running = 0;
    return txs.map((transaction) => {
        if (isAdvance(transaction)) {
            running += transaction.amount;
            return { transaction, debit: transaction.amount, credit: 0, balance: running };
        }
        running -= transaction.amount;
        return { transaction, debit: 0, credit: transaction.amount, balance: running };
    });
}

/** Sort comparator for ledger order: date asc, then id asc */
export function compareLedgerOrder(a: { date: string; id: number }, b: { date: string; id: number }): number {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    return a.id - b.id;
}
