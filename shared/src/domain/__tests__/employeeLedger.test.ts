/**
 * Unit tests for employee ledger math
 */

import {
    belongsToEmployee,
    buildEmployeeLedger,
    compareLedgerOrder,
    normalizePersonName,
    summarizeEmployeeTransactions,
    type LedgerTransaction,
} from '../ledger/employeeLedger.js';

function tx(overrides: Partial<LedgerTransaction> & { id: number }): LedgerTransaction {
    return {
        type: 'outgoing',
        date: '2024-05-01',
        amount: 0,
        name: null,
        employeeId: null,
        employeeTxType: null,
        isDeleted: false,
        ...overrides,
    };
}

describe('normalizePersonName', () => {
    it('trims and lowercases', () => {
        expect(normalizePersonName('  Ali Raza ')).toBe('ali raza');
        expect(normalizePersonName(null)).toBe('');
    });
});

describe('belongsToEmployee', () => {
    const employee = { id: 7, fullName: 'ali' };

    it('matches linked transactions', () => {
        expect(belongsToEmployee(tx({ id: 1, employeeId: 7 }), employee)).toBe(true);
    });

    it('matches unlinked transactions by trimmed, case-insensitive name', () => {
        expect(belongsToEmployee(tx({ id: 1, name: 'Ali ' }), employee)).toBe(true);
    });

    it('does not use the name when the row is linked to someone else', () => {
        expect(belongsToEmployee(tx({ id: 1, name: 'Ali', employeeId: 8 }), employee)).toBe(false);
    });

    it('ignores incoming and deleted rows', () => {
        expect(belongsToEmployee(tx({ id: 1, employeeId: 7, type: 'incoming' }), employee)).toBe(false);
        expect(belongsToEmployee(tx({ id: 1, employeeId: 7, isDeleted: true }), employee)).toBe(false);
    });
});

describe('summarizeEmployeeTransactions', () => {
    it('returns zeros for no transactions', () => {
        expect(summarizeEmployeeTransactions([])).toEqual({
            advanceTotal: 0,
            paidTotal: 0,
            advanceBalance: 0,
            count: 0,
        });
    });

    it('counts untyped payments as paid', () => {
        const summary = summarizeEmployeeTransactions([
            tx({ id: 1, amount: 5000, employeeTxType: 'advance' }),
            tx({ id: 2, amount: 1000, employeeTxType: 'salary' }),
            tx({ id: 3, amount: 500, employeeTxType: 'per_work' }),
            tx({ id: 4, amount: 700 }),
        ]);
        expect(summary).toEqual({ advanceTotal: 5000, paidTotal: 2200, advanceBalance: 2800, count: 4 });
    });

    it('floors the advance balance at zero', () => {
        const summary = summarizeEmployeeTransactions([
            tx({ id: 1, amount: 500, employeeTxType: 'advance' }),
            tx({ id: 2, amount: 2000, employeeTxType: 'salary' }),
        ]);
        expect(summary.advanceBalance).toBe(0);
        expect(summary.paidTotal).toBe(2000);
    });
});

describe('buildEmployeeLedger', () => {
    it('produces debit/credit rows with a running balance that may go negative', () => {
        const rows = buildEmployeeLedger([
            tx({ id: 1, date: '2024-05-01', amount: 500, employeeTxType: 'advance' }),
            tx({ id: 2, date: '2024-05-02', amount: 200, employeeTxType: 'salary' }),
            tx({ id: 3, date: '2024-05-03', amount: 600, employeeTxType: 'per_work' }),
        ]);
        expect(rows.map((r) => [r.debit, r.credit, r.balance])).toEqual([
            [500, 0, 500],
            [0, 200, 300],
            [0, 600, -300],
        ]);
    });
});

describe('compareLedgerOrder', () => {
    it('sorts by date ascending then id ascending', () => {
        const sorted = [
            { id: 9, date: '2024-05-02' },
            { id: 4, date: '2024-05-01' },
            { id: 2, date: '2024-05-02' },
        ].sort(compareLedgerOrder);
        expect(sorted.map((r) => r.id)).toEqual([4, 2, 9]);
    });
});
