/**
 * Unit tests for transaction filters, totals and form rules
 */

import {
    compareNewestFirst,
    computeTotals,
    describeFilter,
    describePeriod,
    matchesTransactionFilter,
    normalizeTransactionFilter,
    type FilterableTransaction,
} from '../transactions/filters.js';
import {
    employeeOutgoingCategory,
    hasFieldErrors,
    mapToEmployeeCategory,
    validateTransactionDraft,
} from '../transactions/validation.js';

function row(overrides: Partial<FilterableTransaction> = {}): FilterableTransaction {
    return {
        type: 'outgoing',
        date: '2024-05-10',
        amount: 1000,
        category: 'Rent',
        name: null,
        billNo: null,
        notes: null,
        isDeleted: false,
        ...overrides,
    };
}

describe('normalizeTransactionFilter', () => {
    it('swaps a reversed date range', () => {
        const f = normalizeTransactionFilter({ from: '2024-05-31', to: '2024-05-01' });
        expect(f.from).toBe('2024-05-01');
        expect(f.to).toBe('2024-05-31');
    });

    it('ignores an unknown type and blank strings', () => {
        const f = normalizeTransactionFilter({ type: 'refund', category: '  ', name: '' });
        expect(f).toEqual({
            from: null,
            to: null,
            type: null,
            category: null,
            name: null,
            q: null,
            includeDeleted: false,
        });
    });

    it('trims dates and type but keeps the spaces in text filters', () => {
        const f = normalizeTransactionFilter({ from: ' 2024-05-01 ', type: ' incoming ', name: ' ali ', q: 'b- ' });
        expect(f).toMatchObject({ from: '2024-05-01', type: 'incoming', name: ' ali ', q: 'b- ' });
    });
});

describe('matchesTransactionFilter', () => {
    it('excludes deleted rows unless includeDeleted', () => {
        const deleted = row({ isDeleted: true });
        expect(matchesTransactionFilter(deleted, normalizeTransactionFilter())).toBe(false);
        expect(matchesTransactionFilter(deleted, normalizeTransactionFilter({ includeDeleted: true }))).toBe(true);
    });

    it('applies inclusive date bounds', () => {
        const f = normalizeTransactionFilter({ from: '2024-05-10', to: '2024-05-10' });
        expect(matchesTransactionFilter(row(), f)).toBe(true);
        expect(matchesTransactionFilter(row({ date: '2024-05-11' }), f)).toBe(false);
    });

    it('matches name as a case-insensitive substring', () => {
        const f = normalizeTransactionFilter({ name: 'ALI' });
        expect(matchesTransactionFilter(row({ name: 'Muhammad Ali' }), f)).toBe(true);
        expect(matchesTransactionFilter(row({ name: null }), f)).toBe(false);
    });

    it('searches q across notes, bill number, category and name', () => {
        const f = normalizeTransactionFilter({ q: 'b-12' });
        expect(matchesTransactionFilter(row({ billNo: 'B-1201' }), f)).toBe(true);
        expect(matchesTransactionFilter(row({ notes: 'paid for b-12 order' }), f)).toBe(true);
        expect(matchesTransactionFilter(row(), f)).toBe(false);
    });

    it('requires an exact category match', () => {
        const f = normalizeTransactionFilter({ category: 'Rent' });
        expect(matchesTransactionFilter(row({ category: 'Rent' }), f)).toBe(true);
        expect(matchesTransactionFilter(row({ category: 'Rental' }), f)).toBe(false);
    });
});

describe('computeTotals', () => {
    it('returns zeros when empty', () => {
        expect(computeTotals([])).toEqual({ incoming: 0, outgoing: 0, net: 0 });
    });

    it('sums by type and computes net', () => {
        expect(
            computeTotals([
                { type: 'incoming', amount: 5000 },
                { type: 'outgoing', amount: 1200 },
                { type: 'outgoing', amount: 300 },
            ])
        ).toEqual({ incoming: 5000, outgoing: 1500, net: 3500 });
    });
});

describe('compareNewestFirst', () => {
    it('orders by date desc then id desc', () => {
        const sorted = [
            { id: 1, date: '2024-05-01' },
            { id: 3, date: '2024-05-02' },
            { id: 2, date: '2024-05-02' },
        ].sort(compareNewestFirst);
        expect(sorted.map((r) => r.id)).toEqual([3, 2, 1]);
    });
});

describe('describeFilter / describePeriod', () => {
    it('lists applied filters', () => {
        expect(describeFilter(normalizeTransactionFilter({ type: 'outgoing', name: 'ali' }))).toBe(
            'Filters: Type=outgoing, Name=ali'
        );
        expect(describeFilter(normalizeTransactionFilter())).toBeNull();
    });

    it('describes the date range', () => {
        expect(describePeriod({ from: null, to: null })).toBe('All dates');
        expect(describePeriod({ from: '2024-05-01', to: null })).toBe('From 2024-05-01 to ...');
    });
});

describe('validateTransactionDraft', () => {
    it('accepts a billed client payment', () => {
        const errors = validateTransactionDraft({ type: 'incoming', category: 'Client', amount: 500, billNo: 'B-1' });
        expect(hasFieldErrors(errors)).toBe(false);
    });

    it('requires a bill number for Client', () => {
        expect(validateTransactionDraft({ type: 'incoming', category: 'Client', amount: 500, billNo: '  ' })).toEqual({
            billNo: 'Bill Number is required for Client payments.',
        });
    });

    it('rejects non-positive amounts and unknown categories', () => {
        expect(validateTransactionDraft({ type: 'outgoing', category: 'Holiday', amount: 0 })).toEqual({
            amount: 'Amount must be greater than 0.',
            category: 'Invalid outgoing category.',
        });
    });

    it('rejects an outgoing category on an incoming transaction', () => {
        expect(validateTransactionDraft({ type: 'incoming', category: 'Rent', amount: 10 })).toEqual({
            category: 'Invalid incoming source.',
        });
    });
});

describe('employee category mapping', () => {
    it('derives the outgoing category from the employee category', () => {
        expect(employeeOutgoingCategory('Factory Worker (Karkhanay Wala)')).toBe('Karkhanay Wala');
        expect(employeeOutgoingCategory('Polish Worker')).toBe('Polish Wala');
        expect(employeeOutgoingCategory('Upholstery / Poshish Worker')).toBe('Poshish Wala');
        expect(employeeOutgoingCategory('Helper / Mazdoor')).toBe('Employee');
    });

    it('maps a transaction category back to an employee category', () => {
        expect(mapToEmployeeCategory('Karkhanay Wala')).toBe('Factory Worker (Karkhanay Wala)');
        expect(mapToEmployeeCategory('Polish Wala')).toBe('Polish Worker');
        expect(mapToEmployeeCategory('Poshish Wala')).toBe('Upholstery / Poshish Worker');
        expect(mapToEmployeeCategory('Employee')).toBe('Helper / Mazdoor');
    });
});
