/**
 * Transaction filters
 *
 * One normalized filter shape shared by listing, totals, reports and exports.
 * The server compiles it to SQL; `matchesTransactionFilter` is the same
 * predicate in memory.
 */

import { isTxType, type TxType } from '../constants.js';

/** Raw query-string style input */
export interface TransactionFilterInput {
    from?: string | null;
    to?: string | null;
    type?: string | null;
    category?: string | null;
    name?: string | null;
    q?: string | null;
    includeDeleted?: boolean;
}

export interface TransactionFilter {
    from: string | null;
    to: string | null;
    type: TxType | null;
    category: string | null;
    name: string | null;
    q: string | null;
    includeDeleted: boolean;
}

export interface FilterableTransaction {
    type: TxType;
    date: string;
    amount: number;
    category: string;
    name: string | null;
    billNo: string | null;
    notes: string | null;
    isDeleted: boolean;
}

export interface TransactionTotals {
    incoming: number;
    outgoing: number;
    net: number;
}

function trimToNull(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

/** Whitespace-only → null; anything else is matched exactly as typed */
function blankToNull(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    return value.trim() === '' ? null : value;
}

/**
 * Blank values become null and dates and type are trimmed. Category,
 * name and search text keep their spaces. A reversed date range is
 * swapped and an unknown type dropped.
 */
export function normalizeTransactionFilter(input: TransactionFilterInput = {}): TransactionFilter {
    let from = trimToNull(input.from);
    let to = trimToNull(input.to);
    if (from !== null && to !== null && from > to) {
        [from, to] = [to, from];
    }
    const type = trimToNull(input.type);
    return {
        from,
        to,
        type: isTxType(type) ? type : null,
        category: blankToNull(input.category),
        name: blankToNull(input.name),
        q: blankToNull(input.q),
        includeDeleted: input.includeDeleted ?? false,
    };
}

function containsIgnoreCase(haystack: string | null, needle: string): boolean {
    return haystack !== null && haystack.toLowerCase().includes(needle.toLowerCase());
}

export function matchesTransactionFilter(tx: FilterableTransaction, filter: TransactionFilter): boolean {
    if (!filter.includeDeleted && tx.isDeleted) return false;
    if (filter.from !== null && tx.date < filter.from) return false;
    if (filter.to !== null && tx.date > filter.to) return false;
    if (filter.type !== null && tx.type !== filter.type) return false;
    if (filter.category !== null && tx.category !== filter.category) return false;
    if (filter.name !== null && !containsIgnoreCase(tx.name, filter.name)) return false;
    if (filter.q !== null) {
        const q = filter.q;
        const hit = [tx.notes, tx.billNo, tx.category, tx.name].some((field) => containsIgnoreCase(field, q));
        if (!hit) return false;
    }
    return true;
}

export function computeTotals(txs: readonly Pick<FilterableTransaction, 'type' | 'amount'>[]): TransactionTotals {
    let incoming = 0;
    let outgoing = 0;
    for (const tx of txs) {
        if (tx.type === 'incoming') incoming += tx.amount;
        else outgoing += tx.amount;
    }
    return { incoming, outgoing, net: incoming - outgoing };
}

/** Ordering used by every transaction listing: date desc, then id desc */
export function compareNewestFirst(a: { date: string; id: number }, b: { date: string; id: number }): number {
    if (a.date !== b.date) return a.date < b.date ? 1 : -1;
    return b.id - a.id;
}

/** "Filters: Type=outgoing, Name=ali" for report headers; null when nothing is applied */
export function describeFilter(filter: TransactionFilter): string | null {
    const applied: string[] = [];
    if (filter.type) applied.push(`Type=${filter.type}`);
    if (filter.category) applied.push(`Category=${filter.category}`);
    if (filter.name) applied.push(`Name=${filter.name}`);
    if (filter.q) applied.push(`Search=${filter.q}`);
    return applied.length > 0 ? `Filters: ${applied.join(', ')}` : null;
}

export function describePeriod(filter: Pick<TransactionFilter, 'from' | 'to'>): string {
    if (filter.from === null && filter.to === null) return 'All dates';
    return `From ${filter.from ?? '...'} to ${filter.to ?? '...'}`;
}
