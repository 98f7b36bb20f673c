/**
 * Cash flow aggregation
 *
 * Daily incoming/outgoing series with a cumulative net line, and the
 * outgoing-by-category breakdown used by the reports page and the PDF.
 */

import type { TxType } from '../constants.js';

export interface CashflowInput {
    type: TxType;
    date: string;
    amount: number;
    category: string;
}

export interface DailySeries {
    labels: string[];
    incoming: number[];
    outgoing: number[];
    cumulativeNet: number[];
}

export interface CategoryAmount {
    category: string;
    amount: number;
}

/** Days kept in the on-screen chart */
export const REPORT_SERIES_DAYS = 31;
/** Days kept in the PDF chart */
export const PDF_SERIES_DAYS = 14;
/** Named slices before the rest is folded into "Other" */
export const EXPENSE_BREAKDOWN_SLICES = 6;

export function buildDailySeries(txs: readonly CashflowInput[]): DailySeries {
    const byDay = new Map<string, { incoming: number; outgoing: number }>();
    for (const tx of txs) {
        const bucket = byDay.get(tx.date) ?? { incoming: 0, outgoing: 0 };
        bucket[tx.type] += tx.amount;
        byDay.set(tx.date, bucket);
    }

    const labels = [...byDay.keys()].sort();
    const incoming: number[] = [];
    const outgoing: number[] = [];
    const cumulativeNet: number[] = [];
    let running = 0;
    for (const label of labels) {
        const bucket = byDay.get(label) ?? { incoming: 0, outgoing: 0 };
        incoming.push(bucket.incoming);
        outgoing.push(bucket.outgoing);
        running += bucket.incoming - bucket.outgoing;
        cumulativeNet.push(running);
    }
    return { labels, incoming, outgoing, cumulativeNet };
}

/** Keep the last `days` points; the cumulative values are not rebased */
export function trimSeries(series: DailySeries, days: number): DailySeries {
    if (series.labels.length <= days) return series;
    return {
        labels: series.labels.slice(-days),
        incoming: series.incoming.slice(-days),
        outgoing: series.outgoing.slice(-days),
        cumulativeNet: series.cumulativeNet.slice(-days),
    };
}

/** Outgoing totals per category, largest first (ties by name) */
export function outgoingByCategory(txs: readonly CashflowInput[]): CategoryAmount[] {
    const totals = new Map<string, number>();
    for (const tx of txs) {
        if (tx.type !== 'outgoing') continue;
        totals.set(tx.category, (totals.get(tx.category) ?? 0) + tx.amount);
    }
    return [...totals.entries()]
        .map(([category, amount]) => ({ category, amount }))
        .sort((a, b) => b.amount - a.amount || a.category.localeCompare(b.category));
}

export function expenseBreakdown(
    byCategory: readonly CategoryAmount[],
    slices: number = EXPENSE_BREAKDOWN_SLICES
): CategoryAmount[] {
    const top = byCategory.slice(0, slices);
    const otherSum = byCategory.slice(slices).reduce((sum, row) => sum + row.amount, 0);
    return otherSum > 0 ? [...top, { category: 'Other', amount: otherSum }] : [...top];
}
