/**
 * Cashflow Report
 *
 * Transactions, totals, a daily series and outgoing-by-category for one
 * filter. A `period` (daily / weekly / monthly around `anchor`) replaces
 * the from/to bounds when given. The daily summary is the landing view:
 * today, the current Saturday to Thursday week and the latest entries.
 */

import {
    LIST_LIMITS,
    REPORT_SERIES_DAYS,
    buildDailySeries,
    describeFilter,
    describePeriod,
    expenseBreakdown,
    normalizeTransactionFilter,
    outgoingByCategory,
    periodRange,
    todayIsoDate,
    trimSeries,
    type CategoryAmount,
    type DailySeries,
    type DateRange,
    type ReportQuery,
    type Transaction,
    type TransactionFilter,
    type TransactionTotals,
} from '@workshop-ledger/shared';
import type { Store } from '../../db/store.js';

export interface CashflowReport {
    filter: TransactionFilter;
    periodLabel: string;
    filterLabel: string | null;
    transactions: Transaction[];
    totals: TransactionTotals;
    series: DailySeries;
    byCategory: CategoryAmount[];
    breakdown: CategoryAmount[];
}

export interface DailySummary {
    date: string;
    today: TransactionTotals;
    week: DateRange & { totals: TransactionTotals };
    recent: Transaction[];
}

export function resolveReportFilter(query: ReportQuery, today: string = todayIsoDate()): TransactionFilter {
    const range = query.period ? periodRange(query.period, query.anchor ?? today) : null;
    return normalizeTransactionFilter({
        from: range ? range.start : query.from,
        to: range ? range.end : query.to,
        type: query.type,
        category: query.category,
        name: query.name,
        q: query.q,
    });
}

export async function buildCashflowReport(
    store: Store,
    filter: TransactionFilter,
    options: { limit?: number; seriesDays?: number } = {}
): Promise<CashflowReport> {
    const transactions = await store.transactions.list(filter, options.limit ?? LIST_LIMITS.reportTransactions);
    const totals = await store.transactions.totals(filter);
    const byCategory = outgoingByCategory(transactions);

    return {
        filter,
        periodLabel: describePeriod(filter),
        filterLabel: describeFilter(filter),
        transactions,
        totals,
        series: trimSeries(buildDailySeries(transactions), options.seriesDays ?? REPORT_SERIES_DAYS),
        byCategory,
        breakdown: expenseBreakdown(byCategory),
    };
}

export async function buildDailySummary(store: Store, today: string = todayIsoDate()): Promise<DailySummary> {
    const day = periodRange('daily', today);
    const week = periodRange('weekly', today);

    const todayTotals = await store.transactions.totals(normalizeTransactionFilter({ from: day.start, to: day.end }));
    const weekTotals = await store.transactions.totals(normalizeTransactionFilter({ from: week.start, to: week.end }));
    const recent = await store.transactions.list(normalizeTransactionFilter(), LIST_LIMITS.recentTransactions);

    return { date: today, today: todayTotals, week: { ...week, totals: weekTotals }, recent };
}
