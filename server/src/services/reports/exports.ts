/**
 * Exports
 *
 * CSV rows for the transactions and unique-names downloads (written by
 * fast-csv in the routes), and the PDF cashflow summary (jspdf).
 */

import { jsPDF } from 'jspdf';
import {
    LIST_LIMITS,
    PDF_SERIES_DAYS,
    formatAmount,
    type Transaction,
    type TransactionFilter,
} from '@workshop-ledger/shared';
import type { Store } from '../../db/store.js';
import { reportLogger } from '../../utils/logger.js';
import { buildCashflowReport, type CashflowReport } from './cashflow.js';

// ============================================
// CSV
// ============================================

export const TRANSACTION_CSV_HEADERS = ['ID', 'Date', 'Type', 'Category', 'Name', 'Bill No', 'Amount', 'Notes'] as const;

export const UNIQUE_NAMES_CSV_HEADERS = ['name', 'category', 'tx_count'] as const;

export type CsvRow = (string | number)[];

export function transactionCsvRow(tx: Transaction): CsvRow {
    return [tx.id, tx.date, tx.type, tx.category, tx.name ?? '', tx.billNo ?? '', tx.amount, tx.notes ?? ''];
}

export async function transactionCsvRows(store: Store, filter: TransactionFilter): Promise<CsvRow[]> {
    const transactions = await store.transactions.list(filter, LIST_LIMITS.exportTransactions);
    reportLogger.info({ rows: transactions.length }, 'Transactions CSV export');
    return transactions.map(transactionCsvRow);
}

/** Distinct (name, category) pairs over all types, most used first */
export async function uniqueNameCsvRows(store: Store): Promise<CsvRow[]> {
    const pairs = await store.transactions.nameCategoryCounts(null);
    reportLogger.info({ rows: pairs.length }, 'Unique names CSV export');
    return pairs.map((pair) => [pair.name, pair.category, pair.count]);
}

// ============================================
// PDF
// ============================================

/** Rows printed in the PDF transaction table */
export const PDF_TABLE_ROWS = 120;

export interface PdfDocumentModel {
    title: string;
    periodLine: string;
    filterLine: string | null;
    kpis: [label: string, value: string][];
    breakdown: string[];
    /** One line per day of the trimmed series */
    daily: string[];
    tableHeader: string[];
    tableRows: string[][];
}

function clip(value: string, max: number): string {
    return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

export function buildPdfModel(report: CashflowReport, title: string): PdfDocumentModel {
    return {
        title,
        periodLine: report.periodLabel,
        filterLine: report.filterLabel,
        kpis: [
            ['Incoming', formatAmount(report.totals.incoming)],
            ['Outgoing', formatAmount(report.totals.outgoing)],
            ['Net', formatAmount(report.totals.net)],
        ],
        breakdown: report.breakdown.map((row) => `${row.category}: ${formatAmount(row.amount)}`),
        daily: report.series.labels.map(
            (label, index) =>
                `${label}  In ${formatAmount(report.series.incoming[index] ?? 0)}  Out ${formatAmount(report.series.outgoing[index] ?? 0)}  Net ${formatAmount(report.series.cumulativeNet[index] ?? 0)}`
        ),
        tableHeader: ['Date', 'Type', 'Category', 'Name', 'Amount'],
        tableRows: report.transactions
            .slice(0, PDF_TABLE_ROWS)
            .map((tx) => [tx.date, tx.type, clip(tx.category, 22), clip(tx.name ?? '', 24), formatAmount(tx.amount)]),
    };
}

const PAGE_MARGIN = 40;
const LINE_HEIGHT = 16;
const TABLE_COLUMNS = [0, 70, 140, 280, 430];

export function renderPdf(model: PdfDocumentModel): Buffer {
    const doc = new jsPDF({ orientation: 'portrait', unit: 'pt', format: 'a4' });
    const pageHeight = doc.internal.pageSize.getHeight();
    let y = PAGE_MARGIN + 10;

    const nextLine = (height: number = LINE_HEIGHT): void => {
        y += height;
        if (y > pageHeight - PAGE_MARGIN) {
            doc.addPage();
            y = PAGE_MARGIN + 10;
        }
    };

    doc.setFontSize(16);
    doc.text(model.title, PAGE_MARGIN, y);
    nextLine(22);

    doc.setFontSize(10);
    doc.text(model.periodLine, PAGE_MARGIN, y);
    nextLine();
    if (model.filterLine) {
        doc.text(model.filterLine, PAGE_MARGIN, y);
        nextLine();
    }
    nextLine(6);

    doc.setFontSize(12);
    model.kpis.forEach(([label, value], index) => {
        doc.text(`${label}: ${value}`, PAGE_MARGIN + index * 170, y);
    });
    nextLine(24);

    if (model.breakdown.length > 0) {
        doc.setFontSize(11);
        doc.text('Expense breakdown', PAGE_MARGIN, y);
        nextLine();
        doc.setFontSize(10);
        for (const line of model.breakdown) {
            doc.text(line, PAGE_MARGIN + 10, y);
            nextLine();
        }
        nextLine(8);
    }

    if (model.daily.length > 0) {
        doc.setFontSize(11);
        doc.text('Daily cashflow', PAGE_MARGIN, y);
        nextLine();
        doc.setFontSize(9);
        for (const line of model.daily) {
            doc.text(line, PAGE_MARGIN + 10, y);
            nextLine(14);
        }
        nextLine(8);
    }

    doc.setFontSize(10);
    model.tableHeader.forEach((cell, index) => doc.text(cell, PAGE_MARGIN + (TABLE_COLUMNS[index] ?? 0), y));
    nextLine();
    doc.setFontSize(9);
    for (const row of model.tableRows) {
        row.forEach((cell, index) => doc.text(cell, PAGE_MARGIN + (TABLE_COLUMNS[index] ?? 0), y));
        nextLine(14);
    }

    return Buffer.from(doc.output('arraybuffer'));
}

export async function buildTransactionsPdf(store: Store, filter: TransactionFilter, title: string): Promise<Buffer> {
    const report = await buildCashflowReport(store, filter, {
        limit: LIST_LIMITS.exportTransactions,
        seriesDays: PDF_SERIES_DAYS,
    });
    const pdf = renderPdf(buildPdfModel(report, title));
    reportLogger.info({ rows: report.transactions.length, bytes: pdf.length }, 'Transactions PDF export');
    return pdf;
}
