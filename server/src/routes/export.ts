/**
 * Export Routes
 *
 * GET /transactions.csv  - filtered transactions as CSV
 * GET /transactions.pdf  - cashflow summary and transaction table as PDF
 *
 * Both take the report query string (filters or a period).
 */

import { Router } from 'express';
import { ReportQuerySchema, todayIsoDate } from '@workshop-ledger/shared';
import { env } from '../config/env.js';
import { typedQueryRoute } from '../middleware/asyncHandler.js';
import {
    TRANSACTION_CSV_HEADERS,
    buildTransactionsPdf,
    resolveReportFilter,
    transactionCsvRows,
} from '../services/reports/index.js';
import { sendCsv } from '../utils/csvResponse.js';

const router: Router = Router();

router.get(
    '/transactions.csv',
    ...typedQueryRoute(ReportQuerySchema, async (query, req, res) => {
        const rows = await transactionCsvRows(req.store, resolveReportFilter(query));
        await sendCsv(res, `transactions-${todayIsoDate()}.csv`, TRANSACTION_CSV_HEADERS, rows);
    })
);

router.get(
    '/transactions.pdf',
    ...typedQueryRoute(ReportQuerySchema, async (query, req, res) => {
        const pdf = await buildTransactionsPdf(req.store, resolveReportFilter(query), env.REPORT_TITLE);
        res.setHeader('Content-Type', 'application/pdf');
        res.setHeader('Content-Disposition', `attachment; filename=transactions-${todayIsoDate()}.pdf`);
        res.send(pdf);
    })
);

export default router;
