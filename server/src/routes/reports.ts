import { Router } from 'express';
import { DailySummaryQuerySchema, ReportQuerySchema } from '@workshop-ledger/shared';
import { typedQueryRoute } from '../middleware/asyncHandler.js';
import { buildCashflowReport, buildDailySummary, resolveReportFilter } from '../services/reports/index.js';

const router: Router = Router();

// ============================================
// CASHFLOW
// ============================================

/**
 * GET /cashflow
 * Totals, daily series (last 31 days) and outgoing by category.
 * `period=daily|weekly|monthly` with optional `anchor` replaces from/to.
 */
router.get(
    '/cashflow',
    ...typedQueryRoute(ReportQuerySchema, async (query, req, res) => {
        res.json(await buildCashflowReport(req.store, resolveReportFilter(query)));
    })
);

/**
 * GET /daily
 * Today's totals, the Saturday to Thursday week so far and the ten latest
 * entries. `date` moves "today".
 */
router.get(
    '/daily',
    ...typedQueryRoute(DailySummaryQuerySchema, async (query, req, res) => {
        res.json(await buildDailySummary(req.store, query.date));
    })
);

export default router;
