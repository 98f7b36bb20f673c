/**
 * @module routes/admin
 * @description Maintenance operations behind the admin login
 *
 * POST /seed              - re-run the catalog seeder (needs SEED_TOKEN)
 * POST /backfill-employees - create employees for outgoing names, link rows
 * GET  /unique-names.csv   - distinct (name, category) pairs with counts
 */

import { Router } from 'express';
import { SeedRequestSchema } from '@workshop-ledger/shared';
import { env } from '../config/env.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { ensureCatalog } from '../services/catalogSeeder.js';
import { backfillEmployeesFromTransactions } from '../services/employeeLedger.js';
import { UNIQUE_NAMES_CSV_HEADERS, uniqueNameCsvRows } from '../services/reports/index.js';
import { sendCsv } from '../utils/csvResponse.js';
import { ForbiddenError, NotFoundError } from '../utils/errors.js';
import { catalogLogger } from '../utils/logger.js';

const router: Router = Router();

// ============================================
// CATALOG SEED
// ============================================

router.post(
    '/seed',
    ...typedRoute(SeedRequestSchema, async (body, req, res) => {
        if (!env.SEED_TOKEN) {
            throw new NotFoundError('Seeding is disabled');
        }
        if (body.token !== env.SEED_TOKEN) {
            catalogLogger.warn({ requestId: req.id }, 'Seed rejected: wrong token');
            throw new ForbiddenError('Invalid seed token');
        }
        res.json(await ensureCatalog(req.store));
    })
);

// ============================================
// DATA MAINTENANCE
// ============================================

router.post(
    '/backfill-employees',
    asyncHandler(async (req, res) => {
        res.json(await backfillEmployeesFromTransactions(req.store));
    })
);

router.get(
    '/unique-names.csv',
    asyncHandler(async (req, res) => {
        const rows = await uniqueNameCsvRows(req.store);
        await sendCsv(res, 'transactions-unique.csv', UNIQUE_NAMES_CSV_HEADERS, rows);
    })
);

export default router;
