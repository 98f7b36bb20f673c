/**
 * Seed the reference catalog (categories, bed sizes, thicknesses, foam
 * brands and models). Safe to run repeatedly.
 *
 * Run: npm run seed --workspace @workshop-ledger/server
 */

import { env } from '../config/env.js';
import { createKysely, destroyKysely } from '../db/kysely.js';
import { createKyselyStore } from '../db/kyselyStore.js';
import { ensureCatalog } from '../services/catalogSeeder.js';
import logger from '../utils/logger.js';

async function seed(): Promise<void> {
    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is required');
    }
    const summary = await ensureCatalog(createKyselyStore(createKysely(env.DATABASE_URL)));
    logger.info(summary, 'Catalog seeded');
}

seed()
    .catch((error: unknown) => {
        logger.fatal({ error }, 'Seeding failed');
        process.exitCode = 1;
    })
    .then(() => destroyKysely())
    .catch((error: unknown) => {
        logger.error({ error }, 'Failed to close the database pool');
        process.exitCode = 1;
    });
