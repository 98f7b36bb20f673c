/**
 * Apply pending schema migrations.
 *
 * Run: npm run migrate --workspace @workshop-ledger/server
 */

import { env } from '../config/env.js';
import { createKysely, destroyKysely } from '../db/kysely.js';
import { migrateToLatest } from '../db/migrator.js';
import logger from '../utils/logger.js';

async function migrate(): Promise<void> {
    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is required');
    }
    const result = await migrateToLatest(createKysely(env.DATABASE_URL));
    logger.info({ applied: result.results?.length ?? 0 }, 'Migrations up to date');
}

migrate()
    .catch((error: unknown) => {
        logger.fatal({ error }, 'Migration failed');
        process.exitCode = 1;
    })
    .then(() => destroyKysely())
    .catch((error: unknown) => {
        logger.error({ error }, 'Failed to close the database pool');
        process.exitCode = 1;
    });
