/**
 * Schema migrations
 *
 * Migrations are bundled in code (no directory scan) so the compiled
 * server and the TypeScript sources migrate the same way.
 */

import { Migrator, type Kysely, type Migration, type MigrationResultSet } from 'kysely';
import * as initial from './migrations/0001_initial.js';
import { DatabaseError } from '../utils/errors.js';
import { dbLogger } from '../utils/logger.js';

const MIGRATIONS: Record<string, Migration> = {
    '0001_initial': initial,
};

export function createMigrator<DB>(db: Kysely<DB>): Migrator {
    return new Migrator({
        db,
        provider: {
            getMigrations: async () => MIGRATIONS,
        },
    });
}

/**
 * Apply every pending migration. Throws on the first failure.
 */
export async function migrateToLatest<DB>(db: Kysely<DB>): Promise<MigrationResultSet> {
    const resultSet = await createMigrator(db).migrateToLatest();

    for (const result of resultSet.results ?? []) {
        if (result.status === 'Success') {
            dbLogger.info({ migration: result.migrationName }, 'Migration applied');
        } else if (result.status === 'Error') {
            dbLogger.error({ migration: result.migrationName }, 'Migration failed');
        }
    }

    if (resultSet.error) {
        const cause = resultSet.error instanceof Error ? resultSet.error : null;
        throw new DatabaseError(cause ? `Migration failed: ${cause.message}` : 'Migration failed', cause);
    }
    return resultSet;
}
