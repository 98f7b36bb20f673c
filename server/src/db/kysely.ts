/**
 * Kysely Query Builder Configuration
 *
 * One pooled Kysely instance per process (pg.Pool underneath).
 *
 * Usage:
 *   import { getKysely } from '../db/kysely.js';
 *
 *   const rows = await getKysely()
 *     .selectFrom('transactions')
 *     .select(['id', 'amount'])
 *     .where('isDeleted', '=', false)
 *     .execute();
 */

import {
    CamelCasePlugin,
    DummyDriver,
    Kysely,
    PostgresAdapter,
    PostgresDialect,
    PostgresIntrospector,
    PostgresQueryCompiler,
} from 'kysely';
import pg from 'pg';
import type { Database } from './types.js';

const { Pool, types } = pg;

/** pg type OID for DATE */
const PG_DATE_OID = 1082;

// Calendar dates stay `YYYY-MM-DD` strings instead of local-midnight Date objects
types.setTypeParser(PG_DATE_OID, (value: string) => value);

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<Database>;

let instance: KyselyDB | null = null;

/**
 * Create (or return) the process-wide Kysely instance.
 */
export function createKysely(connectionString: string): KyselyDB {
    if (instance) return instance;

    const pool = new Pool({
        connectionString,
        max: 10,
    });

    instance = new Kysely<Database>({
        dialect: new PostgresDialect({ pool }),
        plugins: [new CamelCasePlugin()],
    });

    return instance;
}

/**
 * Get the Kysely instance (must call createKysely first)
 */
export function getKysely(): KyselyDB {
    if (!instance) {
        throw new Error('Kysely not initialized. Call createKysely first.');
    }
    return instance;
}

/**
 * Close the pool. Safe to call when nothing was created.
 */
export async function destroyKysely(): Promise<void> {
    if (!instance) return;
    const current = instance;
    instance = null;
    await current.destroy();
}

/**
 * Kysely that compiles Postgres SQL but never connects.
 * Used to inspect generated queries without a database.
 */
export function createCompileOnlyKysely(): KyselyDB {
    return new Kysely<Database>({
        dialect: {
            createDriver: () => new DummyDriver(),
            createAdapter: () => new PostgresAdapter(),
            createIntrospector: (db) => new PostgresIntrospector(db),
            createQueryCompiler: () => new PostgresQueryCompiler(),
        },
        plugins: [new CamelCasePlugin()],
    });
}
