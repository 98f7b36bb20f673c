/**
 * Small SQL helpers shared by the Kysely repositories.
 */

import { sql, type RawBuilder } from 'kysely';
import { DEFAULT_LOW_STOCK_THRESHOLD } from '@workshop-ledger/shared';
import { ConflictError } from '../../utils/errors.js';

/** Escape `%`, `_` and `\` for a LIKE/ILIKE pattern */
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** `%value%` with wildcards in `value` escaped */
export function containsPattern(value: string): string {
    return `%${escapeLike(value)}%`;
}

/** pg returns sum()/count() as strings (int8/numeric) */
export function toNumber(value: string | number | bigint | null | undefined): number {
    if (value === null || value === undefined) return 0;
    return Number(value);
}

/**
 * Variant low rule as SQL over `qty_on_hand` / `reorder_level` of the
 * current table. Mirrors `isLowStock` in the shared package.
 */
export function lowStockCondition(): RawBuilder<boolean> {
    return sql<boolean>`(case when ${sql.ref('reorderLevel')} > 0 then ${sql.ref('qtyOnHand')} <= ${sql.ref('reorderLevel')} else ${sql.ref('qtyOnHand')} < ${DEFAULT_LOW_STOCK_THRESHOLD} end)`;
}

/**
 * Find-or-create against a unique index.
 *
 * `insert` must use `ON CONFLICT DO NOTHING` and resolve undefined when it
 * hit the index; the row another writer created is then read back. No
 * error is raised, so an enclosing transaction stays usable.
 */
export async function findOrInsert<T>(
    find: () => Promise<T | undefined>,
    insert: () => Promise<T | undefined>
): Promise<{ row: T; created: boolean }> {
    const existing = await find();
    if (existing) return { row: existing, created: false };

    const inserted = await insert();
    if (inserted) return { row: inserted, created: true };

    const winner = await find();
    if (!winner) {
        throw new ConflictError('Insert conflicted but no matching row was found', 'unique');
    }
    return { row: winner, created: false };
}
