/**
 * Kysely Stock Repository
 *
 * Quantity changes and the append-only movement log. The target table is
 * picked from the StockTarget kind through STOCK_TABLES; all five stocked
 * tables share the qty_on_hand / reorder_level / is_active columns.
 */

import { sql } from 'kysely';
import type { InventoryKind, StockMovement, StockTarget } from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import { STOCK_TABLES } from '../types.js';
import type { NewStockMovement, StockRepository, StockSummary } from '../store.js';
import { lowStockCondition, toNumber } from './sqlHelpers.js';

export class KyselyStockRepository implements StockRepository {
    constructor(private readonly db: KyselyDB) {}

    async applyDelta(target: StockTarget, delta: number): Promise<number | null> {
        // Single UPDATE so concurrent adjustments add up at the row level
        const row = await this.db
            .updateTable(STOCK_TABLES[target.kind])
            .set({
                qtyOnHand: sql<number>`${sql.ref('qtyOnHand')} + ${delta}`,
                updatedAt: new Date(),
            })
            .where('id', '=', target.id)
            .returning('qtyOnHand')
            .executeTakeFirst();
        return row ? row.qtyOnHand : null;
    }

    async recordMovement(data: NewStockMovement): Promise<StockMovement> {
        return this.db
            .insertInto('stockMovements')
            .values({
                inventoryType: data.target.kind,
                variantId: data.target.id,
                movementType: data.movementType,
                qtyChange: data.qtyChange,
                unitCost: data.unitCost,
                referenceType: data.referenceType,
                referenceId: data.referenceId,
                notes: data.notes,
            })
            .returningAll()
            .executeTakeFirstOrThrow();
    }

    async listMovements(limit: number): Promise<StockMovement[]> {
        return this.db.selectFrom('stockMovements').selectAll().orderBy('id', 'desc').limit(limit).execute();
    }

    async countMovementsSince(since: Date): Promise<number> {
        const row = await this.db
            .selectFrom('stockMovements')
            .select((eb) => eb.fn.countAll<string>().as('count'))
            .where('createdAt', '>=', since)
            .executeTakeFirst();
        return toNumber(row?.count);
    }

    async summarize(kind: InventoryKind): Promise<StockSummary> {
        const row = await this.db
            .selectFrom(STOCK_TABLES[kind])
            .select([
                sql<string>`count(*)`.as('rows'),
                sql<string>`count(*) filter (where ${lowStockCondition()})`.as('low'),
                sql<string>`coalesce(sum(${sql.ref('qtyOnHand')}), 0)`.as('units'),
            ])
            .where('isActive', '=', true)
            .executeTakeFirst();

        return {
            rows: toNumber(row?.rows),
            low: toNumber(row?.low),
            units: toNumber(row?.units),
        };
    }
}
