/**
 * Kysely Transactions Repository
 *
 * Cash ledger rows. Every listing and aggregate goes through
 * `transactionFilterExpression` so the list, the totals and the exports
 * always agree on what a filter means.
 */

import { sql, type Expression, type ExpressionBuilder, type SqlBool } from 'kysely';
import {
    normalizePersonName,
    type EmployeeFinancialSummary,
    type EmployeeTxType,
    type Transaction,
    type TransactionFilter,
    type TransactionTotals,
    type TxType,
} from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type { Database } from '../types.js';
import type {
    EmployeeRef,
    NameCategoryCount,
    NewTransaction,
    TransactionChanges,
    TransactionRepository,
} from '../store.js';
import { containsPattern, toNumber } from './sqlHelpers.js';

type TransactionsEb = ExpressionBuilder<Database, 'transactions'>;

// ============================================
// WHERE CLAUSES
// ============================================

/**
 * ALL of: not deleted (unless includeDeleted), date in [from, to], type,
 * exact category, name substring, and `q` in notes/bill/category/name.
 */
export function transactionFilterExpression(eb: TransactionsEb, filter: TransactionFilter): Expression<SqlBool> {
    const clauses: Expression<SqlBool>[] = [];

    if (!filter.includeDeleted) clauses.push(eb('isDeleted', '=', false));
    if (filter.from !== null) clauses.push(eb('date', '>=', filter.from));
    if (filter.to !== null) clauses.push(eb('date', '<=', filter.to));
    if (filter.type !== null) clauses.push(eb('type', '=', filter.type));
    if (filter.category !== null) clauses.push(eb('category', '=', filter.category));
    if (filter.name !== null) clauses.push(eb('name', 'ilike', containsPattern(filter.name)));

    if (filter.q !== null) {
        const pattern = containsPattern(filter.q);
        clauses.push(
            eb.or([
                eb('notes', 'ilike', pattern),
                eb('billNo', 'ilike', pattern),
                eb('category', 'ilike', pattern),
                eb('name', 'ilike', pattern),
            ])
        );
    }

    return eb.and(clauses);
}

/**
 * Outgoing, not deleted, and either linked to the employee or unlinked with a
 * name equal to the employee's after trim + lowercase (legacy rows).
 */
export function employeeScopeExpression(eb: TransactionsEb, employee: EmployeeRef): Expression<SqlBool> {
    return eb.and([
        eb('isDeleted', '=', false),
        eb('type', '=', 'outgoing'),
        eb.or([
            eb('employeeId', '=', employee.id),
            eb.and([
                eb('employeeId', 'is', null),
                eb('name', 'is not', null),
                eb(sql<string>`lower(trim(${sql.ref('name')}))`, '=', normalizePersonName(employee.fullName)),
            ]),
        ]),
    ]);
}

// ============================================
// REPOSITORY
// ============================================

export class KyselyTransactionRepository implements TransactionRepository {
    constructor(private readonly db: KyselyDB) {}

    async list(filter: TransactionFilter, limit: number): Promise<Transaction[]> {
        return this.db
            .selectFrom('transactions')
            .selectAll()
            .where((eb) => transactionFilterExpression(eb, filter))
            .orderBy('date', 'desc')
            .orderBy('id', 'desc')
            .limit(limit)
            .execute();
    }

    async totals(filter: TransactionFilter): Promise<TransactionTotals> {
        const row = await this.db
            .selectFrom('transactions')
            .select([
                sql<string>`coalesce(sum(case when ${sql.ref('type')} = 'incoming' then ${sql.ref('amount')} else 0 end), 0)`.as('incoming'),
                sql<string>`coalesce(sum(case when ${sql.ref('type')} = 'outgoing' then ${sql.ref('amount')} else 0 end), 0)`.as('outgoing'),
            ])
            .where((eb) => transactionFilterExpression(eb, filter))
            .executeTakeFirst();

        const incoming = toNumber(row?.incoming);
        const outgoing = toNumber(row?.outgoing);
        return { incoming, outgoing, net: incoming - outgoing };
    }

    async findById(id: number): Promise<Transaction | null> {
        const row = await this.db.selectFrom('transactions').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async create(data: NewTransaction): Promise<Transaction> {
        return this.db.insertInto('transactions').values(data).returningAll().executeTakeFirstOrThrow();
    }

    async update(id: number, data: TransactionChanges): Promise<Transaction | null> {
        const row = await this.db
            .updateTable('transactions')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .where('isDeleted', '=', false)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }

    async markDeleted(id: number): Promise<boolean> {
        const result = await this.db
            .updateTable('transactions')
            .set({ isDeleted: true, updatedAt: new Date() })
            .where('id', '=', id)
            .where('isDeleted', '=', false)
            .executeTakeFirst();
        return result.numUpdatedRows > 0n;
    }

    async distinctNames(limit: number): Promise<string[]> {
        const rows = await this.db
            .selectFrom('transactions')
            .select(sql<string>`min(${sql.ref('name')})`.as('name'))
            .where('isDeleted', '=', false)
            .where('name', 'is not', null)
            .where(sql<SqlBool>`length(trim(${sql.ref('name')})) > 0`)
            .groupBy(sql`lower(${sql.ref('name')})`)
            .orderBy(sql`lower(${sql.ref('name')})`)
            .limit(limit)
            .execute();
        return rows.map((row) => row.name);
    }

    async nameCategoryCounts(type: TxType | null): Promise<NameCategoryCount[]> {
        let query = this.db
            .selectFrom('transactions')
            .select([
                sql<string>`min(trim(${sql.ref('name')}))`.as('name'),
                'category',
                sql<string>`count(${sql.ref('id')})`.as('count'),
            ])
            .where('isDeleted', '=', false)
            .where('name', 'is not', null)
            .where(sql<SqlBool>`trim(${sql.ref('name')}) <> ''`)
            .groupBy([sql`lower(trim(${sql.ref('name')}))`, 'category'])
            .orderBy(sql`count(${sql.ref('id')})`, 'desc')
            .orderBy(sql`lower(trim(${sql.ref('name')}))`)
            .orderBy('category');

        if (type !== null) {
            query = query.where('type', '=', type);
        }

        const rows = await query.execute();
        return rows.map((row) => ({ name: row.name, category: row.category, count: toNumber(row.count) }));
    }

    async forEmployee(employee: EmployeeRef, limit: number): Promise<Transaction[]> {
        return this.db
            .selectFrom('transactions')
            .selectAll()
            .where((eb) => employeeScopeExpression(eb, employee))
            .orderBy('date', 'asc')
            .orderBy('id', 'asc')
            .limit(limit)
            .execute();
    }

    async summaryForEmployee(employee: EmployeeRef): Promise<EmployeeFinancialSummary> {
        const row = await this.db
            .selectFrom('transactions')
            .select((eb) => [
                sql<string>`coalesce(sum(case when ${sql.ref('employeeTxType')} = 'advance' then ${sql.ref('amount')} else 0 end), 0)`.as('advanceTotal'),
                sql<string>`coalesce(sum(case when ${sql.ref('employeeTxType')} is distinct from 'advance' then ${sql.ref('amount')} else 0 end), 0)`.as('paidTotal'),
                eb.fn.countAll<string>().as('count'),
            ])
            .where((eb) => employeeScopeExpression(eb, employee))
            .executeTakeFirst();

        const advanceTotal = toNumber(row?.advanceTotal);
        const paidTotal = toNumber(row?.paidTotal);
        return {
            advanceTotal,
            paidTotal,
            advanceBalance: Math.max(0, advanceTotal - paidTotal),
            count: toNumber(row?.count),
        };
    }

    async linkByName(name: string, employeeId: number): Promise<number> {
        const result = await this.db
            .updateTable('transactions')
            .set({
                employeeId,
                employeeTxType: sql<EmployeeTxType>`coalesce(${sql.ref('employeeTxType')}, 'salary')`,
                updatedAt: new Date(),
            })
            .where('isDeleted', '=', false)
            .where('type', '=', 'outgoing')
            .where('employeeId', 'is', null)
            .where(sql<string>`lower(trim(${sql.ref('name')}))`, '=', normalizePersonName(name))
            .executeTakeFirst();
        return Number(result.numUpdatedRows);
    }
}
