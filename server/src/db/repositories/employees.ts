/**
 * Kysely Employee & Weekly Assignment Repositories
 */

import { sql } from 'kysely';
import {
    normalizePersonName,
    type Employee,
    type EmployeeStatus,
    type WeeklyAssignment,
} from '@workshop-ledger/shared';
import type { KyselyDB } from '../kysely.js';
import type {
    AssignmentChanges,
    AssignmentRepository,
    EmployeeChanges,
    EmployeeRepository,
    NewAssignment,
    NewEmployee,
} from '../store.js';

export class KyselyEmployeeRepository implements EmployeeRepository {
    constructor(private readonly db: KyselyDB) {}

    async list(status: EmployeeStatus | null): Promise<Employee[]> {
        let query = this.db.selectFrom('employees').selectAll().orderBy('status', 'asc').orderBy('fullName', 'asc');
        if (status !== null) {
            query = query.where('status', '=', status);
        }
        return query.execute();
    }

    async findById(id: number): Promise<Employee | null> {
        const row = await this.db.selectFrom('employees').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async findByName(name: string): Promise<Employee | null> {
        const row = await this.db
            .selectFrom('employees')
            .selectAll()
            .where(sql<string>`lower(trim(${sql.ref('fullName')}))`, '=', normalizePersonName(name))
            .orderBy('id', 'asc')
            .executeTakeFirst();
        return row ?? null;
    }

    async create(data: NewEmployee): Promise<Employee> {
        return this.db.insertInto('employees').values(data).returningAll().executeTakeFirstOrThrow();
    }

    async update(id: number, data: EmployeeChanges): Promise<Employee | null> {
        const row = await this.db
            .updateTable('employees')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }
}

export class KyselyAssignmentRepository implements AssignmentRepository {
    constructor(private readonly db: KyselyDB) {}

    async listForEmployee(employeeId: number, limit: number): Promise<WeeklyAssignment[]> {
        return this.db
            .selectFrom('weeklyAssignments')
            .selectAll()
            .where('employeeId', '=', employeeId)
            .orderBy('weekStart', 'desc')
            .orderBy('id', 'desc')
            .limit(limit)
            .execute();
    }

    async findById(id: number): Promise<WeeklyAssignment | null> {
        const row = await this.db.selectFrom('weeklyAssignments').selectAll().where('id', '=', id).executeTakeFirst();
        return row ?? null;
    }

    async create(data: NewAssignment): Promise<WeeklyAssignment> {
        return this.db.insertInto('weeklyAssignments').values(data).returningAll().executeTakeFirstOrThrow();
    }

    async update(id: number, data: AssignmentChanges): Promise<WeeklyAssignment | null> {
        const row = await this.db
            .updateTable('weeklyAssignments')
            .set({ ...data, updatedAt: new Date() })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        return row ?? null;
    }
}
