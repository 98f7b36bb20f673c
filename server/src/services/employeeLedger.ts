/**
 * Employee Ledger Service
 *
 * Employees, their advance / salary ledger and weekly work assignments.
 *
 * Which transactions count for an employee:
 *   - outgoing, not deleted, and
 *   - linked by employee_id, OR unlinked with a name equal to the employee's
 *     full name after trim + lowercase.
 * The name fallback keeps rows entered before the employee existed; two
 * people with the same name end up sharing a ledger.
 */

import {
    LIST_LIMITS,
    addDays,
    buildEmployeeLedger,
    mapToEmployeeCategory,
    saturdayWeek,
    todayIsoDate,
    type CreateAssignmentInput,
    type CreateEmployeeInput,
    type Employee,
    type EmployeeFinancialSummary,
    type EmployeeStatus,
    type LedgerRow,
    type Transaction,
    type UpdateAssignmentInput,
    type UpdateEmployeeInput,
    type WeeklyAssignment,
} from '@workshop-ledger/shared';
import type { Store } from '../db/store.js';
import { BusinessLogicError, NotFoundError, ValidationError } from '../utils/errors.js';
import { employeeLogger } from '../utils/logger.js';

/** Saturday → Thursday */
const WEEK_SPAN_DAYS = 5;

export interface EmployeeProfile {
    employee: Employee;
    summary: EmployeeFinancialSummary;
    ledger: LedgerRow<Transaction>[];
    assignments: WeeklyAssignment[];
}

export interface BackfillResult {
    /** Names of the employees that were created */
    created: string[];
    /** Transactions newly linked to an employee */
    linked: number;
}

// ============================================
// EMPLOYEES
// ============================================

export async function listEmployees(store: Store, status: EmployeeStatus | null = null): Promise<Employee[]> {
    return store.employees.list(status);
}

export async function getEmployee(store: Store, id: number): Promise<Employee> {
    const employee = await store.employees.findById(id);
    if (!employee) throw new NotFoundError('Employee not found', 'Employee', id);
    return employee;
}

export async function createEmployee(
    store: Store,
    input: CreateEmployeeInput,
    today: string = todayIsoDate()
): Promise<Employee> {
    const employee = await store.employees.create({
        fullName: input.fullName,
        fatherName: input.fatherName ?? null,
        cnic: input.cnic ?? null,
        mobileNumber: input.mobileNumber ?? null,
        address: input.address ?? null,
        emergencyContact: input.emergencyContact ?? null,
        joiningDate: input.joiningDate ?? today,
        status: input.status,
        category: input.category,
        workType: input.workType,
        roleDescription: input.roleDescription ?? null,
        paymentRate: input.paymentRate ?? null,
    });
    employeeLogger.info({ employeeId: employee.id }, 'Employee created');
    return employee;
}

export async function updateEmployee(store: Store, id: number, input: UpdateEmployeeInput): Promise<Employee> {
    const employee = await store.employees.update(id, input);
    if (!employee) throw new NotFoundError('Employee not found', 'Employee', id);
    employeeLogger.info({ employeeId: id }, 'Employee updated');
    return employee;
}

// ============================================
// LEDGER
// ============================================

export async function employeeSummary(store: Store, id: number): Promise<EmployeeFinancialSummary> {
    const employee = await getEmployee(store, id);
    return store.transactions.summaryForEmployee(employee);
}

/** Rows in date asc, id asc order with a running advance balance */
export async function employeeLedger(store: Store, id: number): Promise<LedgerRow<Transaction>[]> {
    const employee = await getEmployee(store, id);
    const txs = await store.transactions.forEmployee(employee, LIST_LIMITS.employeeLedger);
    return buildEmployeeLedger(txs);
}

export async function employeeProfile(store: Store, id: number): Promise<EmployeeProfile> {
    const employee = await getEmployee(store, id);
    const txs = await store.transactions.forEmployee(employee, LIST_LIMITS.employeeLedger);
    return {
        employee,
        summary: await store.transactions.summaryForEmployee(employee),
        ledger: buildEmployeeLedger(txs),
        assignments: await store.assignments.listForEmployee(id, LIST_LIMITS.assignments),
    };
}

// ============================================
// WEEKLY ASSIGNMENTS
// ============================================

/**
 * Missing bounds default to the Saturday–Thursday week around `today`;
 * a single bound fills the other from the week span.
 */
export function resolveAssignmentWeek(
    weekStart: string | undefined,
    weekEnd: string | undefined,
    today: string
): { weekStart: string; weekEnd: string } {
    if (weekStart && weekEnd) return { weekStart, weekEnd };
    if (weekStart) return { weekStart, weekEnd: addDays(weekStart, WEEK_SPAN_DAYS) };
    if (weekEnd) return { weekStart: addDays(weekEnd, -WEEK_SPAN_DAYS), weekEnd };
    const week = saturdayWeek(today);
    return { weekStart: week.start, weekEnd: week.end };
}

export async function createAssignment(
    store: Store,
    employeeId: number,
    input: CreateAssignmentInput,
    today: string = todayIsoDate()
): Promise<WeeklyAssignment> {
    await getEmployee(store, employeeId);

    const week = resolveAssignmentWeek(input.weekStart, input.weekEnd, today);
    if (week.weekStart > week.weekEnd) {
        throw new ValidationError('Invalid assignment', { weekEnd: 'Week end must not be before week start.' });
    }

    const assignment = await store.assignments.create({
        employeeId,
        ...week,
        description: input.description,
        quantity: input.quantity ?? null,
        status: input.status,
        isLocked: input.status === 'completed',
    });
    employeeLogger.info({ employeeId, assignmentId: assignment.id, status: assignment.status }, 'Assignment created');
    return assignment;
}

export async function listAssignments(store: Store, employeeId: number): Promise<WeeklyAssignment[]> {
    await getEmployee(store, employeeId);
    return store.assignments.listForEmployee(employeeId, LIST_LIMITS.assignments);
}

/** Completed assignments are locked and reject further changes */
export async function updateAssignment(
    store: Store,
    assignmentId: number,
    input: UpdateAssignmentInput
): Promise<WeeklyAssignment> {
    const existing = await store.assignments.findById(assignmentId);
    if (!existing) throw new NotFoundError('Assignment not found', 'WeeklyAssignment', assignmentId);
    if (existing.isLocked) {
        throw new BusinessLogicError('Assignment is locked', 'assignment_locked');
    }

    const status = input.status ?? existing.status;
    const updated = await store.assignments.update(assignmentId, { ...input, isLocked: status === 'completed' });
    if (!updated) throw new NotFoundError('Assignment not found', 'WeeklyAssignment', assignmentId);

    employeeLogger.info({ assignmentId, status: updated.status, locked: updated.isLocked }, 'Assignment updated');
    return updated;
}

// ============================================
// BACKFILL
// ============================================

/**
 * Create employees for outgoing transaction names that have none, then link
 * unlinked rows by name. Untyped rows become salary.
 */
export async function backfillEmployeesFromTransactions(
    store: Store,
    today: string = todayIsoDate()
): Promise<BackfillResult> {
    const result = await store.transaction(async (tx) => {
        const pairs = await tx.transactions.nameCategoryCounts('outgoing');
        const created: string[] = [];
        let linked = 0;

        for (const pair of pairs) {
            let employee = await tx.employees.findByName(pair.name);
            if (!employee) {
                employee = await tx.employees.create({
                    fullName: pair.name,
                    fatherName: null,
                    cnic: null,
                    mobileNumber: null,
                    address: null,
                    emergencyContact: null,
                    joiningDate: today,
                    status: 'active',
                    category: mapToEmployeeCategory(pair.category),
                    workType: 'daily',
                    roleDescription: null,
                    paymentRate: null,
                });
                created.push(employee.fullName);
            }
            linked += await tx.transactions.linkByName(pair.name, employee.id);
        }

        return { created, linked };
    });

    employeeLogger.info({ created: result.created.length, linked: result.linked }, 'Employees backfilled from transactions');
    return result;
}
