/**
 * Employee Routes
 *
 * Employees, their advance / salary ledger and weekly assignments.
 */

import { Router } from 'express';
import {
    CreateAssignmentSchema,
    CreateEmployeeSchema,
    EmployeeListQuerySchema,
    UpdateAssignmentSchema,
    UpdateEmployeeSchema,
    idParamSchema,
} from '@workshop-ledger/shared';
import { typedQueryRoute, typedRoute, typedRouteWithParams } from '../middleware/asyncHandler.js';
import {
    createAssignment,
    createEmployee,
    employeeLedger,
    employeeProfile,
    employeeSummary,
    getEmployee,
    listAssignments,
    listEmployees,
    updateAssignment,
    updateEmployee,
} from '../services/employeeLedger.js';

const router: Router = Router();

// ============================================
// EMPLOYEES
// ============================================

router.get(
    '/',
    ...typedQueryRoute(EmployeeListQuerySchema, async (query, req, res) => {
        res.json({ employees: await listEmployees(req.store, query.status ?? null) });
    })
);

router.post(
    '/',
    ...typedRoute(CreateEmployeeSchema, async (body, req, res) => {
        res.status(201).json(await createEmployee(req.store, body));
    })
);

// Assignment updates sit before /:id so the literal segment wins
router.put(
    '/assignments/:id',
    ...typedRouteWithParams(idParamSchema, UpdateAssignmentSchema, async ({ params, body }, req, res) => {
        res.json(await updateAssignment(req.store, params.id, body));
    })
);

router.get(
    '/:id',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json(await getEmployee(req.store, params.id));
    })
);

router.put(
    '/:id',
    ...typedRouteWithParams(idParamSchema, UpdateEmployeeSchema, async ({ params, body }, req, res) => {
        res.json(await updateEmployee(req.store, params.id, body));
    })
);

// ============================================
// LEDGER
// ============================================

router.get(
    '/:id/summary',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json(await employeeSummary(req.store, params.id));
    })
);

router.get(
    '/:id/ledger',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json({ rows: await employeeLedger(req.store, params.id) });
    })
);

router.get(
    '/:id/profile',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json(await employeeProfile(req.store, params.id));
    })
);

// ============================================
// WEEKLY ASSIGNMENTS
// ============================================

router.get(
    '/:id/assignments',
    ...typedRouteWithParams(idParamSchema, null, async ({ params }, req, res) => {
        res.json({ assignments: await listAssignments(req.store, params.id) });
    })
);

router.post(
    '/:id/assignments',
    ...typedRouteWithParams(idParamSchema, CreateAssignmentSchema, async ({ params, body }, req, res) => {
        res.status(201).json(await createAssignment(req.store, params.id, body));
    })
);

export default router;
