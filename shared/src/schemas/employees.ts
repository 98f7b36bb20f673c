/**
 * Employee Zod Schemas
 *
 * Validation schemas for employees, weekly assignments and list params.
 */

import { z } from 'zod';
import {
  ASSIGNMENT_STATUSES,
  EMPLOYEE_CATEGORIES,
  EMPLOYEE_STATUSES,
  EMPLOYEE_WORK_TYPES,
} from '../domain/constants.js';
import { isoDateSchema, optionalTextSchema } from './common.js';

// ============================================
// EMPLOYEE SCHEMAS
// ============================================

export const CreateEmployeeSchema = z.object({
  fullName: z.string().trim().min(1, 'Full name is required.'),
  fatherName: optionalTextSchema,
  cnic: optionalTextSchema,
  mobileNumber: optionalTextSchema,
  address: optionalTextSchema,
  emergencyContact: optionalTextSchema,
  joiningDate: isoDateSchema.optional(),
  status: z.enum(EMPLOYEE_STATUSES, { errorMap: () => ({ message: 'Invalid status.' }) }).default('active'),
  category: z.enum(EMPLOYEE_CATEGORIES, { errorMap: () => ({ message: 'Invalid category.' }) }),
  workType: z.enum(EMPLOYEE_WORK_TYPES, { errorMap: () => ({ message: 'Invalid work type.' }) }),
  roleDescription: optionalTextSchema,
  paymentRate: z.number().int().nonnegative().nullable().optional(),
});
export type CreateEmployeeInput = z.infer<typeof CreateEmployeeSchema>;

export const UpdateEmployeeSchema = CreateEmployeeSchema.partial();
export type UpdateEmployeeInput = z.infer<typeof UpdateEmployeeSchema>;

export const EmployeeListQuerySchema = z.object({
  status: z.enum(EMPLOYEE_STATUSES).optional().catch(undefined),
});
export type EmployeeListQuery = z.infer<typeof EmployeeListQuerySchema>;

// ============================================
// WEEKLY ASSIGNMENTS
// ============================================

export const CreateAssignmentSchema = z
  .object({
    weekStart: isoDateSchema.optional(),
    weekEnd: isoDateSchema.optional(),
    description: z.string().trim().min(1, 'Description is required.'),
    quantity: z.number().int().nonnegative().nullable().optional(),
    status: z.enum(ASSIGNMENT_STATUSES).default('pending'),
  })
  .refine((v) => !v.weekStart || !v.weekEnd || v.weekStart <= v.weekEnd, {
    message: 'Week end must not be before week start.',
    path: ['weekEnd'],
  });
export type CreateAssignmentInput = z.infer<typeof CreateAssignmentSchema>;

export const UpdateAssignmentSchema = z.object({
  description: z.string().trim().min(1).optional(),
  quantity: z.number().int().nonnegative().nullable().optional(),
  status: z.enum(ASSIGNMENT_STATUSES).optional(),
});
export type UpdateAssignmentInput = z.infer<typeof UpdateAssignmentSchema>;
