/**
 * Transaction Zod Schemas
 *
 * Shape validation only. Category rules (incoming vs outgoing lists, Client
 * bill number) live in domain/transactions/validation.ts so they can report
 * field errors after the employee link has derived the category.
 */

import { z } from 'zod';
import { EMPLOYEE_TX_TYPES, TX_TYPES, LIST_LIMITS } from '../domain/constants.js';
import {
  idSchema,
  isoDateSchema,
  optionalTextSchema,
  queryBooleanSchema,
  queryDateSchema,
  queryLimitSchema,
  queryTextSchema,
} from './common.js';

// ============================================
// WRITE
// ============================================

const transactionFields = {
  date: isoDateSchema.optional(),
  amount: z.number().int('Amounts are whole units'),
  category: z.string().trim().default(''),
  name: optionalTextSchema,
  billNo: optionalTextSchema,
  notes: optionalTextSchema,
  employeeId: idSchema.nullable().optional(),
  employeeTxType: z.enum(EMPLOYEE_TX_TYPES).nullable().optional(),
  paymentMethod: optionalTextSchema,
  reference: optionalTextSchema,
};

export const CreateTransactionSchema = z.object({
  type: z.enum(TX_TYPES),
  ...transactionFields,
});
export type CreateTransactionInput = z.infer<typeof CreateTransactionSchema>;

/** Update keeps the stored `type` */
export const UpdateTransactionSchema = z.object(transactionFields);
export type UpdateTransactionInput = z.infer<typeof UpdateTransactionSchema>;

// ============================================
// READ (query string)
// ============================================

export const TransactionQuerySchema = z.object({
  from: queryDateSchema,
  to: queryDateSchema,
  type: queryTextSchema,
  category: queryTextSchema,
  name: queryTextSchema,
  q: queryTextSchema,
  includeDeleted: queryBooleanSchema,
  limit: queryLimitSchema(LIST_LIMITS.transactions, LIST_LIMITS.exportTransactions),
});
export type TransactionQuery = z.infer<typeof TransactionQuerySchema>;
