/**
 * Report & Export Zod Schemas
 */

import { z } from 'zod';
import { REPORT_PERIODS } from '../domain/reports/periods.js';
import { queryDateSchema, queryTextSchema } from './common.js';

export const ReportQuerySchema = z.object({
  from: queryDateSchema,
  to: queryDateSchema,
  type: queryTextSchema,
  category: queryTextSchema,
  name: queryTextSchema,
  q: queryTextSchema,
  /** When set, `anchor` (default today) picks the range and from/to are ignored */
  period: z.enum(REPORT_PERIODS).optional().catch(undefined),
  anchor: queryDateSchema,
});
export type ReportQuery = z.infer<typeof ReportQuerySchema>;

/** `date` defaults to today */
export const DailySummaryQuerySchema = z.object({
  date: queryDateSchema,
});
export type DailySummaryQuery = z.infer<typeof DailySummaryQuerySchema>;

export const SeedRequestSchema = z.object({
  token: z.string().min(1, 'Seed token is required'),
});
export type SeedRequest = z.infer<typeof SeedRequestSchema>;

export const LoginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});
export type LoginInput = z.infer<typeof LoginSchema>;
