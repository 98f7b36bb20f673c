/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';
import { isIsoDate } from '../utils/dateHelpers.js';

/** `YYYY-MM-DD`, a real calendar day */
export const isoDateSchema = z
  .string()
  .trim()
  .refine(isIsoDate, { message: 'Expected a date in YYYY-MM-DD format' });

/** Positive integer id, from a JSON number or a path/query string */
export const idSchema = z.coerce.number().int().positive();

export const idParamSchema = z.object({ id: idSchema });
export type IdParam = z.infer<typeof idParamSchema>;

/** Optional free text: trimmed, blank → null */
export const optionalTextSchema = z
  .string()
  .trim()
  .transform((value) => (value === '' ? null : value))
  .nullable()
  .optional();

export const requiredTextSchema = z.string().trim().min(1, 'Required');

/** Whole currency units, never negative */
export const moneySchema = z.number().int('Amounts are whole units').nonnegative();

/** Query-string boolean: "true" / "1" / "on" are true, anything else false */
export const queryBooleanSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'on');

/** Optional query-string text; invalid shapes (arrays) are dropped */
export const queryTextSchema = z.string().optional().catch(undefined);

/** Optional query-string date; malformed dates are ignored rather than rejected */
export const queryDateSchema = isoDateSchema.optional().catch(undefined);

/** Missing or malformed → default; above `max` → clamped */
export function queryLimitSchema(defaultLimit: number, max: number) {
  return z.coerce
    .number()
    .int()
    .positive()
    .catch(defaultLimit)
    .transform((value) => Math.min(value, max));
}
