/**
 * Shared Zod schemas
 *
 * Request validation shared by the API routes and scripts.
 */

// Re-export common schemas (base schemas without circular dependencies)
export * from './common.js';

// Re-export domain schemas
export * from './transactions.js';
export * from './employees.js';
export * from './inventory.js';
export * from './reports.js';
