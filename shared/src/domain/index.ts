/**
 * Domain Layer
 *
 * Pure business logic shared by the API, reports and scripts. No I/O.
 */

export * from './constants.js';
export * from './formatting.js';
export * from './inventory/index.js';
export * from './ledger/index.js';
export * from './reports/index.js';
export * from './transactions/index.js';
