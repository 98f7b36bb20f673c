/**
 * @workshop-ledger/shared - Shared types, schemas and domain logic
 *
 * Entity types come from ./types, zod schemas from ./schemas, pure business
 * rules from ./domain. Nothing here touches the database or the network.
 */

// Entity row types (type-only)
export type * from './types/index.js';

export * from './schemas/index.js';
export * from './domain/index.js';
export * from './utils/dateHelpers.js';
