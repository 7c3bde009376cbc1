/**
 * Hybrid Store Module - Public API
 *
 * Relational + vector persistence for OpEx, demand and priority records.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_QUERY_LIMIT,
  MAX_QUERY_LIMIT,
  SIMILARITY_CANDIDATE_FACTOR,
  QuerySpecSchema,
  FilterSchema,
  type Filter,
  type FilterScalar,
  type Aggregate,
  type AggregateFn,
  type Order,
  type QuerySpec,
  type ColumnRef,
  type ResolvedQuery,
  type ResultValue,
  type ResultRow,
  type ResultSet,
  type SimilarityHit,
  type StoreHealth,
  type StorableRecord,
  type PurgeInput,
  type StoreCallOptions,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createStoreUnavailableError,
  createQueryExecutionError,
  createSchemaError,
  createInvalidQueryError,
  isStoreAbortError,
  type StoreUnavailableError,
  type QueryExecutionError,
  type SchemaError,
  type InvalidQueryError,
  type QueryError,
  type StoreError,
  type StoreAbortError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { HybridStore, UpsertReport, UpsertFailure } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Query Helpers
// ─────────────────────────────────────────────────────────────────────────────

export {
  validateQuerySpec,
  resolveQuery,
  resolveFilters,
  outputColumns,
  isNumericType,
} from './core/resolve-query.js';
export { identityOf, tableOf } from './core/rows.js';
export { cosineDistance, toVectorLiteral } from './core/vector.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeHybridStoreRepo, type HybridStoreRepoOptions } from './shell/repo/kysely-store.js';
export { compileQuery } from './shell/repo/sql-compiler.js';
export { classifyPgError, isConnectionError, runWithReconnect } from './shell/repo/pg-errors.js';
export {
  makeInMemoryHybridStore,
  type InMemoryHybridStoreOptions,
} from './shell/memory/in-memory-store.js';
