/**
 * Hybrid Store Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { TimeoutError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Connection lost and the single reconnect attempt failed as well.
 */
export interface StoreUnavailableError {
  readonly type: 'StoreUnavailableError';
  readonly message: string;
  readonly operation: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * The database rejected a statement for a reason other than connectivity.
 */
export interface QueryExecutionError {
  readonly type: 'QueryExecutionError';
  readonly message: string;
  readonly operation: string;
  /** Postgres SQLSTATE when available */
  readonly sqlState?: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A query referenced a column or table the schema does not declare.
 */
export interface SchemaError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly table: string;
  readonly column: string;
}

/**
 * A query is well named but malformed (bad value for a column, ungrouped
 * column in an aggregate query).
 */
export interface InvalidQueryError {
  readonly type: 'InvalidQueryError';
  readonly message: string;
}

export type QueryError = SchemaError | InvalidQueryError;

export type StoreError =
  | StoreUnavailableError
  | QueryExecutionError
  | SchemaError
  | InvalidQueryError
  | TimeoutError;

/** Errors that end a whole batch rather than a single record */
export type StoreAbortError = StoreUnavailableError | TimeoutError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createStoreUnavailableError = (
  operation: string,
  cause?: unknown
): StoreUnavailableError => ({
  type: 'StoreUnavailableError',
  message: `Store unavailable during '${operation}' after one reconnect attempt`,
  operation,
  retryable: true,
  ...(cause !== undefined && { cause }),
});

export const createQueryExecutionError = (
  operation: string,
  message: string,
  sqlState?: string,
  cause?: unknown
): QueryExecutionError => ({
  type: 'QueryExecutionError',
  message,
  operation,
  ...(sqlState !== undefined && { sqlState }),
  ...(cause !== undefined && { cause }),
});

export const createSchemaError = (table: string, column: string): SchemaError => ({
  type: 'SchemaError',
  message: `Unknown column '${column}' for table '${table}'`,
  table,
  column,
});

export const createUnknownTableError = (table: string): SchemaError => ({
  type: 'SchemaError',
  message: `Unknown table '${table}'`,
  table,
  column: table,
});

export const createInvalidQueryError = (message: string): InvalidQueryError => ({
  type: 'InvalidQueryError',
  message,
});

export const isStoreAbortError = (error: StoreError): error is StoreAbortError =>
  error.type === 'StoreUnavailableError' || error.type === 'TimeoutError';
