/**
 * Statement Timeout Helper
 *
 * Sets PostgreSQL statement timeouts without spreading sql.raw() across
 * repository code.
 *
 * SECURITY: The timeout value is validated to be a positive integer.
 */

import { sql, type Kysely } from 'kysely';

// ============================================================================
// Constants
// ============================================================================

/** Default query timeout in milliseconds (30 seconds) */
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

/** Maximum allowed timeout in milliseconds (5 minutes) */
export const MAX_QUERY_TIMEOUT_MS = 300_000;

/** Minimum allowed timeout in milliseconds */
export const MIN_QUERY_TIMEOUT_MS = 1;

/** SQLSTATE raised when statement_timeout cancels a query */
export const QUERY_CANCELED_SQLSTATE = '57014';

// ============================================================================
// Timeout Helper
// ============================================================================

/**
 * Clamps a requested budget into the range accepted by `setStatementTimeout`.
 */
export const clampStatementTimeout = (timeoutMs: number): number =>
  Math.min(MAX_QUERY_TIMEOUT_MS, Math.max(MIN_QUERY_TIMEOUT_MS, Math.floor(timeoutMs)));

/**
 * Sets the statement timeout for the current transaction.
 *
 * Must run inside a transaction: `SET LOCAL` is discarded at commit/rollback,
 * so pooled connections never leak the setting.
 *
 * @throws Error if timeout is not an integer within bounds
 */
export async function setStatementTimeout<DB>(
  db: Kysely<DB>,
  timeoutMs: number = DEFAULT_QUERY_TIMEOUT_MS
): Promise<void> {
  if (!Number.isInteger(timeoutMs)) {
    throw new Error(`Statement timeout must be an integer, got: ${String(timeoutMs)}`);
  }

  if (timeoutMs < MIN_QUERY_TIMEOUT_MS || timeoutMs > MAX_QUERY_TIMEOUT_MS) {
    throw new Error(
      `Statement timeout must be between ${String(MIN_QUERY_TIMEOUT_MS)}ms and ${String(MAX_QUERY_TIMEOUT_MS)}ms, got: ${String(timeoutMs)}`
    );
  }

  // SECURITY: SET LOCAL does not take bind parameters; the value is a validated integer.
  await sql.raw(`SET LOCAL statement_timeout = ${String(timeoutMs)}`).execute(db);
}

/**
 * Runs `fn` in its own transaction with a statement timeout applied.
 */
export async function withStatementTimeout<DB, T>(
  db: Kysely<DB>,
  timeoutMs: number,
  fn: (trx: Kysely<DB>) => Promise<T>
): Promise<T> {
  return db.transaction().execute(async (trx) => {
    await setStatementTimeout(trx, clampStatementTimeout(timeoutMs));
    return fn(trx);
  });
}
