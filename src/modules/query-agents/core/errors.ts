/**
 * Query Agents Module - Errors
 */

/**
 * One failed attempt of the SQL agent's generate → execute loop.
 */
export interface QueryAttempt {
  readonly attempt: number;
  /** Generated query (JSON) or raw completion text when it did not parse */
  readonly query: string | null;
  readonly errorType: string;
  readonly error: string;
}

/**
 * The SQL agent used all of its attempts without a successful execution.
 */
export interface QueryFailedError {
  readonly type: 'QueryFailedError';
  readonly message: string;
  readonly attempts: readonly QueryAttempt[];
  readonly lastError: string;
  readonly lastQuery: string | null;
}

export const createQueryFailedError = (attempts: readonly QueryAttempt[]): QueryFailedError => {
  const last = attempts[attempts.length - 1];
  const lastError = last?.error ?? 'no attempt was made';
  return {
    type: 'QueryFailedError',
    message: `Query failed after ${String(attempts.length)} attempts: ${lastError}`,
    attempts,
    lastError,
    lastQuery: last?.query ?? null,
  };
};
