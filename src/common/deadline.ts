/**
 * Request deadlines
 *
 * A deadline is created once per user question and handed to every step that
 * talks to the store or a model provider, so retries spend the same budget.
 */

import { err, ok, type Result } from 'neverthrow';

import { createTimeoutError, type TimeoutError } from './types/errors.js';

export interface Deadline {
  /** Epoch milliseconds after which work must stop */
  readonly expiresAt: number;
  remainingMs(): number;
  isExpired(): boolean;
}

export type Clock = () => number;

/**
 * Creates a deadline `budgetMs` from now.
 */
export const createDeadline = (budgetMs: number, clock: Clock = Date.now): Deadline => {
  const expiresAt = clock() + budgetMs;

  return {
    expiresAt,
    remainingMs: () => Math.max(0, expiresAt - clock()),
    isExpired: () => clock() >= expiresAt,
  };
};

/**
 * Races a promise against the remaining budget.
 *
 * The losing promise is not cancelled; callers that own a cancellable resource
 * (a database statement) must bound it on their side as well.
 */
export async function raceDeadline<T>(
  work: Promise<T>,
  deadline: Deadline,
  operation: string
): Promise<Result<T, TimeoutError>> {
  const remaining = deadline.remainingMs();
  if (remaining <= 0) {
    // Still observe the promise so a later rejection is not reported as unhandled
    void work.catch(() => undefined);
    return err(createTimeoutError(operation));
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => {
      resolve('expired');
    }, remaining);
  });

  try {
    const winner = await Promise.race([work.then((value) => ({ value })), expired]);
    if (winner === 'expired') {
      void work.catch(() => undefined);
      return err(createTimeoutError(operation));
    }
    return ok(winner.value);
  } finally {
    clearTimeout(timer);
  }
}
