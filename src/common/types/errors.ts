/**
 * Base error types for the application
 * Module errors are discriminated unions that extend these shapes
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Shared Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Failure of an external model provider (completion or embedding).
 */
export interface ProviderError extends AppError {
  readonly type: 'ProviderError';
  readonly provider: 'completion' | 'embedding';
  readonly retryable: boolean;
}

/**
 * Operation exceeded its time budget and was abandoned.
 */
export interface TimeoutError extends AppError {
  readonly type: 'TimeoutError';
  readonly operation: string;
  readonly retryable: boolean;
}

/**
 * Not found errors
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly resource: string;
  readonly id: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createProviderError = (
  provider: ProviderError['provider'],
  message: string,
  cause?: unknown,
  retryable = false
): ProviderError => ({
  type: 'ProviderError',
  provider,
  message,
  retryable,
  ...(cause !== undefined && { cause }),
});

export const createTimeoutError = (operation: string, cause?: unknown): TimeoutError => ({
  type: 'TimeoutError',
  operation,
  message: `Operation '${operation}' exceeded its time budget`,
  retryable: false,
  ...(cause !== undefined && { cause }),
});

export const createNotFoundError = (resource: string, id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `${resource} with id '${id}' not found`,
  resource,
  id,
});

/**
 * Extracts a human readable message from an unknown thrown value.
 */
export const describeError = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return 'Unknown error';
};
