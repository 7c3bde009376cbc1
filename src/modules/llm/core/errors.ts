/**
 * LLM Module - Errors
 *
 * Provider failures (ProviderError, shared with embeddings) are kept distinct
 * from completions that arrive but carry no usable text.
 */

import type { ProviderError } from '../../../common/types/errors.js';

export interface EmptyCompletionError {
  readonly type: 'EmptyCompletionError';
  readonly message: string;
}

/**
 * Completion text could not be read as the JSON the caller asked for.
 */
export interface MalformedCompletionError {
  readonly type: 'MalformedCompletionError';
  readonly message: string;
  readonly text: string;
}

export type CompletionError = ProviderError | EmptyCompletionError;

export const createEmptyCompletionError = (): EmptyCompletionError => ({
  type: 'EmptyCompletionError',
  message: 'Model returned an empty completion',
});

export const createMalformedCompletionError = (
  message: string,
  text: string
): MalformedCompletionError => ({
  type: 'MalformedCompletionError',
  message,
  text,
});
