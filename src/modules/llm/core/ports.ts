import type { CompletionError } from './errors.js';
import type { Result } from 'neverthrow';

/**
 * Text completion capability used by the router and the query agents.
 */
export interface CompletionProvider {
  /**
   * Completes `prompt` under `systemInstructions`.
   * Resolves to EmptyCompletionError when the model answers with blank text,
   * and to ProviderError when the provider itself fails.
   */
  complete(prompt: string, systemInstructions: string): Promise<Result<string, CompletionError>>;
}
