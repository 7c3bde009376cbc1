import type { ProviderError } from '../../../common/types/errors.js';
import type { Result } from 'neverthrow';

/**
 * Backing embedding provider. LangChain `Embeddings` implementations satisfy
 * this shape directly.
 */
export interface EmbeddingProvider {
  embedDocuments(texts: string[]): Promise<number[][]>;
}

/**
 * Stateless text → vector gateway with a fixed output dimension.
 */
export interface EmbeddingGateway {
  readonly dimensions: number;
  embed(text: string): Promise<Result<number[], ProviderError>>;
  /** Output preserves input order and length */
  embedBatch(texts: readonly string[]): Promise<Result<number[][], ProviderError>>;
}
