import { OpenAIEmbeddings } from '@langchain/openai';

import type { EmbeddingProvider } from '../core/ports.js';

export interface OpenAIEmbeddingOptions {
  model: string;
  dimensions: number;
  apiKey?: string | undefined;
  baseUrl?: string | undefined;
}

/**
 * OpenAI embeddings through LangChain, sized to the store's vector column.
 */
export const makeOpenAIEmbeddingProvider = (options: OpenAIEmbeddingOptions): EmbeddingProvider =>
  new OpenAIEmbeddings({
    model: options.model,
    dimensions: options.dimensions,
    maxRetries: 0,
    ...(options.apiKey !== undefined && { apiKey: options.apiKey }),
    ...(options.baseUrl !== undefined && { configuration: { baseURL: options.baseUrl } }),
  });
