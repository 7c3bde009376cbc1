/**
 * Embeddings Module - Public API
 */

export type { EmbeddingProvider, EmbeddingGateway } from './core/ports.js';

export {
  makeEmbeddingGateway,
  cleanEmbeddingInput,
  type EmbeddingGatewayDeps,
} from './core/gateway.js';

export {
  makeOpenAIEmbeddingProvider,
  type OpenAIEmbeddingOptions,
} from './shell/openai-embeddings.js';
