/**
 * Service wiring shared by the API server and the maintenance scripts.
 */

import { initDatabase, type FiraDbClient } from '../infra/database/client.js';
import { makeChatHistoryRepo, type ChatHistoryRepository } from '../modules/chat-history/index.js';
import {
  makeEmbeddingGateway,
  makeOpenAIEmbeddingProvider,
  type EmbeddingGateway,
} from '../modules/embeddings/index.js';
import { makeHybridStoreRepo, type HybridStore } from '../modules/hybrid-store/index.js';
import { loadLabelCatalog, type LabelCatalog } from '../modules/labels/index.js';
import {
  makeLangChainCompletionProvider,
  makeOpenAIChatModel,
  type CompletionProvider,
} from '../modules/llm/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface Services {
  db: FiraDbClient;
  catalog: LabelCatalog;
  store: HybridStore;
  chatHistory: ChatHistoryRepository;
  completion: CompletionProvider;
  embeddings: EmbeddingGateway;
}

/**
 * Loads the label catalog and connects every adapter.
 * Throws when the catalog is missing or invalid: nothing works without it.
 */
export const initServices = async (config: AppConfig, logger: Logger): Promise<Services> => {
  const catalogResult = await loadLabelCatalog(config.labels.path);
  if (catalogResult.isErr()) {
    throw new Error(catalogResult.error.message);
  }
  const catalog = catalogResult.value;

  const db = initDatabase(config);

  return {
    db,
    catalog,
    store: makeHybridStoreRepo({
      db,
      catalog,
      logger,
      queryTimeoutMs: config.database.queryTimeoutMs,
    }),
    chatHistory: makeChatHistoryRepo({ db, logger }),
    completion: makeLangChainCompletionProvider({
      model: makeOpenAIChatModel({
        model: config.models.completionModel,
        apiKey: config.models.apiKey,
        baseUrl: config.models.baseUrl,
      }),
      logger,
    }),
    embeddings: makeEmbeddingGateway({
      provider: makeOpenAIEmbeddingProvider({
        model: config.models.embeddingModel,
        dimensions: config.models.embeddingDimensions,
        apiKey: config.models.apiKey,
        baseUrl: config.models.baseUrl,
      }),
      dimensions: config.models.embeddingDimensions,
      logger,
    }),
  };
};
