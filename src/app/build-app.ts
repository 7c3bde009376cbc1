/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { registerCors } from '../infra/plugins/cors.js';
import { makeHealthRoutes, makeStoreHealthChecker, type HealthChecker } from '../modules/health/index.js';
import { createOrchestrator, makeChatRoutes } from '../modules/orchestrator/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ChatHistoryRepository } from '../modules/chat-history/index.js';
import type { EmbeddingGateway } from '../modules/embeddings/index.js';
import type { HybridStore } from '../modules/hybrid-store/index.js';
import type { LabelCatalog } from '../modules/labels/index.js';
import type { CompletionProvider } from '../modules/llm/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  catalog: LabelCatalog;
  store: HybridStore;
  chatHistory: ChatHistoryRepository;
  completion: CompletionProvider;
  embeddings: EmbeddingGateway;
  /** Replaces the default store checker */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
  /** Epoch ms reported uptime is counted from */
  startedAt?: number;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version, startedAt } = options;
  const { config, logger } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      ...(startedAt !== undefined && { startedAt }),
      checkers: deps.healthCheckers ?? [makeStoreHealthChecker(deps.store, { name: 'store' })],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Chat
  // ─────────────────────────────────────────────────────────────────────────────
  const orchestrator = createOrchestrator({
    completion: deps.completion,
    embeddings: deps.embeddings,
    store: deps.store,
    catalog: deps.catalog,
    chatHistory: deps.chatHistory,
    logger,
    requestTimeoutMs: config.request.timeoutMs,
    retrieval: config.retrieval,
    structured: config.structured,
  });

  await app.register(makeChatRoutes({ chatHistory: deps.chatHistory, orchestrator }));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
