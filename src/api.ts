/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { initServices } from './app/services.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';

const main = async (): Promise<void> => {
  const startedAt = Date.now();

  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  // Credentials in models and database are redacted by the logger
  logger.info(
    { config: { server: config.server, models: config.models, database: config.database } },
    'Starting API server'
  );

  const services = await initServices(config, logger);
  logger.info(
    {
      tables: Object.keys(services.catalog.tables).length,
      terms: services.catalog.vocabulary.length,
    },
    'Label catalog loaded'
  );

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      catalog: services.catalog,
      store: services.store,
      chatHistory: services.chatHistory,
      completion: services.completion,
      embeddings: services.embeddings,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
    startedAt,
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await services.db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
