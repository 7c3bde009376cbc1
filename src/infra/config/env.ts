/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Vector width of the OpEx embedding column */
export const EMBEDDING_DIMENSIONS = 1024;

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Store
  DATABASE_URL: Type.String({ minLength: 1 }),
  DATABASE_POOL_MAX: Type.Integer({ minimum: 1, maximum: 100 }),
  STORE_QUERY_TIMEOUT_MS: Type.Integer({ minimum: 1, maximum: 300_000 }),
  REQUEST_TIMEOUT_MS: Type.Integer({ minimum: 1_000, maximum: 600_000 }),

  // Model providers
  OPENAI_API_KEY: Type.Optional(Type.String()),
  OPENAI_BASE_URL: Type.Optional(Type.String()),
  LLM_MODEL: Type.String({ minLength: 1 }),
  EMBEDDING_MODEL: Type.String({ minLength: 1 }),

  // Labels and retrieval
  LABELS_PATH: Type.String({ minLength: 1 }),
  SEMANTIC_TOP_K: Type.Integer({ minimum: 1, maximum: 50 }),
  SEMANTIC_TOP_N: Type.Integer({ minimum: 1, maximum: 50 }),
  SEMANTIC_PARAPHRASES: Type.Integer({ minimum: 0, maximum: 5 }),

  // SQL agent extras
  STRUCTURED_CLARITY_CHECK: Type.Boolean(),
  STRUCTURED_ANALYSIS: Type.Boolean(),
  STRUCTURED_FOLLOW_UPS: Type.Integer({ minimum: 0, maximum: 3 }),

  // Ingestion
  INGEST_BATCH_SIZE: Type.Integer({ minimum: 1, maximum: 512 }),
  INGEST_FILE_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 16 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

/** `true`/`1` and `false`/`0`; anything else is left for validation to reject */
const parseFlag = (raw: string | undefined, fallback: boolean): boolean | string => {
  if (raw == null || raw === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  return raw;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    DATABASE_POOL_MAX: parseIntOr(env['DATABASE_POOL_MAX'], 10),
    STORE_QUERY_TIMEOUT_MS: parseIntOr(env['STORE_QUERY_TIMEOUT_MS'], 30_000),
    REQUEST_TIMEOUT_MS: parseIntOr(env['REQUEST_TIMEOUT_MS'], 60_000),
    OPENAI_API_KEY: env['OPENAI_API_KEY'],
    OPENAI_BASE_URL: env['OPENAI_BASE_URL'],
    LLM_MODEL: env['LLM_MODEL'] ?? 'gpt-4o-mini',
    EMBEDDING_MODEL: env['EMBEDDING_MODEL'] ?? 'text-embedding-3-large',
    LABELS_PATH: env['LABELS_PATH'] ?? 'config/labels.yaml',
    SEMANTIC_TOP_K: parseIntOr(env['SEMANTIC_TOP_K'], 5),
    SEMANTIC_TOP_N: parseIntOr(env['SEMANTIC_TOP_N'], 8),
    SEMANTIC_PARAPHRASES: parseIntOr(env['SEMANTIC_PARAPHRASES'], 2),
    STRUCTURED_CLARITY_CHECK: parseFlag(env['STRUCTURED_CLARITY_CHECK'], true),
    STRUCTURED_ANALYSIS: parseFlag(env['STRUCTURED_ANALYSIS'], true),
    STRUCTURED_FOLLOW_UPS: parseIntOr(env['STRUCTURED_FOLLOW_UPS'], 3),
    INGEST_BATCH_SIZE: parseIntOr(env['INGEST_BATCH_SIZE'], 32),
    INGEST_FILE_CONCURRENCY: parseIntOr(env['INGEST_FILE_CONCURRENCY'], 2),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) =>
  Object.freeze({
    server: {
      port: env.PORT,
      host: env.HOST,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
      queryTimeoutMs: env.STORE_QUERY_TIMEOUT_MS,
    },
    request: {
      /** Overall budget for answering one question, retries included */
      timeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    models: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      completionModel: env.LLM_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: EMBEDDING_DIMENSIONS,
    },
    labels: {
      path: env.LABELS_PATH,
    },
    retrieval: {
      topK: env.SEMANTIC_TOP_K,
      topN: env.SEMANTIC_TOP_N,
      paraphrases: env.SEMANTIC_PARAPHRASES,
    },
    structured: {
      checkClarity: env.STRUCTURED_CLARITY_CHECK,
      analyze: env.STRUCTURED_ANALYSIS,
      followUps: env.STRUCTURED_FOLLOW_UPS,
    },
    ingestion: {
      batchSize: env.INGEST_BATCH_SIZE,
      fileConcurrency: env.INGEST_FILE_CONCURRENCY,
    },
    cors: {
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
  });

export type AppConfig = ReturnType<typeof createConfig>;
