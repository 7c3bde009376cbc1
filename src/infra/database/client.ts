import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { FiraDatabase } from './fira/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type FiraDbClient = Kysely<FiraDatabase>;

export interface DatabaseOptions {
  connectionString: string;
  poolMax: number;
}

/**
 * Create a Kysely instance over a bounded pg pool.
 *
 * Kysely acquires one pooled connection per query or transaction and releases it
 * on every exit path; the pool drops connections that report errors.
 */
export const createDbClient = (options: DatabaseOptions): FiraDbClient => {
  return new Kysely<FiraDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: options.connectionString,
        max: options.poolMax,
      }),
    }),
  });
};

/**
 * Initialize the database client from application config
 */
export const initDatabase = (config: AppConfig): FiraDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for the analytics database (DATABASE_URL)');
  }

  return createDbClient({ connectionString: database.url, poolMax: database.poolMax });
};

// Re-export types
export type {
  FiraDatabase,
  OpexDataHybrid,
  BpafgDemand,
  PriorityTemplate,
  ChatSessions,
  ChatMessages,
  Timestamp,
} from './fira/types.js';
