/**
 * Postgres error classification and the single transparent reconnect.
 */

import { err, ok, type Result } from 'neverthrow';

import { createTimeoutError } from '../../../../common/types/errors.js';
import { QUERY_CANCELED_SQLSTATE } from '../../../../infra/database/query-builders/timeout.js';
import {
  createQueryExecutionError,
  createSchemaError,
  createStoreUnavailableError,
  createUnknownTableError,
  type StoreError,
} from '../../core/errors.js';

import type { Logger } from 'pino';

const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENOTFOUND',
  // admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
]);

// Raised by pg without a code when the socket closes or the pool cannot connect
const CONNECTION_MESSAGES = [/connection terminated/i, /timeout exceeded when trying to connect/i];

const UNDEFINED_COLUMN = '42703';
const UNDEFINED_TABLE = '42P01';

export type ClassifiedError =
  | { readonly kind: 'connection' }
  | { readonly kind: 'error'; readonly error: StoreError };

const readCode = (error: unknown): string | undefined => {
  const code = typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
  return typeof code === 'string' ? code : undefined;
};

const readMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isConnectionError = (error: unknown): boolean => {
  const code = readCode(error);
  if (code !== undefined && (CONNECTION_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }
  const message = readMessage(error);
  return CONNECTION_MESSAGES.some((pattern) => pattern.test(message));
};

/**
 * Maps a thrown driver error onto the store taxonomy.
 */
export const classifyPgError = (operation: string, error: unknown): ClassifiedError => {
  if (isConnectionError(error)) {
    return { kind: 'connection' };
  }

  const code = readCode(error);
  const message = readMessage(error);

  if (code === QUERY_CANCELED_SQLSTATE) {
    return { kind: 'error', error: createTimeoutError(operation, error) };
  }
  if (code === UNDEFINED_COLUMN) {
    const column = /column "([^"]+)"/.exec(message)?.[1] ?? 'unknown';
    return { kind: 'error', error: createSchemaError('', column) };
  }
  if (code === UNDEFINED_TABLE) {
    const table = /relation "([^"]+)"/.exec(message)?.[1] ?? 'unknown';
    return { kind: 'error', error: createUnknownTableError(table) };
  }
  return { kind: 'error', error: createQueryExecutionError(operation, message, code, error) };
};

/**
 * Runs `attempt`; when the connection drops, runs it once more on a fresh
 * pooled connection (pg discards the broken client). A second connection
 * failure becomes StoreUnavailableError.
 */
export async function runWithReconnect<T>(
  operation: string,
  log: Logger,
  attempt: () => Promise<T>
): Promise<Result<T, StoreError>> {
  const maxAttempts = 2;

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return ok(await attempt());
    } catch (error) {
      const classified = classifyPgError(operation, error);
      if (classified.kind === 'error') {
        return err(classified.error);
      }
      if (attemptNumber >= maxAttempts) {
        log.error({ err: error, operation }, 'Store unavailable after reconnect attempt');
        return err(createStoreUnavailableError(operation, error));
      }
      log.warn({ err: error, operation }, 'Store connection lost, reconnecting');
    }
  }
}
