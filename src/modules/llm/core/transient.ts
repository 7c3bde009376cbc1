/**
 * Transient network failure detection and the single immediate reissue
 * applied to provider calls.
 */

import type { Logger } from 'pino';

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const TRANSIENT_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'FetchError']);

const TRANSIENT_STATUS = new Set([502, 503, 504]);

const readField = (value: unknown, field: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, field) : undefined;

/**
 * True for connection-level failures worth one immediate retry. Looks one
 * level into `cause`, where fetch-based clients keep the socket error.
 */
export const isTransientNetworkError = (error: unknown, depth = 0): boolean => {
  const code = readField(error, 'code');
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
    return true;
  }
  const status = readField(error, 'status');
  if (typeof status === 'number' && TRANSIENT_STATUS.has(status)) {
    return true;
  }
  if (error instanceof Error && TRANSIENT_NAMES.has(error.constructor.name)) {
    return true;
  }
  return depth === 0 && isTransientNetworkError(readField(error, 'cause'), 1);
};

/**
 * Runs `call`; on a transient network failure reissues it once, immediately.
 * Any other failure, or a second failure, is rethrown.
 */
export async function retryOnceIfTransient<T>(
  call: () => Promise<T>,
  log: Logger,
  operation: string
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (!isTransientNetworkError(error)) {
      throw error;
    }
    log.warn({ err: error, operation }, 'Transient provider failure, reissuing once');
    return call();
  }
}
