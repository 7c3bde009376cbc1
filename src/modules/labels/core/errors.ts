/**
 * Labels Module - Errors
 */

export interface ConfigError {
  readonly type: 'ConfigError';
  readonly message: string;
  readonly source: string;
  readonly cause?: unknown;
}

export const createConfigError = (
  source: string,
  message: string,
  cause?: unknown
): ConfigError => ({
  type: 'ConfigError',
  message,
  source,
  ...(cause !== undefined && { cause }),
});
