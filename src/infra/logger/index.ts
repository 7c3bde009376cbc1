/**
 * Logger factory using Pino
 *
 * JSON lines in production, pino-pretty elsewhere. Credentials carried by the
 * config object (model API key, database URL) are censored wherever they are
 * logged.
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Write here instead of stdout; disables pretty printing */
  destination?: DestinationStream;
}

export const REDACTED_PATHS = [
  'apiKey',
  '*.apiKey',
  'config.models.apiKey',
  'config.database.url',
  'connectionString',
];

const DEFAULT_NAME = 'fira-analytics-server';

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const level = config.level ?? 'info';
  const pretty = config.pretty ?? process.env['NODE_ENV'] !== 'production';

  const options: LoggerOptions = {
    name: config.name ?? DEFAULT_NAME,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    serializers: { err: pinoLib.stdSerializers.err },
  };

  if (config.destination !== undefined) {
    return pinoLib(options, config.destination);
  }

  if (pretty && level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

export { type Logger } from 'pino';
