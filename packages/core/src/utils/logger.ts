/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging. Bearer material is redacted by path so that an
 * accidental `logger.info({ secret })` never reaches the sink.
 */

import {
  pino,
  type DestinationStream,
  type Level,
  type Logger as PinoLogger,
  type LoggerOptions,
} from 'pino';

export const REDACTED_PATHS = [
  'secret',
  'apiKey',
  'api_key',
  'derived_key',
  '*.secret',
  '*.apiKey',
  '*.api_key',
  '*.derived_key',
];

export interface CreateLoggerOptions {
  level?: Level | 'silent';
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): PinoLogger {
  const config: LoggerOptions = {
    level: options.level || process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}

export const logger = createLogger();

export type Logger = typeof logger;
