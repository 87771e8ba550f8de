/**
 * Logger factory
 *
 * pino writing to stderr, so that reports printed on stdout stay clean.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from '../../config/loader';
import type { LogLevel } from '../../config/loader';

export type { Logger };

export interface LoggerOptions {
  /** Defaults to the configured SAMPLE_SIZE_LOG_LEVEL */
  level?: LogLevel;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'ab-sample-size',
      level: options.level ?? getConfig().logLevel,
    },
    pino.destination(2)
  );
}

let defaultLogger: Logger | null = null;

/**
 * Shared logger used when a caller does not inject one
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
