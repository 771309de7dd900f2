/**
 * Logger construction
 *
 * Loggers are plain pino instances, created once and handed to the
 * components that need them. Nothing here reconfigures logging globally.
 */

import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  /** Minimum level, default 'info' */
  level?: LogLevel;
  /** Where JSON lines go, default stderr (sync) */
  destination?: DestinationStream;
}

/**
 * Create the root logger.
 *
 * Output goes to stderr so that stdout stays free for command results.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
