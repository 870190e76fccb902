/**
 * Logging setup built on Pino
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { extractErrorMessage } from './error-utils';

export type { Logger };

/**
 * Fields that must never reach the log output
 */
const REDACTED_PATHS = [
  'password',
  'token',
  'authconfig',
  'authConfig.password',
  'headers.authorization',
  '*.password',
  '*.token',
];

/**
 * Create a Pino logger configured for the current environment.
 *
 * Pretty printing is only enabled for interactive development sessions; tests and
 * production keep plain JSON lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const level = process.env.LOG_LEVEL ?? (nodeEnv === 'production' ? 'info' : 'debug');

  const usePretty =
    nodeEnv === 'development' && process.stdout.isTTY === true && process.env.LOG_FORMAT !== 'json';

  const baseOptions: LoggerOptions = {
    name: 'registry-relay',
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    ...options,
  };

  if (usePretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
      },
    });
  }

  return pino(baseOptions);
}

export interface Timer {
  end(context?: Record<string, unknown>): void;
  error(error: unknown, context?: Record<string, unknown>): void;
  checkpoint(label: string, context?: Record<string, unknown>): void;
}

/**
 * Time an operation and log its duration on completion or failure
 */
export function createTimer(
  logger: Logger,
  operation: string,
  initialContext: Record<string, unknown> = {},
): Timer {
  const startedAt = Date.now();
  let lastCheckpoint = startedAt;

  return {
    end(context = {}) {
      logger.info(
        { ...initialContext, ...context, operation, durationMs: Date.now() - startedAt },
        `${operation} completed`,
      );
    },
    error(error, context = {}) {
      logger.error(
        {
          ...initialContext,
          ...context,
          operation,
          error: extractErrorMessage(error),
          durationMs: Date.now() - startedAt,
        },
        `${operation} failed`,
      );
    },
    checkpoint(label, context = {}) {
      const now = Date.now();
      logger.debug(
        {
          ...initialContext,
          ...context,
          operation,
          checkpoint: label,
          sinceStartMs: now - startedAt,
          sinceLastMs: now - lastCheckpoint,
        },
        `${operation} checkpoint: ${label}`,
      );
      lastCheckpoint = now;
    },
  };
}
