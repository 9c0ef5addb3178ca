/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a timer helper. Components take a Logger
 * through their constructor instead of reaching for a module-level instance.
 */

import pino from 'pino';
import { appConfig } from '../config/app-config';

export type { Logger } from 'pino';

/**
 * Create a Pino logger at the configured level unless options override it
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  // CLI output goes to stdout, so logs go to stderr
  const isCliMode = process.env.ADVISOR_CLI === 'true';

  return pino(
    {
      name: 'base-image-advisor',
      level: appConfig.logging.level,
      ...options,
    },
    isCliMode ? pino.destination(2) : undefined,
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
  checkpoint: (label: string, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );

      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },

    checkpoint(label: string, additionalContext: Record<string, unknown> = {}): number {
      const elapsed = Date.now() - startTime;

      logger.debug(
        {
          operation,
          checkpoint: label,
          elapsed_ms: elapsed,
          ...context,
          ...additionalContext,
        },
        `${operation} checkpoint: ${label} at ${elapsed}ms`,
      );

      return elapsed;
    },
  };
}
