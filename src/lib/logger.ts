/**
 * Standardized Logger Utility
 *
 * Simple wrapper around Pino logger with helper functions.
 * Components receive a logger; nothing reads a process-wide instance.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export function defaultLogLevel(nodeEnv: string | undefined): 'debug' | 'info' {
  return nodeEnv === 'development' ? 'debug' : 'info';
}

/**
 * Create a Pino logger with the annotator's defaults. Without an explicit
 * level, `LOG_LEVEL` applies, then `debug` in development and `info` elsewhere.
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  const { level, ...rest } = options;
  return pino({
    name: 'deployment-annotator',
    level: level ?? process.env.LOG_LEVEL ?? defaultLogLevel(process.env.NODE_ENV),
    ...rest,
  });
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation. Both `end` and `error` return
 * the elapsed milliseconds.
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

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          errorType: error instanceof Error ? error.name : undefined,
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
