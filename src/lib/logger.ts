/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Logs go to stderr so stdout stays free for command output
 * (rendered Dockerfiles, plans, reports).
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerSettings {
  /** Logger name, shown on every line */
  name?: string;
  level?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
}

/**
 * Create a Pino logger with defaults for the provisioner
 */
export function createLogger(settings: LoggerSettings = {}): pino.Logger {
  const pretty = settings.pretty ?? process.env.NODE_ENV === 'development';

  const options: pino.LoggerOptions = {
    name: settings.name ?? 'image-provisioner',
    level:
      settings.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    redact: {
      paths: ['password', 'token', 'secret', 'authorization', '*.password', '*.token', '*.secret'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation - functional approach
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
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
  };
}
