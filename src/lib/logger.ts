/**
 * Standardized Logger Utility
 *
 * Thin factory around Pino; components receive a `Logger` and derive children from it.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  environment?: string;
  pretty?: boolean;
  service?: string;
  version?: string;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const isDevelopment =
    config?.environment === 'development' || process.env.NODE_ENV === 'development';

  const level = config?.level ?? process.env.LOG_LEVEL ?? 'info';

  const options: LoggerOptions = {
    name: config?.service ?? 'preview-deployer',
    level,
    redact: {
      // Credentials travel through deployment units and image pull secrets
      paths: [
        'password',
        'token',
        'secret',
        'authorization',
        'credentials',
        '*.password',
        '*.token',
        '*.secret',
        'imagePullCredentials',
      ],
      censor: '[REDACTED]',
    },
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME ?? 'localhost',
      version: config?.version ?? '0.1.0',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (isDevelopment && config?.pretty !== false) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(options);
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;
      logger.info(
        { operation, duration, ...context, ...additionalContext },
        `Completed ${operation}`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;
      logger.error(
        { operation, duration, error, ...context, ...additionalContext },
        `Failed ${operation}`,
      );
    },
  };
}
