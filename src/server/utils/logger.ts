import pino from 'pino';
import type { Logger } from 'pino';
import { getLoggingConfig } from '../config/logging.js';

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const config = getLoggingConfig();

  return pino({
    level: config.level,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'wiki-rag-normalizer',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.enablePrettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
