/**
 * Logging Configuration
 *
 * Centralized configuration for structured logging with Pino.
 * Pretty printing is for interactive development runs only; test runs stay on plain JSON.
 */

export interface LoggingConfig {
  level: string;
  isDevelopment: boolean;
  enablePrettyPrint: boolean;
}

/**
 * Get logging configuration from environment variables
 */
export function getLoggingConfig(): LoggingConfig {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const defaultLevel = nodeEnv === 'test' ? 'warn' : isDevelopment ? 'debug' : 'info';

  return {
    level: process.env.LOG_LEVEL || defaultLevel,
    isDevelopment,
    enablePrettyPrint: isDevelopment && process.env.LOG_PRETTY !== 'false',
  };
}
