// Structured logging with Pino
// The library logs at debug level only; the default logger is silent.

import pino from 'pino';

export const LOG_LEVEL_ENV = 'BOUNDED_ARRAY_LOG_LEVEL';

/**
 * Create a logger instance.
 * Level comes from the options, then BOUNDED_ARRAY_LOG_LEVEL, then 'silent'.
 */
export function createLogger(options?: { name?: string; level?: string }): pino.Logger {
  const level = options?.level || process.env[LOG_LEVEL_ENV] || 'silent';
  const name = options?.name || 'bounded-array';

  return pino({ name, level });
}

/**
 * Default logger instance shared by every container that is not given one.
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context.
 */
export function createChildLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}
