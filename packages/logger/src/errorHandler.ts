/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Milliseconds to wait for the logger to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Converts a thrown value into loggable fields.
 */
export function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    const code = 'code' in reason ? reason.code : undefined;
    return {
      name: reason.name,
      message: reason.message,
      ...(typeof code === 'string' ? { code } : {}),
      stack: reason.stack,
    };
  }
  return { message: String(reason), value: reason };
}

/**
 * Attaches global error handlers to the Node.js process.
 * Captures uncaught exceptions and unhandled promise rejections,
 * logs them, then terminates the process with exit code 1.
 *
 * @returns false when handlers were already attached
 *
 * @example
 * ```typescript
 * import { createLogger, attachGlobalHandlers } from '@barlens/logger';
 *
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): boolean {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return false;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
  return true;
}

/**
 * Exits once the logger has flushed, or after FLUSH_TIMEOUT_MS.
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
