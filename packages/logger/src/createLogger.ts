/**
 * @fileoverview Main logger factory for barlens
 * Creates configured Winston logger instances with structured logging
 * and flexible transport options.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message)
 * - Multiple transports (console, file, caller-supplied)
 * - Environment-aware formatting (JSON in prod, pretty-print in dev)
 * - Child logger support for contextual logging
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Bars loaded', { count: 250 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/barlens.log',
 * });
 *
 * const pipelineLogger = logger.child({ component: 'pipeline' });
 * pipelineLogger.debug('Indicator computed', { indicator: 'bands', duration_ms: 3 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
    transports: extraTransports = [],
  } = config;

  // Standard fields first, then output format
  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  transports.push(...extraTransports);

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Fatal errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit all configuration from the parent logger
 * and include the context fields in every log entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const cliLogger = createChildLogger(logger, { component: 'cli', symbol: 'SPY' });
 * cliLogger.info('Analysis started'); // includes component=cli symbol=SPY
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Creates a logger that discards everything, for callers that pass none.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}
