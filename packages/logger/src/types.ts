/**
 * @fileoverview Type definitions for the barlens logger.
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';
import type TransportStream from 'winston-transport';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Warning conditions that should be reviewed
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/barlens.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON (recommended for production)
   * - false: Human-readable pretty-print (recommended for development)
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * @example './logs/barlens.log'
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output. Used by library code that receives no logger.
   * @default false
   */
  silent?: boolean;

  /**
   * Additional transports, attached after the console and file transports.
   */
  transports?: TransportStream[];
}

/**
 * Child logger context fields.
 * These fields will be automatically included in all logs from the child logger.
 *
 * @example
 * ```typescript
 * const pipelineLogger = logger.child({ component: 'pipeline', symbol: 'SPY' });
 * pipelineLogger.info('Bars loaded'); // includes component and symbol
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  indicator?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
