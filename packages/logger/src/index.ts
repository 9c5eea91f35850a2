/**
 * @fileoverview Public API exports for @barlens/logger
 * Structured logging and error handling for barlens
 */

// Core logger creation
export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

// Output formats
export { standardFields, prettyPrint, renderPretty } from './formats.js';

// Global error handlers
export { attachGlobalHandlers, describeError, gracefulExit } from './errorHandler.js';

// Performance timing utilities
export { startTimer, measureSync } from './perf-timer.js';

// Type exports
export type {
  Logger,
  LoggerConfig,
  LogLevel,
  ChildLoggerContext,
} from './types.js';

export type { PerfTimer } from './perf-timer.js';
