/**
 * @fileoverview Custom Winston formats for the barlens logger.
 * Includes field normalization and human-readable output formatting.
 */

import { format } from 'winston';

/**
 * Fields printed first, in this order, by {@link prettyPrint}.
 */
const LEADING_FIELDS: readonly string[] = ['component', 'symbol', 'indicator'];

/**
 * Winston internals that never appear in the pretty-printed context.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Winston format that adds a timestamp and expands Error objects.
 *
 * @example
 * ```typescript
 * const logFormat = format.combine(standardFields, format.json());
 * ```
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one pretty-printed line from a log record.
 *
 * @example
 * ```typescript
 * renderPretty({ timestamp: 'T', level: 'info', message: 'done', indicator: 'bands', count: 3 });
 * // [T] info: done indicator=bands count=3
 * ```
 */
export function renderPretty(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const field of LEADING_FIELDS) {
    const value = info[field];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${field}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || LEADING_FIELDS.includes(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Winston format for human-readable pretty-print output.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Indicator computed component=pipeline indicator=bands duration_ms=2
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderPretty(info))
);
