/**
 * @fileoverview Error taxonomy for the barlens indicator engine.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data, so callers can tell "no data for this indicator" apart
 * from "this computation failed".
 *
 * All errors extend the BarLensError base class and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @barlens/contracts/errors
 */

import type { IndicatorKind } from './pipeline.js';

/**
 * Base error class for all barlens errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BarLensError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class BarLensError extends Error {
  /**
   * Machine-readable error code (e.g., 'INVALID_BAR').
   */
  readonly code: string;

  /**
   * Structured error data. Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes error to JSON-safe object.
   *
   * @example
   * ```typescript
   * const err = new BarLensError('TEST', 'Test error');
   * JSON.stringify(err.toJSON());
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Context carried by an InsufficientHistoryError.
 */
export interface InsufficientHistoryData {
  indicator: IndicatorKind;
  required: number;
  received: number;
  [key: string]: unknown;
}

/**
 * Raised (or reported as a `no-data` outcome) when a series is shorter than an
 * indicator's minimum lookback, so that no position can carry a value.
 *
 * @example
 * ```typescript
 * new InsufficientHistoryError('Bands need at least 20 bars', {
 *   indicator: 'bands',
 *   required: 20,
 *   received: 12,
 * });
 * ```
 */
export class InsufficientHistoryError extends BarLensError {
  declare readonly data: InsufficientHistoryData;

  constructor(message: string, data: InsufficientHistoryData) {
    super('INSUFFICIENT_HISTORY', message, data);
  }
}

/**
 * Context carried by an InvalidBarError.
 */
export interface InvalidBarData {
  /** Position of the offending bar in the series */
  index: number;
  /** Short machine-friendly reason, e.g. 'high-below-body' */
  reason: string;
  timestamp?: number;
  [key: string]: unknown;
}

/**
 * Thrown when a bar breaks the OHLC invariants or the series is not strictly
 * increasing in time.
 */
export class InvalidBarError extends BarLensError {
  declare readonly data: InvalidBarData;

  constructor(message: string, data: InvalidBarData) {
    super('INVALID_BAR', message, data);
  }
}

/**
 * Context carried by an InvalidParametersError.
 */
export interface InvalidParametersData {
  indicator: IndicatorKind | 'pipeline';
  /** One entry per failed check, formatted as `path: message` */
  issues: string[];
  [key: string]: unknown;
}

/**
 * Thrown synchronously, before any output is produced, when indicator
 * parameters are rejected.
 */
export class InvalidParametersError extends BarLensError {
  declare readonly data: InvalidParametersData;

  constructor(message: string, data: InvalidParametersData) {
    super('INVALID_PARAMETERS', message, data);
  }
}

/**
 * Type guard to check if an error is a BarLensError.
 *
 * @example
 * ```typescript
 * try {
 *   pipeline.load(bars);
 * } catch (err) {
 *   if (isBarLensError(err)) {
 *     logger.error(err.message, { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isBarLensError(error: unknown): error is BarLensError {
  return error instanceof BarLensError;
}

export function isInsufficientHistoryError(error: unknown): error is InsufficientHistoryError {
  return error instanceof InsufficientHistoryError;
}

export function isInvalidBarError(error: unknown): error is InvalidBarError {
  return error instanceof InvalidBarError;
}

export function isInvalidParametersError(error: unknown): error is InvalidParametersError {
  return error instanceof InvalidParametersError;
}
