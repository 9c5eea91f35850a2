/**
 * @fileoverview Bar and bar-series types.
 *
 * Pure data structures with no I/O or business logic.
 *
 * @module @barlens/contracts/bars
 */

/**
 * A single OHLC bar, one per period.
 *
 * @invariant high >= max(open, close)
 * @invariant low <= min(open, close)
 * @invariant all prices are finite
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: Date.UTC(2024, 0, 2),
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 * };
 * ```
 */
export interface Bar {
  /** Bar open time in Unix epoch milliseconds (UTC) */
  timestamp: number;

  /** Opening price */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price */
  close: number;

  /** Trading volume (optional, never read by the indicators) */
  volume?: number;
}

/**
 * Ordered bar sequence, strictly increasing in timestamp, with no missing rows.
 */
export type BarSeries = readonly Bar[];

/**
 * Heiken-Ashi candle for one input bar. Computed candles are frozen.
 *
 * Field names match {@link Bar} so a Heiken-Ashi series can be used as the
 * input series of another indicator.
 */
export interface HeikenAshiBar {
  /** Timestamp of the source bar */
  readonly timestamp: number;

  /** Recursive open: mean of the previous HA open and HA close */
  readonly open: number;

  /** max(high, haOpen, haClose) */
  readonly high: number;

  /** min(low, haOpen, haClose) */
  readonly low: number;

  /** Mean of the source bar's open, high, low and close */
  readonly close: number;
}

/**
 * Price series an indicator is computed over.
 *
 * - 'raw': the loaded bars
 * - 'heiken-ashi': the Heiken-Ashi transform of the loaded bars
 */
export type PriceSource = 'raw' | 'heiken-ashi';
