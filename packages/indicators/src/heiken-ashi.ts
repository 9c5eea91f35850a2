/**
 * Heiken-Ashi smoothing.
 *
 * HA close is the OHLC average; HA open is the midpoint of the previous HA
 * body (the first bar uses its own open/close midpoint). High and low are
 * widened to cover the new body.
 */

import type { Bar, HeikenAshiBar } from '@barlens/contracts';

/**
 * Transforms a bar series into Heiken-Ashi bars, one per input bar. Each
 * candle is frozen; the array is the caller's.
 *
 * @example
 * ```typescript
 * computeHeikenAshi([{ timestamp: 0, open: 10, high: 12, low: 9, close: 11 }]);
 * // [{ timestamp: 0, open: 10.5, high: 12, low: 9, close: 10.5 }]
 * ```
 */
export function computeHeikenAshi(bars: readonly Bar[]): HeikenAshiBar[] {
  const result: HeikenAshiBar[] = [];
  let previous: HeikenAshiBar | undefined;

  for (const bar of bars) {
    const close = (bar.open + bar.high + bar.low + bar.close) / 4;
    const open =
      previous === undefined ? (bar.open + bar.close) / 2 : (previous.open + previous.close) / 2;

    const haBar: HeikenAshiBar = Object.freeze({
      timestamp: bar.timestamp,
      open,
      high: Math.max(bar.high, open, close),
      low: Math.min(bar.low, open, close),
      close,
    });
    result.push(haBar);
    previous = haBar;
  }

  return result;
}

/**
 * Re-shapes Heiken-Ashi bars as plain bars so they can feed the other
 * calculators.
 */
export function heikenAshiAsBars(haBars: readonly HeikenAshiBar[]): Bar[] {
  return haBars.map((ha) => ({
    timestamp: ha.timestamp,
    open: ha.open,
    high: ha.high,
    low: ha.low,
    close: ha.close,
  }));
}
