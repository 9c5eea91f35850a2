/**
 * Volatility bands
 *
 * Envelopes around a moving-average basis at k sample standard deviations of
 * the closes in the trailing window. Bars before the window fills carry null.
 *
 * Every index is computed from its own window (mean and variance in two
 * passes), so no rounding carries over from earlier bars. The
 * exponential basis is the one running value: seeded with the simple mean of
 * the first full window, then smoothed with alpha = 2 / (period + 1).
 */

import { InsufficientHistoryError } from '@barlens/contracts';
import type { Bar, BandBarState, BandParameters } from '@barlens/contracts';
import { resolveBandParameters } from './params.js';

/**
 * Mean and sample standard deviation of closes[end - period + 1 .. end].
 */
export function windowStats(
  closes: readonly number[],
  end: number,
  period: number
): { mean: number; stdDev: number } {
  const start = end - period + 1;

  let sum = 0;
  for (let i = start; i <= end; i++) {
    sum += closes[i] ?? 0;
  }
  const mean = sum / period;

  let squares = 0;
  for (let i = start; i <= end; i++) {
    const deviation = (closes[i] ?? mean) - mean;
    squares += deviation * deviation;
  }

  return { mean, stdDev: Math.sqrt(squares / (period - 1)) };
}

/**
 * Computes bands for every bar.
 *
 * @param bars - Series with at least a close per bar
 * @param params - Partial parameters, defaults filled in
 * @returns One frozen entry per bar; null for the first `period - 1` bars
 * @throws InvalidParametersError when the parameters are rejected
 *
 * @example
 * ```typescript
 * const bands = computeBands(bars, { period: 20, multipliers: [1, 2] });
 * bands[19]?.bands; // [{ multiplier: 1, ... }, { multiplier: 2, ... }]
 * ```
 */
export function computeBands(
  bars: readonly Pick<Bar, 'close'>[],
  params: Partial<BandParameters> = {}
): Array<BandBarState | null> {
  const { period, maKind, multipliers } = resolveBandParameters(params);
  const closes = bars.map((bar) => bar.close);
  const alpha = 2 / (period + 1);

  const result: Array<BandBarState | null> = [];
  let ema: number | undefined;

  for (let i = 0; i < closes.length; i++) {
    const close = closes[i];
    if (close === undefined || i < period - 1) {
      result.push(null);
      continue;
    }

    const { mean, stdDev } = windowStats(closes, i, period);

    let basis = mean;
    if (maKind === 'exponential') {
      ema = ema === undefined ? mean : (close - ema) * alpha + ema;
      basis = ema;
    }

    const envelopes = multipliers.map((multiplier) =>
      Object.freeze({
        multiplier,
        upper: basis + multiplier * stdDev,
        lower: basis - multiplier * stdDev,
      })
    );
    result.push(Object.freeze({ basis, stdDev, bands: Object.freeze(envelopes) }));
  }

  return result;
}

/**
 * Reports whether a series is too short for any bar to carry bands.
 *
 * @returns An InsufficientHistoryError when `length < period`, otherwise null
 * @throws InvalidParametersError when the parameters are rejected
 */
export function assessBandHistory(
  length: number,
  params: Partial<BandParameters> = {}
): InsufficientHistoryError | null {
  const { period } = resolveBandParameters(params);
  if (length >= period) {
    return null;
  }
  return new InsufficientHistoryError(`Bands need at least ${period} bars, received ${length}`, {
    indicator: 'bands',
    required: period,
    received: length,
  });
}
