/**
 * @fileoverview Volatility band state and parameters.
 *
 * @module @barlens/contracts/bands
 */

/**
 * Moving-average kind used for the band basis.
 */
export type MovingAverageKind = 'simple' | 'exponential';

/**
 * One multiplier envelope around the basis.
 */
export interface BandEnvelope {
  /** Standard-deviation multiplier k */
  readonly multiplier: number;

  /** basis + k * stdDev */
  readonly upper: number;

  /** basis - k * stdDev */
  readonly lower: number;
}

/**
 * Band values for one bar with enough history. Computed states are frozen,
 * envelopes included.
 */
export interface BandBarState {
  /** Moving-average center line */
  readonly basis: number;

  /** Sample standard deviation of closes over the lookback window */
  readonly stdDev: number;

  /** One envelope per configured multiplier, ascending */
  readonly bands: readonly BandEnvelope[];
}

/**
 * Band calculator parameters.
 */
export interface BandParameters {
  /** Lookback window length (>= 2) */
  period: number;

  /** Basis moving-average kind */
  maKind: MovingAverageKind;

  /** Standard-deviation multipliers (non-empty, positive integers) */
  multipliers: number[];
}

export const DEFAULT_BAND_PARAMETERS: Readonly<BandParameters> = Object.freeze({
  period: 20,
  maKind: 'simple',
  multipliers: [2],
});
