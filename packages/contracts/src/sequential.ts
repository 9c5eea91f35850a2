/**
 * @fileoverview TD Sequential per-bar state and parameters.
 *
 * @module @barlens/contracts/sequential
 */

/**
 * Price flip flag on a bar.
 *
 * - 'bearish': close dropped below the close `setupLookback` bars earlier,
 *   after a bar that had not (opens a buy setup)
 * - 'bullish': the mirror image (opens a sell setup)
 */
export type PriceFlip = 'none' | 'bullish' | 'bearish';

/**
 * Direction of a setup or countdown. A buy setup counts a decline, a sell
 * setup counts an advance.
 */
export type TrendDirection = 'none' | 'buy' | 'sell';

/**
 * Countdown value.
 *
 * A qualifying 13th bar that fails the 13-vs-8 check is held as
 * `deferred-thirteen` (displayed as "13+") instead of being encoded as a
 * fractional count.
 */
export type CountdownValue =
  | { readonly kind: 'count'; readonly value: number }
  | { readonly kind: 'deferred-thirteen' };

/**
 * TDST support or resistance level recorded when a setup completes.
 */
export interface TdstLevel {
  /** Level price */
  readonly price: number;

  /** 'resistance' from a buy setup (highest high), 'support' from a sell setup (lowest low) */
  readonly kind: 'resistance' | 'support';

  /** Direction of the setup that produced the level */
  readonly setupDirection: Exclude<TrendDirection, 'none'>;

  /** Index of the setup's 9th bar */
  readonly barIndex: number;
}

/**
 * Annotated TD Sequential state for a single bar.
 */
export interface SequentialBarState {
  /** Position in the input series */
  readonly index: number;

  /** Timestamp of the input bar */
  readonly timestamp: number;

  readonly priceFlip: PriceFlip;

  /**
   * Direction of the setup running through this bar. Stays set while a
   * completed setup keeps extending (count reported as 0).
   */
  readonly setupDirection: TrendDirection;

  /** 1..9 on counted setup bars, 0 otherwise */
  readonly setupCount: number;

  /** True only on a 9th setup bar that meets the perfection rule */
  readonly setupPerfected: boolean;

  /** Most recent TDST level, if any setup has completed so far */
  readonly tdst: TdstLevel | null;

  /** Direction of the countdown armed or running on this bar */
  readonly countdownDirection: TrendDirection;

  /** Countdown value after this bar, null when no countdown is armed */
  readonly countdown: CountdownValue | null;

  /** True when this bar is a countdown bar (advanced or re-tested the 13th) */
  readonly countdownQualified: boolean;

  /** True on the bar where a running countdown was cancelled */
  readonly countdownCancelled: boolean;
}

/**
 * TD Sequential parameters.
 *
 * The published method fixes both lookbacks (4 and 2); they are exposed for
 * completeness but are not normally tuned.
 */
export interface SequentialParameters {
  /** Bars back for the flip and setup close comparison */
  setupLookback: number;

  /** Bars back for the countdown close-vs-low/high comparison */
  countdownLookback: number;
}

export const DEFAULT_SEQUENTIAL_PARAMETERS: Readonly<SequentialParameters> = Object.freeze({
  setupLookback: 4,
  countdownLookback: 2,
});

/** Setup bar count that completes a setup */
export const SETUP_TARGET = 9;

/** Countdown bar count that completes a countdown */
export const COUNTDOWN_TARGET = 13;

/** Countdown bar whose close gates the 13th */
export const COUNTDOWN_QUALIFIER_BAR = 8;
