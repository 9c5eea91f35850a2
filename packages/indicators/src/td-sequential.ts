/**
 * TD Sequential state machine
 *
 * Annotates each bar with price flip, setup, TDST and countdown state. The
 * machine is incremental: onBar() takes the next bar and returns that bar's
 * state, so a streaming caller and a batch pass produce identical output.
 *
 * Per bar, the setup phase runs first (flip, continuation, completion) and the
 * countdown phase second (TDST cancellation, then the qualifying check). A
 * countdown armed on a bar starts counting on the following bar.
 *
 * Rules, with L = setupLookback and C = countdownLookback:
 * - bearish flip: close < close[L back] after a bar that was not; opens a buy
 *   setup (the bullish flip mirrors it and opens a sell setup)
 * - a buy setup counts while close < close[L back]; any other bar ends it
 * - the 9th bar completes the setup; later bars that still satisfy the
 *   condition extend it with count 0
 * - perfection (9th bar only): low of bar 8 or 9 at or below the lows of bars
 *   6 and 7 (highs at or above, for sell)
 * - completion records TDST (highest high of the nine bars for buy, lowest low
 *   for sell) and arms a countdown in the same direction; the level stays
 *   fixed through the extension, later bars never widen it
 * - a buy countdown bar has close <= low[C back]; the 13th must also close at
 *   or below the 8th countdown bar's close, otherwise it is held as a deferred
 *   13 and re-tested on later countdown bars
 * - a running countdown is cancelled by an opposite setup completing or by a
 *   close beyond the TDST level (above resistance for buy, below support for
 *   sell); a same-direction setup completing restarts it from 0
 */

import {
  COUNTDOWN_QUALIFIER_BAR,
  COUNTDOWN_TARGET,
  InsufficientHistoryError,
  SETUP_TARGET,
} from '@barlens/contracts';
import type {
  Bar,
  CountdownValue,
  PriceFlip,
  SequentialBarState,
  SequentialParameters,
  TdstLevel,
  TrendDirection,
} from '@barlens/contracts';
import { resolveSequentialParameters } from './params.js';

type Direction = Exclude<TrendDirection, 'none'>;

interface ActiveSetup {
  direction: Direction;
  /** 1..9 while counting, stays 9 through the extension */
  count: number;
}

interface ActiveCountdown {
  direction: Direction;
  count: number;
  deferred: boolean;
  /** Index of the bar that armed it */
  armedAt: number;
  /** Close of the 8th countdown bar, once reached */
  qualifierClose: number | null;
  /** Set on the bar that reached the final 13 */
  finished: boolean;
}

/**
 * Incremental TD Sequential tracker.
 *
 * @example
 * ```typescript
 * const machine = new SequentialStateMachine();
 * for (const bar of bars) {
 *   const state = machine.onBar(bar);
 *   if (state.setupCount === 9) console.log('setup complete at', state.index);
 * }
 * ```
 */
export class SequentialStateMachine {
  private readonly params: SequentialParameters;
  private bars: Bar[] = [];
  private setup: ActiveSetup | null = null;
  private countdown: ActiveCountdown | null = null;
  private tdst: TdstLevel | null = null;

  /**
   * @throws InvalidParametersError when a lookback is rejected
   */
  constructor(params: Partial<SequentialParameters> = {}) {
    this.params = resolveSequentialParameters(params);
  }

  /**
   * Process the next bar and return its state.
   */
  onBar(bar: Bar): SequentialBarState {
    if (this.countdown?.finished) {
      this.countdown = null;
    }

    this.bars.push(bar);
    const index = this.bars.length - 1;

    // Setup phase
    const priceFlip = this.detectFlip(index);
    let setupCount = 0;
    let setupPerfected = false;
    let countdownCancelled = false;

    if (priceFlip !== 'none') {
      this.setup = { direction: priceFlip === 'bearish' ? 'buy' : 'sell', count: 1 };
      setupCount = 1;
    } else if (this.setup && this.setupContinues(this.setup.direction, index)) {
      if (this.setup.count < SETUP_TARGET) {
        this.setup.count += 1;
        setupCount = this.setup.count;

        if (this.setup.count === SETUP_TARGET) {
          setupPerfected = this.isPerfected(this.setup.direction, index);
          this.tdst = this.recordTdst(this.setup.direction, index);
          countdownCancelled = this.armCountdown(this.setup.direction, index);
        }
      }
    } else {
      this.setup = null;
    }

    // Countdown phase
    let countdownQualified = false;
    const countdown = this.countdown;

    if (countdown && countdown.armedAt < index) {
      if (this.breaksTdst(countdown.direction, bar.close)) {
        this.countdown = null;
        countdownCancelled = true;
      } else if (this.countdownQualifies(countdown.direction, index)) {
        countdownQualified = true;
        this.advanceCountdown(countdown, bar.close);
      }
    }

    return Object.freeze({
      index,
      timestamp: bar.timestamp,
      priceFlip,
      setupDirection: this.setup?.direction ?? 'none',
      setupCount,
      setupPerfected,
      tdst: this.tdst,
      countdownDirection: this.countdown?.direction ?? 'none',
      countdown: this.countdown ? countdownValue(this.countdown) : null,
      countdownQualified,
      countdownCancelled,
    });
  }

  /**
   * Number of bars processed so far
   */
  get barCount(): number {
    return this.bars.length;
  }

  /**
   * Reset tracker state
   */
  reset(): void {
    this.bars = [];
    this.setup = null;
    this.countdown = null;
    this.tdst = null;
  }

  private close(index: number): number | undefined {
    return this.bars[index]?.close;
  }

  private detectFlip(index: number): PriceFlip {
    const lookback = this.params.setupLookback;
    if (index < lookback + 1) {
      return 'none';
    }

    const close = this.close(index);
    const closeBack = this.close(index - lookback);
    const prevClose = this.close(index - 1);
    const prevCloseBack = this.close(index - 1 - lookback);
    if (
      close === undefined ||
      closeBack === undefined ||
      prevClose === undefined ||
      prevCloseBack === undefined
    ) {
      return 'none';
    }

    if (close < closeBack && prevClose >= prevCloseBack) {
      return 'bearish';
    }
    if (close > closeBack && prevClose <= prevCloseBack) {
      return 'bullish';
    }
    return 'none';
  }

  private setupContinues(direction: Direction, index: number): boolean {
    const close = this.close(index);
    const closeBack = this.close(index - this.params.setupLookback);
    if (close === undefined || closeBack === undefined) {
      return false;
    }
    return direction === 'buy' ? close < closeBack : close > closeBack;
  }

  /**
   * Bar 9 is `index`, bars 6..8 are the three before it.
   */
  private isPerfected(direction: Direction, index: number): boolean {
    const bar6 = this.bars[index - 3];
    const bar7 = this.bars[index - 2];
    const bar8 = this.bars[index - 1];
    const bar9 = this.bars[index];
    if (!bar6 || !bar7 || !bar8 || !bar9) {
      return false;
    }

    if (direction === 'buy') {
      const reference = Math.min(bar6.low, bar7.low);
      return bar8.low <= reference || bar9.low <= reference;
    }
    const reference = Math.max(bar6.high, bar7.high);
    return bar8.high >= reference || bar9.high >= reference;
  }

  private recordTdst(direction: Direction, index: number): TdstLevel {
    const setupBars = this.bars.slice(index - SETUP_TARGET + 1, index + 1);
    const price =
      direction === 'buy'
        ? Math.max(...setupBars.map((b) => b.high))
        : Math.min(...setupBars.map((b) => b.low));

    return Object.freeze({
      price,
      kind: direction === 'buy' ? 'resistance' : 'support',
      setupDirection: direction,
      barIndex: index,
    });
  }

  /**
   * Arms a fresh countdown on a completed setup.
   *
   * @returns true when an opposite countdown was cancelled by it
   */
  private armCountdown(direction: Direction, index: number): boolean {
    const previous = this.countdown;
    const cancelled = previous !== null && !previous.finished && previous.direction !== direction;

    this.countdown = {
      direction,
      count: 0,
      deferred: false,
      armedAt: index,
      qualifierClose: null,
      finished: false,
    };
    return cancelled;
  }

  private breaksTdst(direction: Direction, close: number): boolean {
    const level = this.tdst;
    if (!level) {
      return false;
    }
    if (direction === 'buy' && level.kind === 'resistance') {
      return close > level.price;
    }
    if (direction === 'sell' && level.kind === 'support') {
      return close < level.price;
    }
    return false;
  }

  private countdownQualifies(direction: Direction, index: number): boolean {
    const bar = this.bars[index];
    const reference = this.bars[index - this.params.countdownLookback];
    if (!bar || !reference) {
      return false;
    }
    return direction === 'buy' ? bar.close <= reference.low : bar.close >= reference.high;
  }

  private advanceCountdown(countdown: ActiveCountdown, close: number): void {
    if (!countdown.deferred && countdown.count < COUNTDOWN_TARGET - 1) {
      countdown.count += 1;
      if (countdown.count === COUNTDOWN_QUALIFIER_BAR) {
        countdown.qualifierClose = close;
      }
      return;
    }

    const qualifier = countdown.qualifierClose;
    const passes =
      qualifier !== null && (countdown.direction === 'buy' ? close <= qualifier : close >= qualifier);

    if (passes) {
      countdown.count = COUNTDOWN_TARGET;
      countdown.deferred = false;
      countdown.finished = true;
    } else {
      countdown.deferred = true;
    }
  }
}

function countdownValue(countdown: ActiveCountdown): CountdownValue {
  return countdown.deferred
    ? Object.freeze({ kind: 'deferred-thirteen' })
    : Object.freeze({ kind: 'count', value: countdown.count });
}

/**
 * Runs the state machine over a whole series.
 *
 * @returns One frozen state per bar
 * @throws InvalidParametersError when a lookback is rejected
 */
export function computeSequential(
  bars: readonly Bar[],
  params: Partial<SequentialParameters> = {}
): SequentialBarState[] {
  const machine = new SequentialStateMachine(params);
  return bars.map((bar) => machine.onBar(bar));
}

/**
 * Reports whether a series is too short for any price flip, and so for any
 * setup or countdown, to occur (fewer than setupLookback + 2 bars).
 *
 * @throws InvalidParametersError when a lookback is rejected
 */
export function assessSequentialHistory(
  length: number,
  params: Partial<SequentialParameters> = {}
): InsufficientHistoryError | null {
  const { setupLookback } = resolveSequentialParameters(params);
  const required = setupLookback + 2;
  if (length >= required) {
    return null;
  }
  return new InsufficientHistoryError(
    `TD Sequential needs at least ${required} bars, received ${length}`,
    { indicator: 'td-sequential', required, received: length }
  );
}

/**
 * Display label for a countdown value: "1".."13", or "13+" when deferred.
 */
export function formatCountdown(value: CountdownValue): string {
  return value.kind === 'deferred-thirteen' ? '13+' : String(value.value);
}
