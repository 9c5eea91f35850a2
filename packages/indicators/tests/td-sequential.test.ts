/**
 * TD Sequential Tests
 *
 * Covers:
 * - Price flips and setup counting, including extension
 * - Perfection and TDST recording
 * - Countdown progression, the deferred 13 and completion, both directions
 * - Cancellation by an opposite setup and by a TDST break
 * - Recycling on a same-direction setup
 * - Incremental and batch equivalence
 */

import { describe, it, expect } from 'vitest';
import { isInvalidParametersError } from '@barlens/contracts';
import type { Bar } from '@barlens/contracts';
import {
  SequentialStateMachine,
  assessSequentialHistory,
  computeSequential,
  formatCountdown,
} from '../src/td-sequential.js';
import {
  BUY_SETUP_CLOSES,
  SELL_SETUP_CLOSES,
  ascending,
  barsFromCloses,
  descending,
} from './fixtures.js';

const count = (value: number) => ({ kind: 'count', value });

describe('price flips and setups', () => {
  it('should flag nothing on a flat series', () => {
    const states = computeSequential(barsFromCloses(Array<number>(20).fill(100)));

    for (const state of states) {
      expect(state.priceFlip).toBe('none');
      expect(state.setupCount).toBe(0);
      expect(state.setupDirection).toBe('none');
      expect(state.tdst).toBeNull();
      expect(state.countdown).toBeNull();
    }
  });

  it('should count a buy setup from the bearish flip to 9', () => {
    const states = computeSequential(barsFromCloses(BUY_SETUP_CLOSES));

    expect(states.map((s) => s.setupCount)).toEqual([0, 0, 0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(states.map((s) => s.priceFlip).filter((flip) => flip !== 'none')).toEqual(['bearish']);
    expect(states[5]?.priceFlip).toBe('bearish');
    expect(states[5]?.setupDirection).toBe('buy');
    expect(states[13]?.setupDirection).toBe('buy');
  });

  it('should not flip a decline that starts within the first lookback + 1 bars', () => {
    const states = computeSequential(barsFromCloses([10, 10, 10, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1]));

    expect(states.every((s) => s.priceFlip === 'none' && s.setupCount === 0)).toBe(true);
  });

  it('should count a sell setup from the bullish flip to 9', () => {
    const states = computeSequential(barsFromCloses(SELL_SETUP_CLOSES));

    expect(states[5]?.priceFlip).toBe('bullish');
    expect(states[13]?.setupCount).toBe(9);
    expect(states[13]?.setupDirection).toBe('sell');
  });

  it('should report extension bars with count 0 and keep the direction', () => {
    const states = computeSequential(barsFromCloses([...BUY_SETUP_CLOSES, 90, 89]));

    expect(states[14]?.setupCount).toBe(0);
    expect(states[14]?.setupDirection).toBe('buy');
    expect(states[15]?.setupCount).toBe(0);
    expect(states[15]?.setupDirection).toBe('buy');
  });

  it('should reset a setup on a bar that fails the comparison', () => {
    // index 8 equals the close four bars back
    const states = computeSequential(barsFromCloses([100, 100, 100, 100, 100, 99, 98, 97, 100]));

    expect(states[7]?.setupCount).toBe(3);
    expect(states[8]?.setupCount).toBe(0);
    expect(states[8]?.setupDirection).toBe('none');
    expect(states[8]?.priceFlip).toBe('none');
  });

  it('should never flag a flip on a series shorter than lookback + 2 bars', () => {
    const states = computeSequential(barsFromCloses([100, 100, 100, 100, 99]));
    expect(states.every((s) => s.priceFlip === 'none')).toBe(true);
  });
});

describe('perfection and TDST', () => {
  it('should mark a buy setup perfected when bar 8 undercuts bars 6 and 7', () => {
    const states = computeSequential(barsFromCloses(BUY_SETUP_CLOSES));

    expect(states[13]?.setupPerfected).toBe(true);
    expect(states.filter((s) => s.setupPerfected)).toHaveLength(1);
  });

  it('should not mark a buy setup perfected when bars 6 and 7 hold the lows', () => {
    const bars: Bar[] = barsFromCloses(BUY_SETUP_CLOSES).map((bar, i) =>
      i === 10 || i === 11 ? { ...bar, low: 90 } : bar
    );

    const states = computeSequential(bars);

    expect(states[13]?.setupCount).toBe(9);
    expect(states[13]?.setupPerfected).toBe(false);
  });

  it('should mark a sell setup perfected when bar 8 tops bars 6 and 7', () => {
    const states = computeSequential(barsFromCloses(SELL_SETUP_CLOSES));
    expect(states[13]?.setupPerfected).toBe(true);
  });

  it('should record resistance at the highest high of a buy setup', () => {
    const states = computeSequential(barsFromCloses(BUY_SETUP_CLOSES));

    expect(states[12]?.tdst).toBeNull();
    expect(states[13]?.tdst).toEqual({
      price: 99.5,
      kind: 'resistance',
      setupDirection: 'buy',
      barIndex: 13,
    });
  });

  it('should record support at the lowest low of a sell setup', () => {
    const states = computeSequential(barsFromCloses(SELL_SETUP_CLOSES));

    expect(states[13]?.tdst).toEqual({
      price: 100.5,
      kind: 'support',
      setupDirection: 'sell',
      barIndex: 13,
    });
  });

  it('should record exactly one level per completed setup and keep it afterwards', () => {
    const states = computeSequential(barsFromCloses([...BUY_SETUP_CLOSES, ...descending(90, 6)]));

    const levels = new Set(states.map((s) => s.tdst).filter((level) => level !== null));
    expect(levels.size).toBe(1);
    expect(states[19]?.tdst?.barIndex).toBe(13);
  });

  it('should not widen the level with extension bars', () => {
    const bars: Bar[] = [
      ...barsFromCloses(BUY_SETUP_CLOSES),
      { timestamp: Date.UTC(2024, 0, 16), open: 90, high: 99.9, low: 89.5, close: 90 },
    ];
    const states = computeSequential(bars);

    expect(states[14]?.setupDirection).toBe('buy');
    expect(states[14]?.setupCount).toBe(0);
    expect(states[14]?.tdst?.price).toBe(99.5);
    expect(states[14]?.tdst?.barIndex).toBe(13);
  });
});

describe('countdown', () => {
  it('should arm on the 9th setup bar and start counting on the next bar', () => {
    const states = computeSequential(barsFromCloses([...BUY_SETUP_CLOSES, 90]));

    expect(states[12]?.countdown).toBeNull();
    expect(states[13]?.countdownDirection).toBe('buy');
    expect(states[13]?.countdown).toEqual(count(0));
    expect(states[13]?.countdownQualified).toBe(false);
    expect(states[14]?.countdown).toEqual(count(1));
    expect(states[14]?.countdownQualified).toBe(true);
  });

  it('should complete at 13 when the 13th close holds below the 8th', () => {
    // closes 90..78 on indices 14..26, then one more bar
    const states = computeSequential(barsFromCloses([...BUY_SETUP_CLOSES, ...descending(90, 14)]));

    for (let i = 14; i <= 25; i++) {
      expect(states[i]?.countdown).toEqual(count(i - 13));
      expect(states[i]?.countdownQualified).toBe(true);
    }
    expect(states[26]?.countdown).toEqual(count(13));
    expect(states[26]?.countdownDirection).toBe('buy');
    expect(states[27]?.countdown).toBeNull();
    expect(states[27]?.countdownDirection).toBe('none');
    expect(states[27]?.countdownQualified).toBe(false);
    // the setup keeps extending after the countdown finishes
    expect(states[27]?.setupDirection).toBe('buy');
    expect(states[27]?.tdst?.barIndex).toBe(13);
  });

  it('should hold a deferred 13 until a later countdown bar closes at or below the 8th', () => {
    const closes = [...BUY_SETUP_CLOSES, ...descending(90, 12), 84, 85, 83.25, 83.4, 82];
    const states = computeSequential(barsFromCloses(closes));

    // 8th countdown bar closes at 83
    expect(states[21]?.countdown).toEqual(count(8));
    expect(states[25]?.countdown).toEqual(count(12));

    // bounce bars are not countdown bars
    expect(states[26]?.countdown).toEqual(count(12));
    expect(states[26]?.countdownQualified).toBe(false);
    expect(states[27]?.countdown).toEqual(count(12));

    expect(states[28]?.countdown).toEqual({ kind: 'deferred-thirteen' });
    expect(states[28]?.countdownQualified).toBe(true);
    expect(states[29]?.countdown).toEqual({ kind: 'deferred-thirteen' });
    expect(states[29]?.countdownQualified).toBe(true);

    expect(states[30]?.countdown).toEqual(count(13));
    expect(states[30]?.countdownQualified).toBe(true);

    // the bounce flips and then starts a new buy setup, without completing either
    expect(states[26]?.priceFlip).toBe('bullish');
    expect(states[29]?.setupCount).toBe(4);
    expect(states[30]?.priceFlip).toBe('bearish');
    expect(states[30]?.setupCount).toBe(1);
  });

  it('should cancel a buy countdown when a sell setup completes', () => {
    const closes = [...BUY_SETUP_CLOSES, 90, 89, 88, 92, 93, 94, 95, 96, 97, 98, 98.5, 99];
    const states = computeSequential(barsFromCloses(closes));

    expect(states[16]?.countdown).toEqual(count(3));
    expect(states[24]?.countdown).toEqual(count(3));
    expect(states[24]?.countdownDirection).toBe('buy');
    expect(states[24]?.countdownCancelled).toBe(false);

    const completed = states[25];
    expect(completed?.setupCount).toBe(9);
    expect(completed?.setupDirection).toBe('sell');
    expect(completed?.setupPerfected).toBe(true);
    expect(completed?.countdownCancelled).toBe(true);
    expect(completed?.countdownDirection).toBe('sell');
    expect(completed?.countdown).toEqual(count(0));
    expect(completed?.tdst).toEqual({
      price: 91.5,
      kind: 'support',
      setupDirection: 'sell',
      barIndex: 25,
    });
  });

  it('should cancel a buy countdown on a close above TDST resistance', () => {
    const closes = [...BUY_SETUP_CLOSES, 90, 89, 88, 100, 85];
    const states = computeSequential(barsFromCloses(closes));

    expect(states[16]?.countdown).toEqual(count(3));

    expect(states[17]?.countdownCancelled).toBe(true);
    expect(states[17]?.countdown).toBeNull();
    expect(states[17]?.countdownDirection).toBe('none');
    expect(states[17]?.priceFlip).toBe('bullish');

    // a bar that would have qualified no longer counts
    expect(states[18]?.countdown).toBeNull();
    expect(states[18]?.countdownQualified).toBe(false);
    expect(states[18]?.countdownCancelled).toBe(false);
    expect(states[18]?.priceFlip).toBe('bearish');
  });

  describe('sell side', () => {
    it('should complete at 13 when the 13th close holds above the 8th', () => {
      // closes 110..123 on indices 14..27
      const states = computeSequential(
        barsFromCloses([...SELL_SETUP_CLOSES, ...ascending(110, 14)])
      );

      expect(states[13]?.countdownDirection).toBe('sell');
      expect(states[13]?.countdown).toEqual(count(0));
      for (let i = 14; i <= 25; i++) {
        expect(states[i]?.countdown).toEqual(count(i - 13));
        expect(states[i]?.countdownQualified).toBe(true);
      }
      expect(states[26]?.countdown).toEqual(count(13));
      expect(states[26]?.countdownDirection).toBe('sell');
      expect(states[27]?.countdown).toBeNull();
      expect(states[27]?.countdownDirection).toBe('none');
      expect(states[27]?.setupDirection).toBe('sell');
    });

    it('should hold a deferred 13 until a later countdown bar closes at or above the 8th', () => {
      const closes = [...SELL_SETUP_CLOSES, ...ascending(110, 12), 116, 115, 116.75, 116.6, 118];
      const states = computeSequential(barsFromCloses(closes));

      // 8th countdown bar closes at 117
      expect(states[21]?.countdown).toEqual(count(8));
      expect(states[25]?.countdown).toEqual(count(12));

      expect(states[26]?.countdown).toEqual(count(12));
      expect(states[26]?.countdownQualified).toBe(false);
      expect(states[27]?.countdown).toEqual(count(12));

      expect(states[28]?.countdown).toEqual({ kind: 'deferred-thirteen' });
      expect(states[28]?.countdownQualified).toBe(true);
      expect(states[29]?.countdown).toEqual({ kind: 'deferred-thirteen' });

      expect(states[30]?.countdown).toEqual(count(13));
      expect(states[30]?.countdownDirection).toBe('sell');
      expect(states[26]?.priceFlip).toBe('bearish');
      expect(states[30]?.priceFlip).toBe('bullish');
    });

    it('should cancel a sell countdown on a close below TDST support', () => {
      const closes = [...SELL_SETUP_CLOSES, 110, 111, 112, 100, 115];
      const states = computeSequential(barsFromCloses(closes));

      expect(states[13]?.tdst?.price).toBe(100.5);
      expect(states[16]?.countdown).toEqual(count(3));

      expect(states[17]?.countdownCancelled).toBe(true);
      expect(states[17]?.countdown).toBeNull();
      expect(states[17]?.countdownDirection).toBe('none');
      expect(states[17]?.priceFlip).toBe('bearish');

      expect(states[18]?.countdown).toBeNull();
      expect(states[18]?.countdownQualified).toBe(false);
      expect(states[18]?.priceFlip).toBe('bullish');
    });
  });

  it('should restart the countdown when another buy setup completes', () => {
    const closes = [...BUY_SETUP_CLOSES, 90, 89, 94, ...descending(88, 10)];
    const states = computeSequential(barsFromCloses(closes));

    expect(states[16]?.setupDirection).toBe('sell');
    expect(states[17]?.priceFlip).toBe('bearish');
    expect(states[24]?.countdown).toEqual(count(10));

    expect(states[25]?.setupCount).toBe(9);
    expect(states[25]?.countdown).toEqual(count(0));
    expect(states[25]?.countdownCancelled).toBe(false);
    expect(states[25]?.countdownDirection).toBe('buy');
    expect(states[25]?.tdst).toEqual({
      price: 88.5,
      kind: 'resistance',
      setupDirection: 'buy',
      barIndex: 25,
    });

    expect(states[26]?.countdown).toEqual(count(1));
  });

  it('should never advance a countdown before its setup completes', () => {
    const states = computeSequential(barsFromCloses([...BUY_SETUP_CLOSES, ...descending(90, 14)]));
    const firstCountdownBar = states.findIndex((s) => s.countdownQualified);
    const firstCompletion = states.findIndex((s) => s.setupCount === 9);

    expect(firstCountdownBar).toBeGreaterThan(firstCompletion);
  });
});

describe('SequentialStateMachine', () => {
  const closes = [...BUY_SETUP_CLOSES, ...descending(90, 12), 84, 85, 83.25, 83.4, 82];

  it('should produce the same states incrementally as in batch', () => {
    const bars = barsFromCloses(closes);
    const machine = new SequentialStateMachine();
    const incremental = bars.map((bar) => machine.onBar(bar));

    expect(incremental).toEqual(computeSequential(bars));
    expect(machine.barCount).toBe(bars.length);
  });

  it('should be deterministic', () => {
    const bars = barsFromCloses(closes);
    expect(computeSequential(bars)).toEqual(computeSequential(bars));
  });

  it('should start over after reset', () => {
    const bars = barsFromCloses(BUY_SETUP_CLOSES);
    const machine = new SequentialStateMachine();
    const first = bars.map((bar) => machine.onBar(bar));

    machine.reset();
    expect(machine.barCount).toBe(0);
    expect(bars.map((bar) => machine.onBar(bar))).toEqual(first);
  });

  it('should return frozen states', () => {
    const [state] = computeSequential(barsFromCloses(BUY_SETUP_CLOSES));
    expect(Object.isFrozen(state)).toBe(true);
  });

  it('should reject a non-positive lookback', () => {
    try {
      new SequentialStateMachine({ setupLookback: 0 });
      expect.unreachable('expected InvalidParametersError');
    } catch (error) {
      expect(isInvalidParametersError(error)).toBe(true);
      if (isInvalidParametersError(error)) {
        expect(error.data.indicator).toBe('td-sequential');
        expect(error.data.issues[0]).toMatch(/^setupLookback: /);
      }
    }
  });

  it('should honour a custom setup lookback', () => {
    // with lookback 2 the flip comes at index 3
    const states = computeSequential(barsFromCloses([100, 100, 100, 99, 98, 97]), {
      setupLookback: 2,
    });

    expect(states[3]?.priceFlip).toBe('bearish');
    expect(states[5]?.setupCount).toBe(3);
  });
});

describe('assessSequentialHistory', () => {
  it('should require setupLookback + 2 bars', () => {
    expect(assessSequentialHistory(5)?.data).toEqual({
      indicator: 'td-sequential',
      required: 6,
      received: 5,
    });
    expect(assessSequentialHistory(6)).toBeNull();
  });
});

describe('formatCountdown', () => {
  it('should label deferred 13s as 13+', () => {
    expect(formatCountdown({ kind: 'count', value: 7 })).toBe('7');
    expect(formatCountdown({ kind: 'deferred-thirteen' })).toBe('13+');
  });
});
