import { describe, it, expect } from 'vitest';
import { isInvalidParametersError } from '@barlens/contracts';
import { assessBandHistory, computeBands, windowStats } from '../src/bands.js';
import { resolveBandParameters } from '../src/params.js';

const closes = (values: number[]) => values.map((close) => ({ close }));

describe('computeBands', () => {
  it('should freeze each state and its envelopes', () => {
    const state = computeBands(closes([1, 2, 3]), { period: 3, multipliers: [1, 2] })[2];

    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state?.bands)).toBe(true);
    expect(state?.bands.every((band) => Object.isFrozen(band))).toBe(true);
  });

  it('should leave the first period - 1 bars empty', () => {
    const result = computeBands(closes([1, 2, 3, 4, 5]), { period: 3 });

    expect(result).toHaveLength(5);
    expect(result[0]).toBeNull();
    expect(result[1]).toBeNull();
    expect(result[2]).not.toBeNull();
  });

  it('should use the simple mean and sample standard deviation', () => {
    const result = computeBands(closes([1, 2, 3, 4, 5]), { period: 3, multipliers: [1, 2] });

    expect(result[2]).toEqual({
      basis: 2,
      stdDev: 1,
      bands: [
        { multiplier: 1, upper: 3, lower: 1 },
        { multiplier: 2, upper: 4, lower: 0 },
      ],
    });
    expect(result[4]?.basis).toBe(4);
  });

  it('should seed the exponential basis with the first window mean', () => {
    const simple = computeBands(closes([1, 2, 3, 7]), { period: 3 });
    const exponential = computeBands(closes([1, 2, 3, 7]), { period: 3, maKind: 'exponential' });

    expect(exponential[2]?.basis).toBe(2);
    // alpha = 2 / (3 + 1) = 0.5: (7 - 2) * 0.5 + 2
    expect(exponential[3]?.basis).toBe(4.5);
    expect(simple[3]?.basis).toBe(4);
    // deviation is always measured over the window, whatever the basis
    expect(exponential[3]?.stdDev).toBeCloseTo(Math.sqrt(7), 12);
    expect(simple[3]?.stdDev).toBeCloseTo(Math.sqrt(7), 12);
  });

  it('should collapse every envelope onto the basis for a flat series', () => {
    const result = computeBands(closes([100, 100, 100, 100]), { period: 4, multipliers: [1, 3] });

    expect(result[3]).toEqual({
      basis: 100,
      stdDev: 0,
      bands: [
        { multiplier: 1, upper: 100, lower: 100 },
        { multiplier: 3, upper: 100, lower: 100 },
      ],
    });
  });

  it('should keep upper >= basis >= lower with widening envelopes', () => {
    const series = computeBands(closes([5, 9, 4, 11, 7, 3, 12, 8]), { period: 4, multipliers: [1, 2, 3] });

    for (const state of series) {
      if (!state) continue;
      let previousWidth = 0;
      for (const band of state.bands) {
        expect(band.upper).toBeGreaterThanOrEqual(state.basis);
        expect(band.lower).toBeLessThanOrEqual(state.basis);
        expect(band.upper - band.lower).toBeGreaterThanOrEqual(previousWidth);
        previousWidth = band.upper - band.lower;
      }
    }
  });

  it('should return only nulls when the series is shorter than the period', () => {
    expect(computeBands(closes([1, 2]), { period: 3 })).toEqual([null, null]);
  });

  it('should reject a period below 2', () => {
    try {
      computeBands(closes([1, 2, 3]), { period: 1 });
      expect.unreachable('expected InvalidParametersError');
    } catch (error) {
      expect(isInvalidParametersError(error)).toBe(true);
      if (isInvalidParametersError(error)) {
        expect(error.data.indicator).toBe('bands');
        expect(error.data.issues).toHaveLength(1);
        expect(error.data.issues[0]).toMatch(/^period: /);
      }
    }
  });
});

describe('windowStats', () => {
  it('should measure only the trailing window', () => {
    expect(windowStats([50, 1, 2, 3], 3, 3)).toEqual({ mean: 2, stdDev: 1 });
  });
});

describe('assessBandHistory', () => {
  it('should report a series shorter than the period', () => {
    const shortage = assessBandHistory(2, { period: 3 });

    expect(shortage?.code).toBe('INSUFFICIENT_HISTORY');
    expect(shortage?.data).toEqual({ indicator: 'bands', required: 3, received: 2 });
  });

  it('should accept a series exactly one period long', () => {
    expect(assessBandHistory(20)).toBeNull();
  });
});

describe('resolveBandParameters', () => {
  it('should fill defaults', () => {
    expect(resolveBandParameters()).toEqual({ period: 20, maKind: 'simple', multipliers: [2] });
  });

  it('should de-duplicate and sort multipliers', () => {
    expect(resolveBandParameters({ multipliers: [3, 1, 3] }).multipliers).toEqual([1, 3]);
  });

  it('should reject an empty multiplier list', () => {
    expect(() => resolveBandParameters({ multipliers: [] })).toThrow(
      'Invalid bands parameters: multipliers: At least one multiplier is required'
    );
  });

  it('should reject fractional multipliers and non-integer periods', () => {
    expect(() => resolveBandParameters({ multipliers: [1.5] })).toThrow(/multipliers\.0: /);
    expect(() => resolveBandParameters({ period: 2.5 })).toThrow(/period: /);
  });
});
