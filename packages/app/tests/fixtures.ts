/**
 * Bar fixtures for app tests
 */

import type { Bar, SequentialBarState } from '@barlens/contracts';

export const T0 = Date.UTC(2024, 0, 2);
export const DAY = 86_400_000;

/**
 * Five flat closes then nine lower ones: a completed, perfected buy setup at
 * index 13.
 */
export const BUY_SETUP_CLOSES: readonly number[] = [
  100, 100, 100, 100, 100, 99, 98, 97, 96, 95, 94, 93, 92, 91,
];

export function barsFromCloses(closes: readonly number[]): Bar[] {
  return closes.map((close, i) => ({
    timestamp: T0 + i * DAY,
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
  }));
}

/**
 * Sequential state with nothing active, overridden field by field
 */
export function sequentialState(overrides: Partial<SequentialBarState> = {}): SequentialBarState {
  return {
    index: 0,
    timestamp: T0,
    priceFlip: 'none',
    setupDirection: 'none',
    setupCount: 0,
    setupPerfected: false,
    tdst: null,
    countdownDirection: 'none',
    countdown: null,
    countdownQualified: false,
    countdownCancelled: false,
    ...overrides,
  };
}
