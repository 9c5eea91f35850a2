/**
 * Shared bar fixtures for indicator tests.
 */

import type { Bar } from '@barlens/contracts';

export const T0 = Date.UTC(2024, 0, 2);
export const DAY = 86_400_000;

/**
 * Bars with open = close and a half-point wick either side.
 */
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
 * Five flat bars, then nine lower closes: a bearish flip at index 5 and a
 * completed buy setup at index 13.
 */
export const BUY_SETUP_CLOSES: readonly number[] = [
  100, 100, 100, 100, 100, 99, 98, 97, 96, 95, 94, 93, 92, 91,
];

/**
 * Mirror image of BUY_SETUP_CLOSES: a sell setup completing at index 13.
 */
export const SELL_SETUP_CLOSES: readonly number[] = [
  100, 100, 100, 100, 100, 101, 102, 103, 104, 105, 106, 107, 108, 109,
];

/**
 * Descending run of `count` closes starting at `from`.
 */
export function descending(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from - i);
}

/**
 * Ascending run of `count` closes starting at `from`.
 */
export function ascending(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from + i);
}
