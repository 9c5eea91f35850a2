/**
 * Bar clipping utilities.
 *
 * Extracts the subset of a series that falls inside a timestamp range, e.g.
 * to analyze a date window of a longer history. All clipping operates in UTC
 * epoch milliseconds.
 */

import type { Bar } from "@barlens/contracts";

/**
 * Clips bars to a timestamp range.
 *
 * The range is [from, to): 'from' is inclusive and 'to' is exclusive. Either
 * bound may be omitted.
 *
 * @param bars - Bars sorted by timestamp ascending
 * @param from - Start timestamp (inclusive, optional)
 * @param to - End timestamp (exclusive, optional)
 * @returns Bars inside the range, in order
 *
 * @example
 * ```typescript
 * // Clip to range [14:01, 14:04)
 * clipBars(bars, ts("14:01"), ts("14:04"));
 * // Result: [bars at 14:01, 14:02, 14:03]
 *
 * // Clip up to 14:03
 * clipBars(bars, undefined, ts("14:03"));
 * ```
 *
 * Edge cases:
 * - Empty input, no bars in range, or from >= to: returns empty array
 * - from/to outside bar range: clips to available bars
 *
 * Performance: O(log n + m) using binary search for both ends.
 *
 * Note: This function does NOT validate that bars are sorted. If bars are
 * unsorted, results are undefined.
 */
export function clipBars<T extends Pick<Bar, "timestamp">>(
  bars: readonly T[],
  from?: number,
  to?: number
): T[] {
  if (bars.length === 0) {
    return [];
  }

  const effectiveFrom = from ?? -Infinity;
  const effectiveTo = to ?? Infinity;

  if (effectiveFrom >= effectiveTo) {
    return [];
  }

  // First bar with timestamp >= from
  const startIdx = binarySearchGTE(bars, effectiveFrom);
  if (startIdx === -1) {
    return [];
  }

  // Last bar with timestamp < to
  const endIdx = binarySearchLT(bars, effectiveTo);
  if (endIdx === -1 || endIdx < startIdx) {
    return [];
  }

  return bars.slice(startIdx, endIdx + 1);
}

/**
 * Binary search: first index where bar.timestamp >= target, or -1.
 */
function binarySearchGTE(bars: readonly Pick<Bar, "timestamp">[], target: number): number {
  let left = 0;
  let right = bars.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = bars[mid];
    if (!bar) break;

    if (bar.timestamp >= target) {
      result = mid;
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return result;
}

/**
 * Binary search: last index where bar.timestamp < target, or -1.
 */
function binarySearchLT(bars: readonly Pick<Bar, "timestamp">[], target: number): number {
  let left = 0;
  let right = bars.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = bars[mid];
    if (!bar) break;

    if (bar.timestamp < target) {
      result = mid;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  return result;
}
