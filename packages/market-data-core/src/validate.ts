/**
 * Bar series validation.
 *
 * The indicator engine assumes a clean series: every bar has finite prices,
 * a body inside its high/low range, and a timestamp that is a valid Date and
 * strictly after the previous bar. validateBarSeries() checks exactly that and reports the first
 * offending bar.
 */

import { InvalidBarError } from "@barlens/contracts";
import type { Bar, BarSeries } from "@barlens/contracts";

/**
 * Largest timestamp magnitude a Date can hold (100,000,000 days either side
 * of the epoch).
 */
export const MAX_EPOCH_MILLIS = 8.64e15;

/**
 * Reason codes carried in InvalidBarError.data.reason.
 */
export type InvalidBarReason =
  | "non-finite-timestamp"
  | "timestamp-out-of-range"
  | "non-finite-price"
  | "high-below-body"
  | "low-above-body"
  | "non-increasing-timestamp";

/**
 * Returns the reason a single bar is invalid, or null when it is valid.
 * Does not look at neighbouring bars.
 */
export function checkBar(bar: Bar): InvalidBarReason | null {
  if (!Number.isFinite(bar.timestamp)) {
    return "non-finite-timestamp";
  }
  if (Math.abs(bar.timestamp) > MAX_EPOCH_MILLIS) {
    return "timestamp-out-of-range";
  }
  if (![bar.open, bar.high, bar.low, bar.close].every(Number.isFinite)) {
    return "non-finite-price";
  }
  if (bar.high < Math.max(bar.open, bar.close)) {
    return "high-below-body";
  }
  if (bar.low > Math.min(bar.open, bar.close)) {
    return "low-above-body";
  }
  return null;
}

/**
 * Validates a whole series, throwing on the first invalid bar.
 *
 * @throws InvalidBarError with the bar index and reason
 *
 * @example
 * ```typescript
 * validateBarSeries(bars); // throws InvalidBarError { index: 3, reason: "high-below-body" }
 * ```
 */
export function validateBarSeries(bars: BarSeries): void {
  let previous: Bar | undefined;

  for (let index = 0; index < bars.length; index++) {
    const bar = bars[index];
    if (!bar) continue;

    const reason = checkBar(bar);
    if (reason !== null) {
      throw new InvalidBarError(describe(reason, index, bar), {
        index,
        reason,
        timestamp: bar.timestamp,
      });
    }

    if (previous !== undefined && bar.timestamp <= previous.timestamp) {
      const reason: InvalidBarReason = "non-increasing-timestamp";
      throw new InvalidBarError(describe(reason, index, bar), {
        index,
        reason,
        timestamp: bar.timestamp,
        previousTimestamp: previous.timestamp,
      });
    }

    previous = bar;
  }
}

function describe(reason: InvalidBarReason, index: number, bar: Bar): string {
  switch (reason) {
    case "non-finite-timestamp":
      return `Bar ${index} has a non-finite timestamp`;
    case "timestamp-out-of-range":
      return `Bar ${index} timestamp ${bar.timestamp} is outside the supported date range`;
    case "non-finite-price":
      return `Bar ${index} has a non-finite price (open=${bar.open}, high=${bar.high}, low=${bar.low}, close=${bar.close})`;
    case "high-below-body":
      return `Bar ${index} high ${bar.high} is below max(open, close) ${Math.max(bar.open, bar.close)}`;
    case "low-above-body":
      return `Bar ${index} low ${bar.low} is above min(open, close) ${Math.min(bar.open, bar.close)}`;
    case "non-increasing-timestamp":
      return `Bar ${index} timestamp ${bar.timestamp} does not follow the previous bar`;
  }
}
