/**
 * Bar normalization.
 *
 * Turns loosely-typed rows (parsed JSON, provider payloads) into a clean,
 * chronologically ordered series the indicator engine accepts:
 * - rows with a missing or non-numeric open/high/low/close are dropped
 * - timestamps may be epoch milliseconds or ISO 8601 strings; ones a Date
 *   cannot hold are dropped
 * - rows are sorted by timestamp ascending
 * - repeated timestamps keep the last row seen
 *
 * OHLC consistency (high/low versus the body) is left to validateBarSeries();
 * a row with all four prices present is never silently repaired.
 */

import { z } from "zod";
import type { Bar } from "@barlens/contracts";
import { MAX_EPOCH_MILLIS } from "./validate.js";

const priceSchema = z.number().finite();

/**
 * Shape of an accepted input row. Extra fields are ignored.
 */
export const rawBarSchema = z.object({
  timestamp: z.union([z.number().finite(), z.string().min(1)]),
  open: priceSchema,
  high: priceSchema,
  low: priceSchema,
  close: priceSchema,
  volume: z.number().nonnegative().nullish(),
});

export type RawBar = z.infer<typeof rawBarSchema>;

/**
 * Why a row was left out of the normalized series.
 */
export type DropReason = "missing-field" | "invalid-timestamp" | "duplicate-timestamp";

export interface DroppedRow {
  /** Position of the row in the input */
  position: number;
  reason: DropReason;
  /** Validation messages, formatted as `path: message` */
  issues: string[];
}

export interface NormalizeResult {
  bars: Bar[];
  dropped: DroppedRow[];
}

/**
 * Converts a timestamp field to epoch milliseconds, or NaN when unparseable.
 */
export function toEpochMillis(value: number | string): number {
  if (typeof value === "number") {
    return value;
  }
  const trimmed = value.trim();
  if (/^-?\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  return Date.parse(trimmed);
}

/**
 * Normalizes raw rows into an ordered, de-duplicated bar series.
 *
 * @param rows - Untrusted input rows
 * @returns The clean bars and a record of every row that was dropped
 *
 * @example
 * ```typescript
 * const { bars, dropped } = normalizeBars([
 *   { timestamp: "2024-01-03", open: 11, high: 12, low: 10, close: 11.5 },
 *   { timestamp: "2024-01-02", open: 10, high: 11, low: 9, close: 10.5 },
 *   { timestamp: "2024-01-04", open: null, high: 12, low: 10, close: 11 },
 * ]);
 * // bars: 2024-01-02, 2024-01-03; dropped: [{ position: 2, reason: "missing-field", ... }]
 * ```
 */
export function normalizeBars(rows: readonly unknown[]): NormalizeResult {
  const dropped: DroppedRow[] = [];
  const byTimestamp = new Map<number, { bar: Bar; position: number }>();

  rows.forEach((row, position) => {
    const parsed = rawBarSchema.safeParse(row);
    if (!parsed.success) {
      dropped.push({
        position,
        reason: "missing-field",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }

    const timestamp = toEpochMillis(parsed.data.timestamp);
    if (!Number.isFinite(timestamp)) {
      dropped.push({
        position,
        reason: "invalid-timestamp",
        issues: [`timestamp: cannot parse ${JSON.stringify(parsed.data.timestamp)}`],
      });
      return;
    }
    if (Math.abs(timestamp) > MAX_EPOCH_MILLIS) {
      dropped.push({
        position,
        reason: "invalid-timestamp",
        issues: [`timestamp: ${timestamp} is outside the supported date range`],
      });
      return;
    }

    const bar: Bar = {
      timestamp,
      open: parsed.data.open,
      high: parsed.data.high,
      low: parsed.data.low,
      close: parsed.data.close,
    };
    if (parsed.data.volume !== undefined && parsed.data.volume !== null) {
      bar.volume = parsed.data.volume;
    }

    const existing = byTimestamp.get(timestamp);
    if (existing) {
      dropped.push({
        position: existing.position,
        reason: "duplicate-timestamp",
        issues: [`timestamp: superseded by row ${position}`],
      });
    }
    byTimestamp.set(timestamp, { bar, position });
  });

  const bars = Array.from(byTimestamp.values(), (entry) => entry.bar).sort(
    (a, b) => a.timestamp - b.timestamp
  );
  dropped.sort((a, b) => a.position - b.position);

  return { bars, dropped };
}
