/**
 * @barlens/market-data-core
 *
 * Pure utilities that prepare bar data for the indicator engine.
 *
 * The engine consumes a finite, already-cleaned, chronologically ordered
 * series. Getting bars into that shape is the caller's job; this package
 * provides the pieces:
 * - Normalization of loosely-typed rows (drop incomplete rows, sort, de-duplicate)
 * - Validation of OHLC invariants and timestamp order
 * - Clipping to a timestamp range
 *
 * @example
 * ```typescript
 * import { normalizeBars, validateBarSeries, clipBars } from "@barlens/market-data-core";
 *
 * const { bars } = normalizeBars(JSON.parse(text));
 * validateBarSeries(bars);
 * const window = clipBars(bars, Date.UTC(2024, 0, 1), Date.UTC(2025, 0, 1));
 * ```
 *
 * @packageDocumentation
 */

export { normalizeBars, rawBarSchema, toEpochMillis } from "./normalize.js";
export type { RawBar, DropReason, DroppedRow, NormalizeResult } from "./normalize.js";

export { validateBarSeries, checkBar, MAX_EPOCH_MILLIS } from "./validate.js";
export type { InvalidBarReason } from "./validate.js";

export { clipBars } from "./clip.js";
