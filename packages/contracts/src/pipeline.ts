/**
 * @fileoverview Indicator pipeline contracts: requests, outcomes and merged rows.
 *
 * The indicator set is closed; every union here has one variant per kind so
 * dispatch over it can be checked for exhaustiveness.
 *
 * @module @barlens/contracts/pipeline
 */

import type { Bar, HeikenAshiBar, PriceSource } from './bars.js';
import type { BandBarState, BandParameters } from './bands.js';
import type { BarLensError, InsufficientHistoryError } from './errors.js';
import type { SequentialBarState, SequentialParameters } from './sequential.js';

/**
 * Indicator kinds known to the pipeline.
 */
export type IndicatorKind = 'heiken-ashi' | 'td-sequential' | 'bands';

export interface HeikenAshiRequest {
  kind: 'heiken-ashi';
}

export interface SequentialRequest {
  kind: 'td-sequential';
  params?: Partial<SequentialParameters>;
  /** @default 'raw' */
  source?: PriceSource;
}

export interface BandsRequest {
  kind: 'bands';
  params?: Partial<BandParameters>;
  /** @default 'raw' */
  source?: PriceSource;
}

/**
 * A single indicator computation request.
 *
 * @example
 * ```typescript
 * const requests: IndicatorRequest[] = [
 *   { kind: 'td-sequential', source: 'heiken-ashi' },
 *   { kind: 'bands', params: { period: 20, multipliers: [1, 2] } },
 * ];
 * ```
 */
export type IndicatorRequest = HeikenAshiRequest | SequentialRequest | BandsRequest;

/**
 * Per-bar output type for each indicator kind. `null` marks a bar without a
 * value (insufficient history).
 */
export interface IndicatorSeriesMap {
  'heiken-ashi': HeikenAshiBar;
  'td-sequential': SequentialBarState;
  bands: BandBarState | null;
}

/**
 * Result of one indicator computation.
 *
 * - 'ok': one entry per input bar
 * - 'no-data': the series is too short for any position to have a value
 * - 'error': parameters were rejected or the computation failed
 */
export type IndicatorOutcome<K extends IndicatorKind = IndicatorKind> =
  | { status: 'ok'; kind: K; series: ReadonlyArray<IndicatorSeriesMap[K]> }
  | { status: 'no-data'; kind: K; error: InsufficientHistoryError }
  | { status: 'error'; kind: K; error: BarLensError };

/**
 * Outcomes keyed by kind, only for kinds that were requested.
 */
export type IndicatorOutcomes = {
  [K in IndicatorKind]?: IndicatorOutcome<K>;
};

/**
 * One merged output row per input bar.
 *
 * Keys are present only for requested indicators; the value is null where that
 * indicator has nothing for this bar.
 */
export interface MergedBarRow {
  index: number;
  timestamp: number;
  bar: Bar;
  heikenAshi?: HeikenAshiBar | null;
  sequential?: SequentialBarState | null;
  bands?: BandBarState | null;
}

/**
 * Output of a pipeline computation.
 */
export interface PipelineResult {
  /** Data generation the result was computed for */
  generation: number;
  rows: ReadonlyArray<MergedBarRow>;
  outcomes: IndicatorOutcomes;
}

/**
 * Result of a scheduled computation. A run overtaken by a newer request or
 * data load is reported as superseded and carries no rows.
 */
export type ScheduledRun =
  | { status: 'completed'; result: PipelineResult }
  | { status: 'superseded'; ticket: number };
