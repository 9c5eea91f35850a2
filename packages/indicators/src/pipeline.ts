/**
 * Indicator pipeline
 *
 * Holds one validated bar series and computes any subset of the indicators
 * over it, merging their per-bar output into one row per bar.
 *
 * - Loading a new series bumps the data generation and drops every cached
 *   result.
 * - Each indicator result is cached by its resolved parameters and source, so
 *   changing one indicator's parameters recomputes only that indicator.
 * - A failing indicator becomes an 'error' (or 'no-data') outcome; the others
 *   are still computed.
 * - schedule() defers a computation by one macrotask and reports it as
 *   superseded when a newer schedule() or load() arrived in the meantime.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  BarLensError,
  InsufficientHistoryError,
  InvalidParametersError,
  isBarLensError,
} from '@barlens/contracts';
import type {
  Bar,
  BandsRequest,
  HeikenAshiBar,
  IndicatorKind,
  IndicatorOutcome,
  IndicatorOutcomes,
  IndicatorRequest,
  IndicatorSeriesMap,
  MergedBarRow,
  PipelineResult,
  PriceSource,
  ScheduledRun,
  SequentialRequest,
} from '@barlens/contracts';
import { createChildLogger, createSilentLogger, measureSync } from '@barlens/logger';
import type { Logger } from '@barlens/logger';
import { validateBarSeries } from '@barlens/market-data-core';
import { assessBandHistory, computeBands } from './bands.js';
import { computeHeikenAshi, heikenAshiAsBars } from './heiken-ashi.js';
import { resolveBandParameters, resolveSequentialParameters } from './params.js';
import { assessSequentialHistory, computeSequential } from './td-sequential.js';

export interface IndicatorPipelineOptions {
  /** Parent logger; a silent logger is used when omitted */
  logger?: Logger;
}

/**
 * Single-slot cache for one indicator kind.
 */
class OutcomeCache<K extends IndicatorKind> {
  private entry: { key: string; outcome: IndicatorOutcome<K> } | null = null;

  get(key: string): IndicatorOutcome<K> | undefined {
    return this.entry !== null && this.entry.key === key ? this.entry.outcome : undefined;
  }

  set(key: string, outcome: IndicatorOutcome<K>): void {
    this.entry = { key, outcome };
  }

  clear(): void {
    this.entry = null;
  }
}

function assertNever(value: never): never {
  throw new BarLensError('UNKNOWN_INDICATOR', `Unknown indicator request: ${JSON.stringify(value)}`);
}

function valueAt<K extends IndicatorKind>(
  outcome: IndicatorOutcome<K>,
  index: number
): IndicatorSeriesMap[K] | null {
  return outcome.status === 'ok' ? outcome.series[index] ?? null : null;
}

/**
 * Indicator pipeline over a single bar series.
 *
 * @example
 * ```typescript
 * const pipeline = new IndicatorPipeline({ logger });
 * pipeline.load(bars);
 * const { rows, outcomes } = pipeline.compute([
 *   { kind: 'td-sequential', source: 'heiken-ashi' },
 *   { kind: 'bands', params: { period: 20, multipliers: [1, 2] } },
 * ]);
 * ```
 */
export class IndicatorPipeline {
  private readonly logger: Logger;
  private bars: readonly Bar[] = Object.freeze([]);
  private heikenAshiBars: readonly HeikenAshiBar[] | null = null;
  private generationCounter = 0;
  private latestTicket = 0;

  private readonly heikenAshiCache = new OutcomeCache<'heiken-ashi'>();
  private readonly sequentialCache = new OutcomeCache<'td-sequential'>();
  private readonly bandsCache = new OutcomeCache<'bands'>();

  constructor(options: IndicatorPipelineOptions = {}) {
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: 'pipeline',
    });
  }

  /**
   * Generation of the currently loaded series (0 before the first load)
   */
  get generation(): number {
    return this.generationCounter;
  }

  /**
   * Number of bars in the currently loaded series
   */
  get size(): number {
    return this.bars.length;
  }

  /**
   * Replaces the bar series.
   *
   * @throws InvalidBarError when a bar breaks the OHLC or ordering invariants;
   *   the previous series stays loaded in that case
   */
  load(bars: readonly Bar[]): number {
    validateBarSeries(bars);

    this.bars = Object.freeze(bars.map((bar) => Object.freeze({ ...bar })));
    this.heikenAshiBars = null;
    this.heikenAshiCache.clear();
    this.sequentialCache.clear();
    this.bandsCache.clear();
    this.generationCounter += 1;
    this.latestTicket += 1;

    this.logger.info('Bar series loaded', {
      bars: this.bars.length,
      generation: this.generationCounter,
    });
    return this.generationCounter;
  }

  /**
   * Computes the requested indicators over the loaded series.
   *
   * @throws InvalidParametersError when the same kind is requested twice
   */
  compute(requests: readonly IndicatorRequest[]): PipelineResult {
    const kinds = requests.map((request) => request.kind);
    const duplicates = kinds.filter((kind, i) => kinds.indexOf(kind) !== i);
    if (duplicates.length > 0) {
      const issues = [...new Set(duplicates)].map((kind) => `${kind}: requested more than once`);
      throw new InvalidParametersError(`Duplicate indicator requests: ${issues.join('; ')}`, {
        indicator: 'pipeline',
        issues,
      });
    }

    const outcomes: IndicatorOutcomes = {};
    for (const request of requests) {
      switch (request.kind) {
        case 'heiken-ashi':
          outcomes['heiken-ashi'] = this.runHeikenAshi();
          break;
        case 'td-sequential':
          outcomes['td-sequential'] = this.runSequential(request);
          break;
        case 'bands':
          outcomes.bands = this.runBands(request);
          break;
        default:
          assertNever(request);
      }
    }

    const haOutcome = outcomes['heiken-ashi'];
    const sequentialOutcome = outcomes['td-sequential'];
    const bandsOutcome = outcomes.bands;

    const rows = this.bars.map((bar, index) => {
      const row: MergedBarRow = { index, timestamp: bar.timestamp, bar };
      if (haOutcome) row.heikenAshi = valueAt(haOutcome, index);
      if (sequentialOutcome) row.sequential = valueAt(sequentialOutcome, index);
      if (bandsOutcome) row.bands = valueAt(bandsOutcome, index);
      return Object.freeze(row);
    });

    return {
      generation: this.generationCounter,
      rows: Object.freeze(rows),
      outcomes: Object.freeze(outcomes),
    };
  }

  /**
   * Defers compute() by one macrotask. Only the most recent scheduled run
   * completes; earlier ones, and any run overtaken by load(), resolve as
   * superseded.
   */
  async schedule(requests: readonly IndicatorRequest[]): Promise<ScheduledRun> {
    this.latestTicket += 1;
    const ticket = this.latestTicket;

    await yieldToEventLoop();

    if (ticket !== this.latestTicket) {
      this.logger.debug('Scheduled run superseded', { ticket, latest: this.latestTicket });
      return { status: 'superseded', ticket };
    }
    return { status: 'completed', result: this.compute(requests) };
  }

  private sourceBars(source: PriceSource): readonly Bar[] {
    if (source === 'raw') {
      return this.bars;
    }
    return heikenAshiAsBars(this.heikenAshiSeries());
  }

  /**
   * Heiken-Ashi transform of the loaded bars, computed once per generation.
   * Candles and array are frozen, so the series handed out in an outcome is
   * the same one later 'heiken-ashi' sources read.
   */
  private heikenAshiSeries(): readonly HeikenAshiBar[] {
    if (this.heikenAshiBars === null) {
      this.heikenAshiBars = Object.freeze(computeHeikenAshi(this.bars));
    }
    return this.heikenAshiBars;
  }

  private runHeikenAshi(): IndicatorOutcome<'heiken-ashi'> {
    const kind = 'heiken-ashi';
    return this.evaluate(kind, this.heikenAshiCache, () => ({ key: 'heiken-ashi' }), () => {
      if (this.bars.length === 0) {
        return {
          status: 'no-data',
          kind,
          error: new InsufficientHistoryError('Heiken-Ashi needs at least 1 bar, received 0', {
            indicator: kind,
            required: 1,
            received: 0,
          }),
        };
      }
      return { status: 'ok', kind, series: this.heikenAshiSeries() };
    });
  }

  private runSequential(request: SequentialRequest): IndicatorOutcome<'td-sequential'> {
    const kind = 'td-sequential';
    const source = request.source ?? 'raw';
    return this.evaluate(
      kind,
      this.sequentialCache,
      () => ({ source, params: resolveSequentialParameters(request.params) }),
      () => {
        const shortage = assessSequentialHistory(this.bars.length, request.params);
        if (shortage) {
          return { status: 'no-data', kind, error: shortage };
        }
        const series = computeSequential(this.sourceBars(source), request.params);
        return { status: 'ok', kind, series: Object.freeze(series) };
      }
    );
  }

  private runBands(request: BandsRequest): IndicatorOutcome<'bands'> {
    const kind = 'bands';
    const source = request.source ?? 'raw';
    return this.evaluate(
      kind,
      this.bandsCache,
      () => ({ source, params: resolveBandParameters(request.params) }),
      () => {
        const shortage = assessBandHistory(this.bars.length, request.params);
        if (shortage) {
          return { status: 'no-data', kind, error: shortage };
        }
        const series = computeBands(this.sourceBars(source), request.params);
        return { status: 'ok', kind, series: Object.freeze(series) };
      }
    );
  }

  /**
   * Resolves the cache key, then returns the cached outcome or computes a
   * fresh one. Any failure, including rejected parameters, becomes an
   * 'error' outcome and is not cached.
   */
  private evaluate<K extends IndicatorKind>(
    kind: K,
    cache: OutcomeCache<K>,
    fingerprint: () => Record<string, unknown>,
    run: () => IndicatorOutcome<K>
  ): IndicatorOutcome<K> {
    try {
      const key = JSON.stringify({ generation: this.generationCounter, ...fingerprint() });
      const cached = cache.get(key);
      if (cached) {
        this.logger.debug('Indicator served from cache', { indicator: kind });
        return cached;
      }

      const { result, duration_ms } = measureSync(run);
      cache.set(key, result);
      this.logger.debug('Indicator computed', {
        indicator: kind,
        status: result.status,
        bars: this.bars.length,
        duration_ms,
      });
      return result;
    } catch (err) {
      const error = isBarLensError(err)
        ? err
        : new BarLensError(
            'INDICATOR_FAILED',
            err instanceof Error ? err.message : String(err),
            { indicator: kind }
          );
      this.logger.warn('Indicator failed', { indicator: kind, code: error.code, error: error.message });
      return { status: 'error', kind, error };
    }
  }
}
