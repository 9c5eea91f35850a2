/**
 * @fileoverview Bar file analysis: load, normalize, clip, run the pipeline.
 */

import type { IndicatorRequest, IndicatorOutcomes, MergedBarRow } from '@barlens/contracts';
import { IndicatorPipeline } from '@barlens/indicators';
import { createSilentLogger } from '@barlens/logger';
import type { Logger } from '@barlens/logger';
import { clipBars, normalizeBars } from '@barlens/market-data-core';
import type { DroppedRow } from '@barlens/market-data-core';
import { loadBarFile } from './loader.js';

export interface AnalyzeOptions {
  /** Path of the JSON bar file */
  file: string;
  requests: IndicatorRequest[];
  /** Inclusive start, epoch milliseconds */
  from?: number;
  /** Exclusive end, epoch milliseconds */
  to?: number;
  /** Keep only the last n rows of output */
  tail?: number;
  logger?: Logger;
}

export interface AnalysisReport {
  file: string;
  symbol: string | null;
  /** Bars analyzed, after clipping */
  barCount: number;
  dropped: DroppedRow[];
  requests: IndicatorRequest[];
  outcomes: IndicatorOutcomes;
  rows: ReadonlyArray<MergedBarRow>;
}

/**
 * Runs the requested indicators over a bar file.
 *
 * @throws BarLensError when the file cannot be parsed, InvalidBarError when a
 *   normalized bar breaks the OHLC invariants, InvalidParametersError on
 *   duplicate requests
 */
export async function analyzeFile(options: AnalyzeOptions): Promise<AnalysisReport> {
  const logger = options.logger ?? createSilentLogger();

  const { symbol, rows } = await loadBarFile(options.file);
  const { bars, dropped } = normalizeBars(rows);
  if (dropped.length > 0) {
    logger.warn('Rows dropped during normalization', {
      file: options.file,
      dropped: dropped.length,
      first: dropped[0],
    });
  }

  const clipped = clipBars(bars, options.from, options.to);
  logger.info('Bars ready', {
    symbol: symbol ?? undefined,
    file: options.file,
    rows: rows.length,
    bars: clipped.length,
  });

  const pipeline = new IndicatorPipeline({ logger });
  pipeline.load(clipped);
  const result = pipeline.compute(options.requests);

  const tail = options.tail;
  return {
    file: options.file,
    symbol,
    barCount: clipped.length,
    dropped,
    requests: options.requests,
    outcomes: result.outcomes,
    rows: tail !== undefined && tail < result.rows.length ? result.rows.slice(-tail) : result.rows,
  };
}
