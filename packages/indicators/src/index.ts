/**
 * @fileoverview Public API for @barlens/indicators
 *
 * Heiken-Ashi, TD Sequential and volatility band calculators, and the
 * pipeline that runs them over one bar series.
 */

export { computeHeikenAshi, heikenAshiAsBars } from './heiken-ashi.js';

export {
  SequentialStateMachine,
  computeSequential,
  assessSequentialHistory,
  formatCountdown,
} from './td-sequential.js';

export { computeBands, assessBandHistory, windowStats } from './bands.js';

export {
  sequentialParametersSchema,
  bandParametersSchema,
  resolveSequentialParameters,
  resolveBandParameters,
} from './params.js';

export { IndicatorPipeline } from './pipeline.js';
export type { IndicatorPipelineOptions } from './pipeline.js';
