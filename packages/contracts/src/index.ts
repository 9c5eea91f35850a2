/**
 * @fileoverview Main entry point for @barlens/contracts package.
 *
 * Exports all types, constants and error classes shared by the barlens packages.
 *
 * @module @barlens/contracts
 */

// Bars
export type { Bar, BarSeries, HeikenAshiBar, PriceSource } from './bars.js';

// TD Sequential
export type {
  PriceFlip,
  TrendDirection,
  CountdownValue,
  TdstLevel,
  SequentialBarState,
  SequentialParameters,
} from './sequential.js';

export {
  DEFAULT_SEQUENTIAL_PARAMETERS,
  SETUP_TARGET,
  COUNTDOWN_TARGET,
  COUNTDOWN_QUALIFIER_BAR,
} from './sequential.js';

// Bands
export type {
  MovingAverageKind,
  BandEnvelope,
  BandBarState,
  BandParameters,
} from './bands.js';

export { DEFAULT_BAND_PARAMETERS } from './bands.js';

// Pipeline
export type {
  IndicatorKind,
  HeikenAshiRequest,
  SequentialRequest,
  BandsRequest,
  IndicatorRequest,
  IndicatorSeriesMap,
  IndicatorOutcome,
  IndicatorOutcomes,
  MergedBarRow,
  PipelineResult,
  ScheduledRun,
} from './pipeline.js';

// Error classes and guards
export {
  BarLensError,
  InsufficientHistoryError,
  InvalidBarError,
  InvalidParametersError,
  isBarLensError,
  isInsufficientHistoryError,
  isInvalidBarError,
  isInvalidParametersError,
} from './errors.js';

export type {
  InsufficientHistoryData,
  InvalidBarData,
  InvalidParametersData,
} from './errors.js';
