/**
 * @fileoverview Public API for @barlens/app
 */

export { analyzeFile } from './analyze.js';
export type { AnalyzeOptions, AnalysisReport } from './analyze.js';

export { loadBarFile, parseBarFile } from './loader.js';
export type { BarFile } from './loader.js';

export { loadConfig, toIndicatorRequests, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config, LoadConfigOptions } from './config/index.js';

export {
  AnalysisFormatter,
  summarizeBar,
  setupLabel,
  countdownLabel,
  tdstLabel,
  renderTable,
  formatPrice,
} from './formatters/analysis-formatter.js';
export type { OutputFormat } from './formatters/analysis-formatter.js';

export { createProgram, toConfigOverrides } from './program.js';
export type { CliIO, AnalyzeCommandOptions } from './program.js';
