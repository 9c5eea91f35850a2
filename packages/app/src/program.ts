/**
 * @fileoverview barlens command-line program.
 *
 * `barlens analyze <file>` reads a JSON bar file, runs the configured
 * indicators and prints a table or JSON. Indicator and logging settings come
 * from the environment (see config/schema.ts) and are overridden by flags.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { BarLensError } from '@barlens/contracts';
import { attachGlobalHandlers, createLogger } from '@barlens/logger';
import type { Logger } from '@barlens/logger';
import { toEpochMillis } from '@barlens/market-data-core';
import { analyzeFile } from './analyze.js';
import { loadConfig, toIndicatorRequests } from './config/index.js';
import { AnalysisFormatter } from './formatters/analysis-formatter.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Environment for config; defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Logger to use instead of one built from config */
  logger?: Logger;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const analyzeOptionsSchema = z.object({
  format: z.enum(['table', 'json']).default('table'),
  heikenAshi: z.boolean().optional(),
  source: z.enum(['raw', 'heiken-ashi']).optional(),
  sequential: z.boolean().default(true),
  bands: z.boolean().optional(),
  bandsPeriod: z.string().optional(),
  bandsMa: z.string().optional(),
  bandsMultipliers: z.string().optional(),
  tail: z.coerce.number().int().positive().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  logLevel: z.string().optional(),
});

export type AnalyzeCommandOptions = z.infer<typeof analyzeOptionsSchema>;

/**
 * Config path overrides for the flags that were given
 */
export function toConfigOverrides(options: AnalyzeCommandOptions): Record<string, string | boolean> {
  const overrides: Record<string, string | boolean> = {};

  if (options.heikenAshi) {
    overrides['indicators.heikenAshi.enabled'] = true;
  }
  if (options.source) {
    overrides['indicators.sequential.source'] = options.source;
    overrides['indicators.bands.source'] = options.source;
  }
  if (!options.sequential) {
    overrides['indicators.sequential.enabled'] = false;
  }
  if (
    options.bands ||
    options.bandsPeriod !== undefined ||
    options.bandsMa !== undefined ||
    options.bandsMultipliers !== undefined
  ) {
    overrides['indicators.bands.enabled'] = true;
  }
  if (options.bandsPeriod !== undefined) {
    overrides['indicators.bands.period'] = options.bandsPeriod;
  }
  if (options.bandsMa !== undefined) {
    overrides['indicators.bands.maKind'] = options.bandsMa;
  }
  if (options.bandsMultipliers !== undefined) {
    overrides['indicators.bands.multipliers'] = options.bandsMultipliers;
  }
  if (options.logLevel !== undefined) {
    overrides['logging.level'] = options.logLevel;
  }

  return overrides;
}

function parseDateOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const millis = toEpochMillis(value);
  if (!Number.isFinite(millis)) {
    throw new BarLensError('INVALID_OPTION', `--${name} is not a date: ${value}`, {
      option: name,
      value,
    });
  }
  return millis;
}

/**
 * Builds the commander program.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('barlens')
    .description('TD Sequential, volatility bands and Heiken-Ashi over OHLC bar files')
    .version('0.1.0');

  program
    .command('analyze')
    .description('Analyze a JSON bar file')
    .argument('<file>', 'JSON file: an array of bars, or { symbol, bars }')
    .option('-f, --format <format>', 'Output format (table, json)', 'table')
    .option('--heiken-ashi', 'Include Heiken-Ashi bars')
    .option('-s, --source <source>', 'Price source for TD Sequential and bands (raw, heiken-ashi)')
    .option('--no-sequential', 'Skip TD Sequential')
    .option('-b, --bands', 'Include volatility bands')
    .option('--bands-period <n>', 'Band lookback period')
    .option('--bands-ma <kind>', 'Band basis moving average (simple, exponential)')
    .option('--bands-multipliers <list>', 'Comma-separated standard-deviation multipliers, e.g. 1,2,3')
    .option('-n, --tail <n>', 'Print only the last n bars')
    .option('--from <date>', 'First bar to analyze (inclusive), ISO date or epoch ms')
    .option('--to <date>', 'Last bar to analyze (exclusive), ISO date or epoch ms')
    .option('--log-level <level>', 'Log level (error, warn, info, debug)')
    .action(async (file: string, rawOptions: unknown) => {
      const parsed = analyzeOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
        throw new BarLensError('INVALID_OPTION', `Invalid options: ${issues.join('; ')}`, { issues });
      }
      const options = parsed.data;

      const config = loadConfig({ env: io.env ?? process.env, overrides: toConfigOverrides(options) });
      const logger =
        io.logger ??
        createLogger({
          level: config.logging.level,
          json: config.logging.format === 'json',
          filePath: config.logging.filePath,
        });
      if (!io.logger) {
        attachGlobalHandlers(logger);
      }

      const report = await analyzeFile({
        file,
        requests: toIndicatorRequests(config),
        from: parseDateOption('from', options.from),
        to: parseDateOption('to', options.to),
        tail: options.tail,
        logger,
      });

      io.stdout(`${new AnalysisFormatter().format(report, options.format)}\n`);
    });

  return program;
}
