/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { bandParametersSchema, sequentialParametersSchema } from '@barlens/indicators';

const priceSourceSchema = z.enum(['raw', 'heiken-ashi']);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  indicators: z
    .object({
      heikenAshi: z
        .object({
          enabled: z.boolean().default(false),
        })
        .default({}),

      sequential: sequentialParametersSchema
        .extend({
          enabled: z.boolean().default(true),
          source: priceSourceSchema.default('raw'),
        })
        .default({}),

      bands: bandParametersSchema
        .extend({
          enabled: z.boolean().default(false),
          source: priceSourceSchema.default('raw'),
        })
        .default({}),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  TD_ENABLED: 'indicators.sequential.enabled',
  TD_SOURCE: 'indicators.sequential.source',
  BANDS_ENABLED: 'indicators.bands.enabled',
  BANDS_SOURCE: 'indicators.bands.source',
  BANDS_PERIOD: 'indicators.bands.period',
  BANDS_MA_KIND: 'indicators.bands.maKind',
  BANDS_MULTIPLIERS: 'indicators.bands.multipliers',
  HEIKEN_ASHI_ENABLED: 'indicators.heikenAshi.enabled',
};

/**
 * Paths whose raw value is a comma-separated list of numbers
 */
export const listPaths: ReadonlySet<string> = new Set(['indicators.bands.multipliers']);
