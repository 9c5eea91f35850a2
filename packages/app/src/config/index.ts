/**
 * Configuration loading and management
 */

import { BarLensError } from '@barlens/contracts';
import type { IndicatorRequest } from '@barlens/contracts';
import type { Logger } from '@barlens/logger';
import { configSchema, envMapping, listPaths, type Config } from './schema.js';

export interface LoadConfigOptions {
  /** Environment to read; defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Values keyed by config path, applied after the environment (CLI flags) */
  overrides?: Record<string, string | boolean>;
  logger?: Logger;
}

/**
 * Load configuration from environment, overrides and defaults
 *
 * @throws BarLensError with code INVALID_CONFIG and the failed checks in `data.issues`
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   env: { BANDS_ENABLED: 'true', BANDS_MULTIPLIERS: '1,2' },
 *   overrides: { 'indicators.bands.period': '10' },
 * });
 * config.indicators.bands; // { enabled: true, period: 10, multipliers: [1, 2], ... }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, overrides = {}, logger } = options;
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseValue(configPath, value));
    }
  }

  for (const [configPath, value] of Object.entries(overrides)) {
    setNestedProperty(
      rawConfig,
      configPath,
      typeof value === 'string' ? parseValue(configPath, value) : value
    );
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new BarLensError(
      'INVALID_CONFIG',
      `Configuration validation failed:\n${issues.join('\n')}`,
      { issues }
    );
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = target;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse a raw string value to the appropriate type
 */
export function parseValue(path: string, value: string): unknown {
  if (listPaths.has(path)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '')
      .map((item) => parseValue('', item));
  }

  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Pipeline requests for the enabled indicators, in display order
 */
export function toIndicatorRequests(config: Config): IndicatorRequest[] {
  const { heikenAshi, sequential, bands } = config.indicators;
  const requests: IndicatorRequest[] = [];

  if (heikenAshi.enabled) {
    requests.push({ kind: 'heiken-ashi' });
  }

  if (sequential.enabled) {
    requests.push({
      kind: 'td-sequential',
      source: sequential.source,
      params: {
        setupLookback: sequential.setupLookback,
        countdownLookback: sequential.countdownLookback,
      },
    });
  }

  if (bands.enabled) {
    requests.push({
      kind: 'bands',
      source: bands.source,
      params: { period: bands.period, maKind: bands.maKind, multipliers: bands.multipliers },
    });
  }

  return requests;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  const { heikenAshi, sequential, bands } = config.indicators;
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    indicators: {
      heikenAshi: heikenAshi.enabled ? 'enabled' : 'disabled',
      sequential: sequential.enabled ? `enabled (${sequential.source})` : 'disabled',
      bands: bands.enabled
        ? `enabled (${bands.source}, ${bands.maKind} ${bands.period}, x${bands.multipliers.join('/')})`
        : 'disabled',
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
