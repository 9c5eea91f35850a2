/**
 * Parameter schemas for the configurable indicators.
 *
 * Partial inputs are filled from the defaults in @barlens/contracts; anything
 * that fails a check raises InvalidParametersError before a calculation starts.
 */

import { z } from 'zod';
import {
  DEFAULT_BAND_PARAMETERS,
  DEFAULT_SEQUENTIAL_PARAMETERS,
  InvalidParametersError,
} from '@barlens/contracts';
import type { BandParameters, IndicatorKind, SequentialParameters } from '@barlens/contracts';

export const sequentialParametersSchema = z
  .object({
    setupLookback: z.number().int().min(1).default(DEFAULT_SEQUENTIAL_PARAMETERS.setupLookback),
    countdownLookback: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_SEQUENTIAL_PARAMETERS.countdownLookback),
  })
  .strict();

export const bandParametersSchema = z
  .object({
    period: z.number().int().min(2).default(DEFAULT_BAND_PARAMETERS.period),
    maKind: z.enum(['simple', 'exponential']).default(DEFAULT_BAND_PARAMETERS.maKind),
    multipliers: z
      .array(z.number().int().positive())
      .min(1, 'At least one multiplier is required')
      .default([...DEFAULT_BAND_PARAMETERS.multipliers])
      .transform((values) => [...new Set(values)].sort((a, b) => a - b)),
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function reject(indicator: IndicatorKind, error: z.ZodError): InvalidParametersError {
  const issues = formatIssues(error);
  return new InvalidParametersError(`Invalid ${indicator} parameters: ${issues.join('; ')}`, {
    indicator,
    issues,
  });
}

/**
 * Fills in and checks TD Sequential parameters.
 *
 * @throws InvalidParametersError when a lookback is not a positive integer
 */
export function resolveSequentialParameters(
  input: Partial<SequentialParameters> = {}
): SequentialParameters {
  const parsed = sequentialParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw reject('td-sequential', parsed.error);
  }
  return parsed.data;
}

/**
 * Fills in and checks band parameters. Multipliers come back de-duplicated
 * and ascending.
 *
 * @throws InvalidParametersError on a period below 2, an unknown MA kind, or
 *   an empty or non-positive-integer multiplier list
 *
 * @example
 * ```typescript
 * resolveBandParameters({ multipliers: [3, 1, 3] });
 * // { period: 20, maKind: 'simple', multipliers: [1, 3] }
 * ```
 */
export function resolveBandParameters(input: Partial<BandParameters> = {}): BandParameters {
  const parsed = bandParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw reject('bands', parsed.error);
  }
  return parsed.data;
}
