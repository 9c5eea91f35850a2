/**
 * Bar file loading
 *
 * A bar file is JSON: either an array of bar rows, or an object with a `bars`
 * array and an optional `symbol`. Rows are left untyped here; normalizeBars()
 * decides which of them become bars.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { BarLensError } from '@barlens/contracts';

const barFileSchema = z.union([
  z.array(z.unknown()),
  z.object({
    symbol: z.string().min(1).optional(),
    bars: z.array(z.unknown()),
  }),
]);

export interface BarFile {
  symbol: string | null;
  rows: unknown[];
}

/**
 * Parses the text of a bar file.
 *
 * @throws BarLensError with code INVALID_BAR_FILE when the text is not JSON or
 *   has neither shape
 */
export function parseBarFile(text: string, source = 'input'): BarFile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new BarLensError('INVALID_BAR_FILE', `${source} is not valid JSON`, {
      source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = barFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new BarLensError(
      'INVALID_BAR_FILE',
      `${source} must hold an array of bars or an object with a "bars" array`,
      { source }
    );
  }

  if (Array.isArray(parsed.data)) {
    return { symbol: null, rows: parsed.data };
  }
  return { symbol: parsed.data.symbol ?? null, rows: parsed.data.bars };
}

/**
 * Reads and parses a bar file from disk.
 */
export async function loadBarFile(path: string): Promise<BarFile> {
  const text = await readFile(path, 'utf8');
  return parseBarFile(text, path);
}
