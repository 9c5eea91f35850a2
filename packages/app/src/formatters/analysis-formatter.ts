/**
 * Analysis report formatter
 * Supports table and JSON output with deterministic content
 */

import type {
  BandBarState,
  IndicatorKind,
  IndicatorOutcome,
  MergedBarRow,
  SequentialBarState,
} from '@barlens/contracts';
import { formatCountdown } from '@barlens/indicators';
import type { AnalysisReport } from '../analyze.js';

export type OutputFormat = 'table' | 'json';

/**
 * Fixed two-decimal price rendering
 */
export function formatPrice(value: number): string {
  return value.toFixed(2);
}

function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * Setup label for a bar: "B1".."B9" or "S1".."S9", with "*" on a perfected 9.
 * Empty on bars that are not counted setup bars.
 */
export function setupLabel(state: SequentialBarState): string {
  if (state.setupCount === 0 || state.setupDirection === 'none') {
    return '';
  }
  const prefix = state.setupDirection === 'buy' ? 'B' : 'S';
  return `${prefix}${state.setupCount}${state.setupPerfected ? '*' : ''}`;
}

/**
 * Countdown label for a bar: "x" where a countdown was cancelled, the count
 * ("1".."13", "13+" when deferred) on countdown bars, otherwise empty.
 */
export function countdownLabel(state: SequentialBarState): string {
  if (state.countdownCancelled) {
    return 'x';
  }
  if (state.countdownQualified && state.countdown) {
    return formatCountdown(state.countdown);
  }
  return '';
}

/**
 * TDST label: price followed by R (resistance) or S (support)
 */
export function tdstLabel(state: SequentialBarState): string {
  if (!state.tdst) {
    return '';
  }
  return `${formatPrice(state.tdst.price)} ${state.tdst.kind === 'resistance' ? 'R' : 'S'}`;
}

function bandsLine(bands: BandBarState): string {
  const envelopes = bands.bands.map(
    (band) => `${band.multiplier}x ${formatPrice(band.lower)}..${formatPrice(band.upper)}`
  );
  return [`Bands: basis ${formatPrice(bands.basis)} sd ${formatPrice(bands.stdDev)}`, ...envelopes].join(
    '; '
  );
}

function sequentialLines(state: SequentialBarState): string[] {
  const lines: string[] = [];

  if (state.priceFlip !== 'none') {
    lines.push(`Price flip: ${state.priceFlip}`);
  }
  if (state.setupDirection !== 'none') {
    const progress = state.setupCount > 0 ? String(state.setupCount) : 'extension';
    lines.push(
      `Setup: ${state.setupDirection} ${progress}${state.setupPerfected ? ' (perfected)' : ''}`
    );
  }
  if (state.countdownCancelled) {
    lines.push('Countdown: cancelled');
  }
  if (state.countdown) {
    const value = formatCountdown(state.countdown);
    lines.push(
      `Countdown: ${state.countdownDirection} ${value}${state.countdownQualified ? '' : ' (waiting)'}`
    );
  }
  if (state.tdst) {
    lines.push(
      `TDST ${state.tdst.kind}: ${formatPrice(state.tdst.price)} (bar ${state.tdst.barIndex})`
    );
  }

  return lines;
}

/**
 * Multi-line read-out of everything known about one bar.
 *
 * @example
 * ```typescript
 * summarizeBar(rows[13]);
 * // 2024-01-15T00:00:00.000Z #13
 * // O 91.00  H 91.50  L 90.50  C 91.00
 * // Setup: buy 9 (perfected)
 * // Countdown: buy 0 (waiting)
 * // TDST resistance: 99.50 (bar 13)
 * ```
 */
export function summarizeBar(row: MergedBarRow): string {
  const { bar } = row;
  const lines = [
    `${formatTime(row.timestamp)} #${row.index}`,
    `O ${formatPrice(bar.open)}  H ${formatPrice(bar.high)}  L ${formatPrice(bar.low)}  C ${formatPrice(bar.close)}`,
  ];

  if (row.heikenAshi) {
    const ha = row.heikenAshi;
    lines.push(
      `HA O ${formatPrice(ha.open)}  H ${formatPrice(ha.high)}  L ${formatPrice(ha.low)}  C ${formatPrice(ha.close)}`
    );
  }
  if (row.sequential) {
    lines.push(...sequentialLines(row.sequential));
  }
  if (row.bands) {
    lines.push(bandsLine(row.bands));
  }

  return lines.join('\n');
}

/**
 * Draws a box table; every cell is left-aligned and padded to its column.
 */
export function renderTable(headers: string[], body: string[][]): string {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...body.map((cells) => (cells[col] ?? '').length))
  );

  const border = (left: string, middle: string, right: string) =>
    `${left}${widths.map((width) => '─'.repeat(width + 2)).join(middle)}${right}`;
  const line = (cells: string[]) =>
    `│${widths.map((width, col) => ` ${(cells[col] ?? '').padEnd(width)} `).join('│')}│`;

  return [
    border('┌', '┬', '┐'),
    line(headers),
    border('├', '┼', '┤'),
    ...body.map(line),
    border('└', '┴', '┘'),
  ].join('\n');
}

function outcomeLine(kind: IndicatorKind, outcome: IndicatorOutcome): string {
  switch (outcome.status) {
    case 'ok':
      return `${kind}: ok`;
    case 'no-data':
      return `${kind}: no data (${outcome.error.message})`;
    case 'error':
      return `${kind}: error ${outcome.error.code} (${outcome.error.message})`;
  }
}

/**
 * Formatter for analysis reports
 */
export class AnalysisFormatter {
  /**
   * Format report in specified format
   */
  format(report: AnalysisReport, format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(report);
      case 'table':
      default:
        return this.formatAsTable(report);
    }
  }

  /**
   * Format as a header block followed by one table row per bar
   */
  private formatAsTable(report: AnalysisReport): string {
    const lines: string[] = [];

    lines.push(`Analysis: ${report.symbol ?? report.file}`);
    lines.push(`Bars: ${report.barCount}${report.dropped.length > 0 ? ` (${report.dropped.length} rows dropped)` : ''}`);
    for (const [kind, outcome] of this.outcomeEntries(report)) {
      lines.push(outcomeLine(kind, outcome));
    }
    lines.push('');

    const rows = report.rows;
    const showHeikenAshi = rows.some((row) => 'heikenAshi' in row);
    const showSequential = rows.some((row) => 'sequential' in row);
    const multipliers = rows.find((row) => row.bands)?.bands?.bands.map((band) => band.multiplier);
    const showBands = rows.some((row) => 'bands' in row);

    const headers = ['Time', 'Close'];
    if (showHeikenAshi) headers.push('HA Close');
    if (showSequential) headers.push('Setup', 'Countdown', 'TDST');
    if (showBands) {
      headers.push('Basis');
      for (const multiplier of multipliers ?? []) {
        headers.push(`${multiplier}x band`);
      }
    }

    const body = rows.map((row) => {
      const cells = [formatTime(row.timestamp), formatPrice(row.bar.close)];
      if (showHeikenAshi) {
        cells.push(row.heikenAshi ? formatPrice(row.heikenAshi.close) : '');
      }
      if (showSequential) {
        const state = row.sequential;
        cells.push(
          state ? setupLabel(state) : '',
          state ? countdownLabel(state) : '',
          state ? tdstLabel(state) : ''
        );
      }
      if (showBands) {
        const bands = row.bands;
        cells.push(bands ? formatPrice(bands.basis) : '');
        for (const band of bands?.bands ?? (multipliers ?? []).map(() => null)) {
          cells.push(band ? `${formatPrice(band.lower)}..${formatPrice(band.upper)}` : '');
        }
      }
      return cells;
    });

    lines.push(renderTable(headers, body));
    return lines.join('\n');
  }

  /**
   * Format as JSON: outcome status per indicator plus the merged rows
   */
  private formatAsJSON(report: AnalysisReport): string {
    const outcomes: Record<string, unknown> = {};
    for (const [kind, outcome] of this.outcomeEntries(report)) {
      outcomes[kind] =
        outcome.status === 'ok' ? { status: 'ok' } : { status: outcome.status, error: outcome.error.toJSON() };
    }

    return JSON.stringify(
      {
        file: report.file,
        symbol: report.symbol,
        barCount: report.barCount,
        dropped: report.dropped,
        outcomes,
        rows: report.rows.map((row) => ({ time: formatTime(row.timestamp), ...row })),
      },
      null,
      2
    );
  }

  private outcomeEntries(report: AnalysisReport): Array<[IndicatorKind, IndicatorOutcome]> {
    const entries: Array<[IndicatorKind, IndicatorOutcome]> = [];
    const { outcomes } = report;
    for (const request of report.requests) {
      const outcome = outcomes[request.kind];
      if (outcome) {
        entries.push([request.kind, outcome]);
      }
    }
    return entries;
  }
}
