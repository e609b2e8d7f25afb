/**
 * Report Generation
 *
 * Turns aggregated timings into rows ranked by share of the session's
 * wall time, then into a fixed-layout text table:
 *
 *   Profiler Report
 *   Action | Mean duration (s) | Num calls | Total time (s) | Percentage %
 *   ---------------------------------------------------------------------
 *   Total  | -                 | -         | <total>        | 100 %
 *   ---------------------------------------------------------------------
 *   <one row per action>
 */

import type { Report, ReportFormatOptions, ReportRow } from '../types.js';
import { DEFAULTS } from '../types.js';
import { formatSignificant, padCell, textWidth } from '../utils/format.js';
import type { Aggregator } from './aggregate.js';

const HEADER = [
  'Action',
  'Mean duration (s)',
  'Num calls',
  'Total time (s)',
  'Percentage %',
] as const;

type Cells = readonly [string, string, string, string, string];

const CELL_SEPARATOR = '\t|  ';
const ROW_END = '\t|';

/**
 * Build sorted report rows
 *
 * Rows are ordered by percentage, highest first. Equal percentages keep
 * completion order. When the total duration is not positive every
 * percentage is null and rows stay in completion order.
 *
 * @param aggregator - Source of the accumulated records
 * @param sessionStartTime - Clock reading at session start
 * @param now - Current clock reading
 */
export function buildReport(
  aggregator: Aggregator,
  sessionStartTime: number,
  now: number
): Report {
  const totalDuration = now - sessionStartTime;
  const hasTotal = totalDuration > 0;

  const ranked = aggregator.entries().map(([action, record]) => ({
    order: record.order,
    row: {
      action,
      mean: record.durationSum / record.count,
      count: record.count,
      durationSum: record.durationSum,
      percentage: hasTotal ? (100 * record.durationSum) / totalDuration : null,
    } satisfies ReportRow,
  }));

  ranked.sort((a, b) => {
    const byShare = (b.row.percentage ?? 0) - (a.row.percentage ?? 0);
    return byShare !== 0 ? byShare : a.order - b.order;
  });

  return { totalDuration, rows: ranked.map(entry => entry.row) };
}

/**
 * Render a report as text
 *
 * The Action column is as wide as the longest action name; with no rows
 * it is left unpadded.
 */
export function formatReport(report: Report, options: ReportFormatOptions = {}): string {
  const title = options.title ?? DEFAULTS.title;
  const sep = options.lineSeparator ?? DEFAULTS.lineSeparator;
  const columnWidth = options.columnWidth ?? DEFAULTS.columnWidth;

  const actionWidth = report.rows.reduce(
    (widest, row) => Math.max(widest, textWidth(row.action)),
    0
  );

  const renderRow = (cells: Cells): string => {
    const [action, ...rest] = cells;
    return [
      padCell(action, actionWidth),
      ...rest.map(cell => padCell(cell, columnWidth)),
    ].join(CELL_SEPARATOR) + ROW_END;
  };

  const header = renderRow(HEADER);
  const separator = '-'.repeat(textWidth(header));

  const lines = [
    title,
    header,
    separator,
    renderRow([
      'Total',
      '-',
      '-',
      formatSignificant(report.totalDuration, DEFAULTS.durationDigits),
      '100 %',
    ]),
    separator,
  ];

  for (const row of report.rows) {
    lines.push(renderRow([
      row.action,
      formatSignificant(row.mean, DEFAULTS.durationDigits),
      String(row.count),
      formatSignificant(row.durationSum, DEFAULTS.durationDigits),
      formatPercentage(row.percentage),
    ]));
  }

  return lines.join(sep) + sep;
}

function formatPercentage(percentage: number | null): string {
  if (percentage === null) {
    return 'n/a';
  }
  return `${formatSignificant(percentage, DEFAULTS.percentageDigits)} %`;
}
