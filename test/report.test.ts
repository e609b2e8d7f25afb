/**
 * Report Generation Tests
 */

import { describe, it, expect } from 'vitest';
import { Aggregator } from '../src/core/aggregate.js';
import { buildReport, formatReport } from '../src/core/report.js';
import { formatSignificant, padCell, textWidth } from '../src/utils/format.js';

const HEADER_CELLS = 'Mean duration (s)\t|  Num calls      \t|  Total time (s) \t|  Percentage %   \t|';

const cell = (text: string): string => text.padEnd(15);

function row(action: string, mean: string, calls: string, total: string, share: string): string {
  return `${action}\t|  ${cell(mean)}\t|  ${cell(calls)}\t|  ${cell(total)}\t|  ${cell(share)}\t|`;
}

describe('buildReport', () => {
  it('computes mean and share of total duration', () => {
    const aggregator = new Aggregator();
    aggregator.record('load', 1);
    aggregator.record('load', 0.5);
    aggregator.record('parse', 0.5);

    const report = buildReport(aggregator, 0, 4);

    expect(report.totalDuration).toBe(4);
    expect(report.rows).toEqual([
      { action: 'load', mean: 0.75, count: 2, durationSum: 1.5, percentage: 37.5 },
      { action: 'parse', mean: 0.5, count: 1, durationSum: 0.5, percentage: 12.5 },
    ]);
  });

  it('sorts by percentage, highest first', () => {
    const aggregator = new Aggregator();
    aggregator.record('small', 1);
    aggregator.record('large', 3);
    aggregator.record('medium', 2);

    const report = buildReport(aggregator, 0, 10);

    expect(report.rows.map(r => r.action)).toEqual(['large', 'medium', 'small']);
    expect(report.rows.map(r => r.percentage)).toEqual([30, 20, 10]);
  });

  it('keeps completion order for equal percentages', () => {
    const aggregator = new Aggregator();
    aggregator.record('b', 1);
    aggregator.record('a', 1);
    aggregator.record('c', 2);
    aggregator.record('d', 1);

    const report = buildReport(aggregator, 0, 8);

    expect(report.rows.map(r => r.action)).toEqual(['c', 'b', 'a', 'd']);
  });

  it('reports null percentages when the total duration is zero', () => {
    const aggregator = new Aggregator();
    aggregator.record('b', 2);
    aggregator.record('a', 5);

    const report = buildReport(aggregator, 3, 3);

    expect(report.totalDuration).toBe(0);
    expect(report.rows.map(r => [r.action, r.percentage])).toEqual([
      ['b', null],
      ['a', null],
    ]);
  });

  it('reports null percentages when the start time is in the future', () => {
    const aggregator = new Aggregator();
    aggregator.record('a', 1);

    const report = buildReport(aggregator, 10, 4);

    expect(report.totalDuration).toBe(-6);
    expect(report.rows[0].percentage).toBeNull();
  });

  it('returns no rows for an empty aggregator', () => {
    expect(buildReport(new Aggregator(), 0, 1)).toEqual({ totalDuration: 1, rows: [] });
  });
});

describe('formatReport', () => {
  it('renders title, header, total row and one row per action', () => {
    const aggregator = new Aggregator();
    aggregator.record('load', 1);
    aggregator.record('parse', 0.5);
    aggregator.record('load', 0.5);

    const output = formatReport(buildReport(aggregator, 0, 4));
    const lines = output.split('\n');

    expect(lines[0]).toBe('Profiler Report');
    expect(lines[1]).toBe(`Action\t|  ${HEADER_CELLS}`);
    expect(lines[2]).toBe('-'.repeat(lines[1].length));
    expect(lines[3]).toBe(row('Total', '-', '-', '4', '100 %'));
    expect(lines[4]).toBe(lines[2]);
    expect(lines[5]).toBe(row('load ', '0.75', '2', '1.5', '37.5 %'));
    expect(lines[6]).toBe(row('parse', '0.5', '1', '0.5', '12.5 %'));
    expect(lines[7]).toBe('');
    expect(lines).toHaveLength(8);
  });

  it('pads the action column to the longest action name', () => {
    const aggregator = new Aggregator();
    aggregator.record('a', 1);
    aggregator.record('deserialize payload', 1);

    const lines = formatReport(buildReport(aggregator, 0, 2)).split('\n');

    expect(lines[1]).toBe(`${'Action'.padEnd(19)}\t|  ${HEADER_CELLS}`);
    expect(lines[3].startsWith(`${'Total'.padEnd(19)}\t|`)).toBe(true);
    expect(lines[5]).toBe(row('a'.padEnd(19), '1', '1', '1', '50 %'));
    expect(lines[6]).toBe(row('deserialize payload', '1', '1', '1', '50 %'));
  });

  it('measures action names in code points', () => {
    const aggregator = new Aggregator();
    aggregator.record('🚀 boot', 1);
    aggregator.record('parse', 1);

    const lines = formatReport(buildReport(aggregator, 0, 2)).split('\n');

    expect(lines[1]).toBe(`Action\t|  ${HEADER_CELLS}`);
    expect(lines[3].startsWith('Total \t|')).toBe(true);
    expect(lines[5]).toBe(row('🚀 boot', '1', '1', '1', '50 %'));
    expect(lines[6]).toBe(row('parse ', '1', '1', '1', '50 %'));
  });

  it('formats reports with a very large number of actions', () => {
    const rows = Array.from({ length: 300_000 }, (_, i) => ({
      action: `action-${i}`,
      mean: 0,
      count: 1,
      durationSum: 0,
      percentage: 0,
    }));

    const lines = formatReport({ totalDuration: 1, rows }).split('\n');

    expect(lines).toHaveLength(300_006);
    expect(lines[300_004]).toBe(row('action-299999', '0', '1', '0', '0 %'));
  });

  it('renders only the header and total row for an empty report', () => {
    const output = formatReport({ totalDuration: 2, rows: [] });

    expect(output.split('\n')).toEqual([
      'Profiler Report',
      `Action\t|  ${HEADER_CELLS}`,
      '-'.repeat(`Action\t|  ${HEADER_CELLS}`.length),
      row('Total', '-', '-', '2', '100 %'),
      '-'.repeat(`Action\t|  ${HEADER_CELLS}`.length),
      '',
    ]);
  });

  it('renders n/a for missing percentages', () => {
    const output = formatReport({
      totalDuration: 0,
      rows: [{ action: 'load', mean: 1, count: 1, durationSum: 1, percentage: null }],
    });

    expect(output.split('\n')[5]).toBe(row('load', '1', '1', '1', 'n/a'));
  });

  it('honours title, line separator and column width options', () => {
    const output = formatReport(
      { totalDuration: 1, rows: [] },
      { title: 'Startup', lineSeparator: '\r\n', columnWidth: 4 }
    );

    expect(output.split('\r\n')).toEqual([
      'Startup',
      'Action\t|  Mean duration (s)\t|  Num calls\t|  Total time (s)\t|  Percentage %\t|',
      '-'.repeat('Action\t|  Mean duration (s)\t|  Num calls\t|  Total time (s)\t|  Percentage %\t|'.length),
      'Total\t|  -   \t|  -   \t|  1   \t|  100 %\t|',
      '-'.repeat('Action\t|  Mean duration (s)\t|  Num calls\t|  Total time (s)\t|  Percentage %\t|'.length),
      '',
    ]);
  });
});

describe('padCell', () => {
  it('pads by code points', () => {
    expect(textWidth('🚀')).toBe(1);
    expect(padCell('🚀', 3)).toBe('🚀  ');
    expect(padCell('abcd', 2)).toBe('abcd');
  });
});

describe('formatSignificant', () => {
  it('rounds to significant digits without trailing zeros', () => {
    expect(formatSignificant(0.25, 5)).toBe('0.25');
    expect(formatSignificant(1 / 3, 5)).toBe('0.33333');
    expect(formatSignificant(123.456789, 5)).toBe('123.46');
    expect(formatSignificant(4, 5)).toBe('4');
    expect(formatSignificant(0, 5)).toBe('0');
    expect(formatSignificant(200 / 3, 3)).toBe('66.7');
    expect(formatSignificant(100.00000000000001, 3)).toBe('100');
  });
});
