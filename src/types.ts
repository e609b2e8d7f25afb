/**
 * Profiler Types - Core type definitions for the action profiler
 *
 * Actions are named code regions. Completed start/stop cycles are aggregated
 * per name and ranked by their share of the session's wall time.
 */

/**
 * Monotonic clock returning a reading in seconds
 */
export type Clock = () => number;

/**
 * Accumulated timing for one action name
 */
export interface AggregateRecord {
  durationSum: number;
  count: number;
  /** Position of the action in completion order */
  order: number;
}

/**
 * One line of the report, before formatting
 */
export interface ReportRow {
  action: string;
  mean: number;
  count: number;
  durationSum: number;
  /**
   * Share of the session's total duration.
   * null when the total duration is zero or negative.
   */
  percentage: number | null;
}

/**
 * Structured report behind summary()
 */
export interface Report {
  totalDuration: number;
  rows: ReportRow[];
}

/**
 * Handle returned by scope(); release() stops the timer exactly once
 */
export interface ScopeGuard {
  readonly name: string;
  readonly released: boolean;
  /**
   * Stop the timer and record the elapsed seconds.
   * Later calls return the same value without touching the session.
   */
  release(): number;
}

/**
 * Receives a formatted report
 */
export type ReportSink = (summary: string) => void;

/**
 * Options controlling report layout
 */
export interface ReportFormatOptions {
  title?: string;
  lineSeparator?: string;
  columnWidth?: number;
}

/**
 * Profile session configuration
 */
export interface ProfilerConfig extends ReportFormatOptions {
  clock?: Clock;

  /** Log every start/stop to stderr */
  debug?: boolean;

  /**
   * Log summary() warnings to stderr (default: true)
   * Set to false to make summary() free of side effects.
   */
  warnings?: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
  title: 'Profiler Report',
  lineSeparator: '\n',
  columnWidth: 15,
  durationDigits: 5,
  percentageDigits: 3,
  debug: false,
  warnings: true,
} as const;
