/**
 * Profile Session
 *
 * The owning context for one profiling run: active timers, aggregated
 * records and the session start time. Sessions are independent of each
 * other; there is no process-wide instance.
 *
 * Not safe for overlapping use of one action name. Two in-flight
 * measurements of the same name (e.g. concurrent async calls through
 * profileAsync) fail with DuplicateActionStartError. Callers that need
 * overlapping measurements time the work themselves and call record().
 */

import type {
  Clock,
  ProfilerConfig,
  Report,
  ReportSink,
  ScopeGuard,
} from '../types.js';
import { DEFAULTS } from '../types.js';
import { createConsoleReporter } from '../utils/emit.js';
import { formatSignificant } from '../utils/format.js';
import { logDebug, logWarning } from '../utils/log.js';
import { hrTimeSeconds } from '../utils/time.js';
import { Aggregator } from './aggregate.js';
import { InvalidDurationError } from './errors.js';
import { buildReport, formatReport } from './report.js';
import { acquireScope, runInScope, runInScopeAsync } from './scope.js';
import { ActiveTimerTable } from './timers.js';
import { wrap, wrapAsync } from './wrap.js';

export class ProfileSession {
  private readonly config: ProfilerConfig;
  private readonly clock: Clock;
  private readonly timers: ActiveTimerTable;
  private readonly aggregator = new Aggregator();
  private sessionStartTime: number;

  constructor(config: ProfilerConfig = {}) {
    this.config = config;
    this.clock = config.clock ?? hrTimeSeconds;
    this.timers = new ActiveTimerTable(this.clock);
    this.sessionStartTime = this.clock();
  }

  /**
   * Start timing an action
   * @throws DuplicateActionStartError if the action is already active
   */
  start(name: string): void {
    this.timers.start(name);
    this.debug(`start ${name}`);
  }

  /**
   * Stop timing an action and aggregate the elapsed time
   * @returns Elapsed seconds
   * @throws UnknownActionStopError if the action is not active
   */
  stop(name: string): number {
    const elapsed = this.timers.stop(name);
    this.aggregator.record(name, elapsed);
    this.logStop(name, elapsed);
    return elapsed;
  }

  /**
   * Start an action and return a guard whose release() stops it
   *
   * @example
   * ```typescript
   * const guard = session.scope('parse');
   * try {
   *   parse(input);
   * } finally {
   *   guard.release();
   * }
   * ```
   */
  scope(name: string): ScopeGuard {
    const guard = acquireScope(
      this.timers,
      this.aggregator,
      name,
      elapsed => this.logStop(name, elapsed)
    );
    this.debug(`start ${name}`);
    return guard;
  }

  /**
   * Run `fn` as the action `name`
   * The action is stopped even when `fn` throws.
   */
  profile<T>(name: string, fn: () => T): T {
    return runInScope(() => this.scope(name), fn);
  }

  /**
   * Run an async `fn` as the action `name`, stopping it when the promise settles
   */
  profileAsync<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return runInScopeAsync(() => this.scope(name), fn);
  }

  /**
   * Wrap `fn` so every call is profiled, by default under the function's own name
   */
  wrap<This, A extends unknown[], R>(
    fn: (this: This, ...args: A) => R,
    name?: string
  ): (this: This, ...args: A) => R {
    return wrap(this, fn, name);
  }

  wrapAsync<This, A extends unknown[], R>(
    fn: (this: This, ...args: A) => Promise<R>,
    name?: string
  ): (this: This, ...args: A) => Promise<R> {
    return wrapAsync(this, fn, name);
  }

  /**
   * Aggregate a duration measured outside the active timer table
   * Overlapping measurements of one action can be recorded this way.
   *
   * @param elapsed - Seconds, finite and >= 0
   * @throws InvalidDurationError for negative or non-finite durations
   */
  record(name: string, elapsed: number): void {
    if (!Number.isFinite(elapsed) || elapsed < 0) {
      throw new InvalidDurationError(name, elapsed);
    }
    this.aggregator.record(name, elapsed);
  }

  /**
   * Restart the session clock without clearing recorded actions
   */
  resetStartTime(): void {
    this.sessionStartTime = this.clock();
  }

  /**
   * Sorted report rows for the current state
   */
  report(): Report {
    return buildReport(this.aggregator, this.sessionStartTime, this.clock());
  }

  /**
   * Formatted report for the current state
   * Never throws; an empty session yields the header and Total row only.
   *
   * Unless the session was created with `warnings: false`, this also writes
   * a warning line to stderr when actions are still in flight or the total
   * duration is not positive. The returned string is the same either way.
   */
  summary(): string {
    const report = this.report();

    if (this.config.warnings ?? DEFAULTS.warnings) {
      const active = this.timers.names();
      if (active.length > 0) {
        logWarning(
          `summary requested while ${active.length} action(s) still active: ${active.join(', ')}`
        );
      }
      if (report.totalDuration <= 0) {
        logWarning(
          `total duration is not positive (${formatSignificant(report.totalDuration, DEFAULTS.durationDigits)} s), percentages reported as n/a`
        );
      }
    }

    return formatReport(report, this.config);
  }

  /**
   * Write the summary to a sink (stdout by default)
   */
  describe(sink: ReportSink = createConsoleReporter()): void {
    sink(this.summary());
  }

  count(name: string): number {
    return this.aggregator.count(name);
  }

  durationSum(name: string): number {
    return this.aggregator.durationSum(name);
  }

  isActive(name: string): boolean {
    return this.timers.isActive(name);
  }

  activeActions(): string[] {
    return this.timers.names();
  }

  /**
   * Action names in the order they first completed
   */
  completionOrder(): string[] {
    return this.aggregator.completionOrder();
  }

  /**
   * Current reading of the session clock, in seconds
   */
  now(): number {
    return this.clock();
  }

  get startTime(): number {
    return this.sessionStartTime;
  }

  private logStop(name: string, elapsed: number): void {
    this.debug(`stop ${name} (${formatSignificant(elapsed, DEFAULTS.durationDigits)} s)`);
  }

  private debug(message: string): void {
    if (this.config.debug ?? DEFAULTS.debug) {
      logDebug(message);
    }
  }
}

/**
 * Create a new, independent profile session
 *
 * @param config - Clock, report layout and logging options
 */
export function createProfiler(config?: ProfilerConfig): ProfileSession {
  return new ProfileSession(config);
}
