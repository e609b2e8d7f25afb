/**
 * action-profiler - where does the time go?
 *
 * Mark the start and end of named actions, aggregate their durations and
 * call counts, and print a table ranking them by share of wall time.
 *
 * @example
 * ```typescript
 * import { createProfiler } from 'action-profiler';
 *
 * const profiler = createProfiler();
 *
 * profiler.profile('load data', () => loadData());
 *
 * const train = profiler.wrap(function trainEpoch(epoch: number) {
 *   // ...
 * });
 * train(1);
 *
 * profiler.describe(); // prints the report to stdout
 * ```
 */

export type {
  AggregateRecord,
  Clock,
  ProfilerConfig,
  Report,
  ReportFormatOptions,
  ReportRow,
  ReportSink,
  ScopeGuard,
} from './types.js';

export { DEFAULTS } from './types.js';

export { ProfileSession, createProfiler } from './core/session.js';

export { ActiveTimerTable } from './core/timers.js';

export { Aggregator } from './core/aggregate.js';

export { acquireScope, runInScope, runInScopeAsync } from './core/scope.js';

export { buildReport, formatReport } from './core/report.js';

export { wrap, wrapAsync } from './core/wrap.js';
export type { ScopeRunner } from './core/wrap.js';

export {
  ProfilerError,
  DuplicateActionStartError,
  UnknownActionStopError,
  InvalidActionNameError,
  InvalidDurationError,
} from './core/errors.js';
export type { ProfilerErrorCode } from './core/errors.js';

export { profilerExpress, profilerReport, UNMATCHED_ROUTE } from './middleware/express.js';
export type { ProfilerExpressOptions } from './middleware/express.js';

export { createConsoleReporter } from './utils/emit.js';

export { hrTimeSeconds } from './utils/time.js';
