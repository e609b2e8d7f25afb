/**
 * Scoped Timer Guard
 *
 * Pairs start() with a release that stops the timer exactly once.
 * runInScope/runInScopeAsync release on every exit path of the guarded
 * callable: normal return, early return or a thrown error.
 */

import type { ScopeGuard } from '../types.js';
import type { Aggregator } from './aggregate.js';
import type { ActiveTimerTable } from './timers.js';

/**
 * Start `name` and return its guard
 *
 * @param timers - Table holding the in-flight timer
 * @param aggregator - Receives the elapsed time on release
 * @param name - Action name
 * @param onRelease - Called once with the elapsed seconds after recording
 * @throws DuplicateActionStartError if `name` is already active
 *
 * release() only stops the timer this guard started. If that timer was
 * stopped some other way, release() throws UnknownActionStopError and
 * leaves any newer timer of the same name running.
 */
export function acquireScope(
  timers: ActiveTimerTable,
  aggregator: Aggregator,
  name: string,
  onRelease?: (elapsed: number) => void
): ScopeGuard {
  const ticket = timers.start(name);

  let elapsed: number | undefined;

  return {
    name,

    get released(): boolean {
      return elapsed !== undefined;
    },

    release(): number {
      if (elapsed !== undefined) {
        return elapsed;
      }
      const measured = timers.stop(name, ticket);
      elapsed = measured;
      aggregator.record(name, measured);
      onRelease?.(measured);
      return measured;
    },
  };
}

/**
 * Run `fn` between acquiring and releasing a guard
 * The callable's result or error passes through unchanged.
 */
export function runInScope<T>(acquire: () => ScopeGuard, fn: () => T): T {
  const guard = acquire();
  try {
    return fn();
  } finally {
    guard.release();
  }
}

/**
 * Async form of runInScope; the guard is released once the promise settles
 */
export async function runInScopeAsync<T>(
  acquire: () => ScopeGuard,
  fn: () => Promise<T>
): Promise<T> {
  const guard = acquire();
  try {
    return await fn();
  } finally {
    guard.release();
  }
}
