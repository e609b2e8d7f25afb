/**
 * Function Wrapping
 *
 * Higher-order helpers that time every call of a function under an action
 * name. Arguments, `this`, results and errors pass through unchanged.
 *
 * @example
 * ```typescript
 * const session = createProfiler();
 * const loadConfig = wrap(session, function loadConfig(path: string) { ... });
 * loadConfig('./app.json'); // profiled as "loadConfig"
 * ```
 */

import { InvalidActionNameError } from './errors.js';

/**
 * Anything that can run a callable inside a profiling scope
 */
export interface ScopeRunner {
  profile<T>(name: string, fn: () => T): T;
  profileAsync<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

function resolveActionName(fn: { name: string }, name: string | undefined): string {
  const resolved = name ?? fn.name;
  if (resolved.length === 0) {
    throw new InvalidActionNameError(resolved);
  }
  return resolved;
}

/**
 * Wrap a synchronous function
 *
 * @param runner - Session that records the calls
 * @param fn - Function to time
 * @param name - Action name (default: `fn.name`)
 * @throws InvalidActionNameError if no name is given and `fn` is anonymous
 */
export function wrap<This, A extends unknown[], R>(
  runner: ScopeRunner,
  fn: (this: This, ...args: A) => R,
  name?: string
): (this: This, ...args: A) => R {
  const actionName = resolveActionName(fn, name);

  return function (this: This, ...args: A): R {
    return runner.profile(actionName, () => fn.apply(this, args));
  };
}

/**
 * Wrap an async function; each call is timed until its promise settles
 */
export function wrapAsync<This, A extends unknown[], R>(
  runner: ScopeRunner,
  fn: (this: This, ...args: A) => Promise<R>,
  name?: string
): (this: This, ...args: A) => Promise<R> {
  const actionName = resolveActionName(fn, name);

  return function (this: This, ...args: A): Promise<R> {
    return runner.profileAsync(actionName, () => fn.apply(this, args));
  };
}
