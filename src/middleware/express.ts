/**
 * Express Middleware
 *
 * - profilerExpress(): times every request and aggregates it per route
 * - profilerReport(): serves the session summary as text/plain
 *
 * Usage:
 *   const session = createProfiler();
 *   app.use(profilerExpress(session, { ignorePaths: ['/_profiler'] }));
 *   // ... routes ...
 *   app.get('/_profiler', profilerReport(session));
 *
 * Requests overlap, so durations are measured here and fed through
 * session.record() instead of start()/stop().
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ProfileSession } from '../core/session.js';

export interface ProfilerExpressOptions {
  /** Requests that are not timed */
  ignorePaths?: (string | RegExp)[] | ((path: string) => boolean);

  /**
   * Action name for a finished request
   * Default: "<METHOD> <route pattern>", or "<METHOD> <unmatched>" when no
   * route matched
   */
  actionName?: (req: Request) => string;
}

/**
 * Request timing middleware
 *
 * Attaches req.profiler and records the request duration once, on
 * response 'finish' or on 'close' for aborted requests.
 *
 * @param session - Session receiving the request timings
 * @param options - Path filtering and action naming
 * @returns Express middleware function
 */
export function profilerExpress(
  session: ProfileSession,
  options: ProfilerExpressOptions = {}
): RequestHandler {
  const { ignorePaths } = options;
  const actionName = options.actionName ?? defaultActionName;

  const shouldIgnorePath = (path: string): boolean => {
    if (!ignorePaths) return false;

    if (typeof ignorePaths === 'function') {
      return ignorePaths(path);
    }

    return ignorePaths.some(pattern => {
      if (typeof pattern === 'string') {
        return path === pattern;
      }
      return pattern.test(path);
    });
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    req.profiler = session;

    if (shouldIgnorePath(req.path || req.url)) {
      return next();
    }

    const startTime = session.now();
    let recorded = false;

    const recordOnce = (): void => {
      if (recorded) return;
      recorded = true;
      session.record(actionName(req), Math.max(0, session.now() - startTime));
    };

    res.on('finish', recordOnce);
    res.on('close', recordOnce);

    next();
  };
}

/**
 * Handler that responds with the current summary
 */
export function profilerReport(session: ProfileSession): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.type('text/plain').send(session.summary());
  };
}

/**
 * Action name shared by every request that matched no route
 */
export const UNMATCHED_ROUTE = '<unmatched>';

/**
 * "<METHOD> <route pattern>"; requests without a matched route share
 * "<METHOD> <unmatched>" so client-chosen URLs never become action names
 */
function defaultActionName(req: Request): string {
  const routePath: unknown = req.route?.path;
  const path = typeof routePath === 'string'
    ? req.baseUrl + routePath
    : UNMATCHED_ROUTE;
  return `${req.method.toUpperCase()} ${path}`;
}
