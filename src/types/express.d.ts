/**
 * Express type augmentation for the profiler
 * Adds req.profiler to Express Request objects
 */

import type { ProfileSession } from '../core/session.js';

declare global {
  namespace Express {
    interface Request {
      profiler?: ProfileSession;
    }
  }
}

export {};
