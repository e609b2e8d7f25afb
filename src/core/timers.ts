/**
 * Active Timer Table
 *
 * Tracks actions that have been started but not yet stopped.
 * At most one active timer exists per action name.
 */

import type { Clock } from '../types.js';
import { elapsedSeconds } from '../utils/time.js';
import { DuplicateActionStartError, UnknownActionStopError } from './errors.js';

interface ActiveTimer {
  start: number;
  ticket: number;
}

export class ActiveTimerTable {
  private readonly starts = new Map<string, ActiveTimer>();
  private nextTicket = 1;

  constructor(private readonly clock: Clock) {}

  /**
   * Record the current clock reading under `name`
   * @returns Ticket identifying this acquisition, accepted by stop()
   * @throws DuplicateActionStartError if `name` is already active
   */
  start(name: string): number {
    if (this.starts.has(name)) {
      throw new DuplicateActionStartError(name);
    }
    const ticket = this.nextTicket++;
    this.starts.set(name, { start: this.clock(), ticket });
    return ticket;
  }

  /**
   * Remove the active entry for `name`
   * @returns Elapsed seconds since the matching start()
   * @param ticket - When given, the active entry must come from that start()
   * @throws UnknownActionStopError if `name` is not active, or is active
   *   under a different ticket
   */
  stop(name: string, ticket?: number): number {
    const end = this.clock();
    const entry = this.starts.get(name);
    if (entry === undefined || (ticket !== undefined && entry.ticket !== ticket)) {
      throw new UnknownActionStopError(name);
    }
    this.starts.delete(name);
    return elapsedSeconds(entry.start, end);
  }

  isActive(name: string): boolean {
    return this.starts.has(name);
  }

  /**
   * Active action names, oldest start first
   */
  names(): string[] {
    return [...this.starts.keys()];
  }

  get size(): number {
    return this.starts.size;
  }
}
