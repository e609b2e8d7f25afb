/**
 * Aggregator
 *
 * Accumulates completed durations and invocation counts per action.
 * The order in which actions first complete is kept in its own sequence;
 * reports use it to break ties.
 */

import type { AggregateRecord } from '../types.js';

export class Aggregator {
  private readonly records = new Map<string, AggregateRecord>();
  private readonly sequence: string[] = [];

  /**
   * Add one completed cycle of `name`
   */
  record(name: string, elapsed: number): void {
    let entry = this.records.get(name);
    if (!entry) {
      entry = { durationSum: 0, count: 0, order: this.sequence.length };
      this.records.set(name, entry);
      this.sequence.push(name);
    }
    entry.durationSum += elapsed;
    entry.count += 1;
  }

  get(name: string): Readonly<AggregateRecord> | undefined {
    const entry = this.records.get(name);
    return entry ? { ...entry } : undefined;
  }

  count(name: string): number {
    return this.records.get(name)?.count ?? 0;
  }

  durationSum(name: string): number {
    return this.records.get(name)?.durationSum ?? 0;
  }

  completionOrder(): string[] {
    return [...this.sequence];
  }

  /**
   * Snapshot of every record, in completion order
   */
  entries(): Array<[string, Readonly<AggregateRecord>]> {
    const result: Array<[string, Readonly<AggregateRecord>]> = [];
    for (const name of this.sequence) {
      const entry = this.records.get(name);
      if (entry) {
        result.push([name, { ...entry }]);
      }
    }
    return result;
  }

  get size(): number {
    return this.sequence.length;
  }
}
