/**
 * Time Utilities
 * Monotonic clock readings for duration measurement
 */

/**
 * Current monotonic timestamp in seconds
 * Uses process.hrtime.bigint() for nanosecond precision; unaffected by
 * wall-clock adjustments
 */
export function hrTimeSeconds(): number {
  return Number(process.hrtime.bigint()) / 1_000_000_000;
}

/**
 * Elapsed seconds between two readings of the same clock, never negative
 */
export function elapsedSeconds(start: number, end: number): number {
  return Math.max(0, end - start);
}
