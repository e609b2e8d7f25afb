/**
 * Console Report Sinks
 *
 * Helper functions for writing profiler reports to stdout/stderr
 */

import type { ReportSink } from '../types.js';

/**
 * Create a console report sink
 *
 * @param opts - Options for the sink
 * @param opts.stream - Target stream (default: 'stdout')
 * @returns Sink that writes the report unchanged
 */
export function createConsoleReporter(opts?: { stream?: 'stdout' | 'stderr' }): ReportSink {
  const stream = opts?.stream === 'stderr' ? process.stderr : process.stdout;

  return (summary: string): void => {
    stream.write(summary);
  };
}
