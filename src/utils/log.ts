/**
 * Diagnostic logging to stderr
 */

const PREFIX = '[profiler]';

export function logWarning(message: string): void {
  process.stderr.write(`${PREFIX} warning: ${message}\n`);
}

export function logDebug(message: string): void {
  process.stderr.write(`${PREFIX} debug: ${message}\n`);
}
