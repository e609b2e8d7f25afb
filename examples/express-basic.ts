/**
 * Express Basic Example
 *
 * Times every request per route and serves the report at /_profiler.
 * Run with: npx tsx examples/express-basic.ts
 */

import express from 'express';
import { createProfiler, profilerExpress, profilerReport } from '../src/index.js';

const app = express();
const profiler = createProfiler();

/**
 * Register the profiler middleware
 * - Attaches req.profiler to every request
 * - Records one "<METHOD> <route>" action per finished request
 */
app.use(profilerExpress(profiler, { ignorePaths: ['/_profiler', '/favicon.ico'] }));

app.get('/hello', (_req, res) => {
  res.json({ message: 'Hello, World!' });
});

app.get('/primes/:limit', (req, res) => {
  const limit = Number(req.params.limit);
  const primes = profiler.profile('sieve', () => sieve(limit));
  res.json({ count: primes.length });
});

app.get('/_profiler', profilerReport(profiler));

function sieve(limit: number): number[] {
  const composite = new Uint8Array(limit + 1);
  const primes: number[] = [];
  for (let n = 2; n <= limit; n++) {
    if (composite[n]) continue;
    primes.push(n);
    for (let m = n * n; m <= limit; m += n) composite[m] = 1;
  }
  return primes;
}

const PORT = 3000;
app.listen(PORT, () => {
  console.log(`Basic example running on http://localhost:${PORT}`);
  console.log('Try:');
  console.log(`  curl http://localhost:${PORT}/hello`);
  console.log(`  curl http://localhost:${PORT}/primes/100000`);
  console.log(`  curl http://localhost:${PORT}/_profiler`);
});
