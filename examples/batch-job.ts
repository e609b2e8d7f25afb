/**
 * Batch Job Example
 *
 * Profiles the stages of a small in-memory pipeline and prints the report.
 * Run with: npx tsx examples/batch-job.ts
 */

import { createProfiler, wrap } from '../src/index.js';

interface Order {
  id: number;
  amountCents: number;
  region: string;
}

const profiler = createProfiler({ title: 'Batch Job Report' });

const generate = wrap(profiler, function generateOrders(count: number): Order[] {
  const regions = ['eu', 'us', 'apac'];
  return Array.from({ length: count }, (_, i) => ({
    id: i,
    amountCents: (i * 7919) % 10_000,
    region: regions[i % regions.length] ?? 'eu',
  }));
});

const totalsByRegion = wrap(profiler, function aggregateOrders(orders: Order[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const order of orders) {
    totals.set(order.region, (totals.get(order.region) ?? 0) + order.amountCents);
  }
  return totals;
});

async function main(): Promise<void> {
  profiler.resetStartTime();

  for (let batch = 0; batch < 5; batch++) {
    const orders = generate(50_000);
    const totals = totalsByRegion(orders);

    await profiler.profileAsync('persist', async () => {
      await new Promise(resolve => setTimeout(resolve, 20));
      return totals.size;
    });

    const guard = profiler.scope('sort');
    try {
      orders.sort((a, b) => b.amountCents - a.amountCents);
    } finally {
      guard.release();
    }
  }

  profiler.describe();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
