import { loadAppConfig } from './config/app-config.js';
import { OrderedIndex } from './engine/ordered-index.js';
import { Logger } from './logging/logger.js';
import { MetricsRegistry, type IndexOperation } from './metrics/registry.js';
import { XorShift32 } from './utils/prng.js';

const INDEX_NAME = 'benchmark';

function percentile(sorted: number[], fraction: number): number {
  return Number((sorted[Math.floor(sorted.length * fraction)] ?? 0).toFixed(4));
}

async function benchmark(): Promise<void> {
  const config = loadAppConfig();
  const metrics = new MetricsRegistry({ collectDefaults: false });
  const random = new XorShift32(config.benchmark.seed);
  const index = new OrderedIndex<number, number>({
    maxLevel: config.index.maxLevel,
    promotionProbability: config.index.promotionProbability,
    random: new XorShift32(config.index.randomSeed ?? config.benchmark.seed + 1_000),
  });

  const keySpace = config.benchmark.iterations * 4;
  const samples: Record<IndexOperation, number[]> = { insert: [], search: [], delete: [] };

  const startedAt = performance.now();
  for (let i = 0; i < config.benchmark.iterations; i += 1) {
    const key = random.nextInt(0, keySpace);
    const roll = random.nextFloat();
    const operation: IndexOperation = roll < 0.5 ? 'insert' : roll < 0.85 ? 'search' : 'delete';

    const now = performance.now();
    if (operation === 'insert') {
      index.insert(key, i);
    } else if (operation === 'search') {
      index.search(key);
    } else {
      index.delete(key);
    }

    const latencyMs = performance.now() - now;
    samples[operation].push(latencyMs);
    metrics.observeLatency(INDEX_NAME, operation, latencyMs);
  }
  const elapsedMs = performance.now() - startedAt;
  metrics.trackShape(INDEX_NAME, index);

  const latencyMs = Object.fromEntries(
    Object.entries(samples).map(([operation, values]) => {
      const sorted = values.sort((left, right) => left - right);
      return [
        operation,
        { count: sorted.length, p50: percentile(sorted, 0.5), p95: percentile(sorted, 0.95), p99: percentile(sorted, 0.99) },
      ];
    })
  );

  console.log(
    JSON.stringify(
      {
        benchmark: 'ordered-index',
        iterations: config.benchmark.iterations,
        elapsedMs: Number(elapsedMs.toFixed(2)),
        throughputOpsPerSec: Number(((config.benchmark.iterations / elapsedMs) * 1_000).toFixed(2)),
        latencyMs,
        finalStats: {
          size: index.size(),
          currentLevel: index.currentLevel,
          maxLevel: index.maxLevel,
        },
      },
      null,
      2
    )
  );
}

benchmark().catch((error) => {
  new Logger('benchmark').error('benchmark failed', {
    error: String(error),
  });
  process.exit(1);
});
