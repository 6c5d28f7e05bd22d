import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type IndexOperation = 'search' | 'insert' | 'delete';
export type IndexOutcome = 'hit' | 'miss' | 'created' | 'updated';

export interface IndexShape {
  size(): number;
  readonly currentLevel: number;
}

export interface MetricsRegistryOptions {
  collectDefaults?: boolean;
}

export class MetricsRegistry {
  readonly registry: Registry;

  readonly indexOperationsTotal: Counter<'index' | 'operation' | 'outcome'>;
  readonly indexEntries: Gauge<'index'>;
  readonly indexLevels: Gauge<'index'>;
  readonly indexOperationLatencyMs: Histogram<'index' | 'operation'>;

  constructor(options: MetricsRegistryOptions = {}) {
    this.registry = new Registry();
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.indexOperationsTotal = new Counter({
      name: 'ordered_index_operations_total',
      help: 'Total number of index operations by outcome',
      labelNames: ['index', 'operation', 'outcome'],
      registers: [this.registry],
    });

    this.indexEntries = new Gauge({
      name: 'ordered_index_entries',
      help: 'Current number of entries held by an index',
      labelNames: ['index'],
      registers: [this.registry],
    });

    this.indexLevels = new Gauge({
      name: 'ordered_index_current_level',
      help: 'Highest occupied level of an index',
      labelNames: ['index'],
      registers: [this.registry],
    });

    this.indexOperationLatencyMs = new Histogram({
      name: 'ordered_index_operation_latency_ms',
      help: 'Index operation latency distribution in milliseconds',
      labelNames: ['index', 'operation'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [this.registry],
    });
  }

  recordOperation(index: string, operation: IndexOperation, outcome: IndexOutcome): void {
    this.indexOperationsTotal.inc({ index, operation, outcome });
  }

  observeLatency(index: string, operation: IndexOperation, latencyMs: number): void {
    this.indexOperationLatencyMs.observe({ index, operation }, latencyMs);
  }

  trackShape(index: string, shape: IndexShape): void {
    this.indexEntries.set({ index }, shape.size());
    this.indexLevels.set({ index }, shape.currentLevel);
  }
}
