import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { Outcome, OutcomeSink, SkippedDispatch } from './types';

export interface LoadgenMetricsOptions {
  /** Deployment namespace; becomes part of the per-query metric names. */
  namespace: string;
  registry?: Registry;
  collectDefaultMetrics?: boolean;
}

export interface ExecutorInfo {
  targetQps: number;
  workers: number;
}

export interface LoadgenMetrics extends OutcomeSink {
  readonly registry: Registry;
  readonly metricSuffix: string;
  setExecutorInfo(queryName: string, info: ExecutorInfo): void;
}

const SPANS_RETURNED_BUCKETS = [0, 10, 50, 100, 250, 500, 1000, 2500, 5000];

export function sanitizeMetricSuffix(namespace: string): string {
  return namespace.trim().replace(/-/g, '_').replace(/[^a-zA-Z0-9_]/g, '_');
}

export function createLoadgenMetrics(options: LoadgenMetricsOptions): LoadgenMetrics {
  const registry = options.registry ?? new Registry();
  const suffix = sanitizeMetricSuffix(options.namespace);
  const registers = [registry];

  if (options.collectDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: 'query_load_test_process_' });
  }

  const queryLatency = new Histogram({
    name: `query_load_test_${suffix}`,
    help: 'Query latency in seconds',
    labelNames: ['name'] as const,
    registers
  });

  const queryFailures = new Counter({
    name: `query_failures_count_${suffix}`,
    help: 'Total query failures',
    labelNames: ['name'] as const,
    registers
  });

  const bucketQueries = new Counter({
    name: 'query_load_test_time_bucket_queries_total',
    help: 'Total queries executed per time bucket',
    labelNames: ['bucket', 'query_name'] as const,
    registers
  });

  const bucketDuration = new Histogram({
    name: 'query_load_test_time_bucket_duration_seconds',
    help: 'Query duration per time bucket',
    labelNames: ['bucket', 'query_name'] as const,
    registers
  });

  const spansReturned = new Histogram({
    name: `query_load_test_spans_returned_${suffix}`,
    help: 'Number of spans returned per query',
    labelNames: ['name'] as const,
    buckets: SPANS_RETURNED_BUCKETS,
    registers
  });

  const skipped = new Counter({
    name: 'query_load_test_skipped_total',
    help: 'Dispatches skipped because their time bucket could not hold data yet',
    labelNames: ['bucket', 'query_name'] as const,
    registers
  });

  const targetQps = new Gauge({
    name: 'query_load_test_target_qps',
    help: 'Configured request rate per query template',
    labelNames: ['name'] as const,
    registers
  });

  const workers = new Gauge({
    name: 'query_load_test_workers',
    help: 'Concurrent workers per query template',
    labelNames: ['name'] as const,
    registers
  });

  return {
    registry,
    metricSuffix: suffix,
    recordOutcome(outcome: Outcome) {
      queryLatency.labels(outcome.queryName).observe(outcome.latencySeconds);
      bucketDuration.labels(outcome.bucketName, outcome.queryName).observe(outcome.latencySeconds);
      bucketQueries.labels(outcome.bucketName, outcome.queryName).inc();
      if (!outcome.success) {
        queryFailures.labels(outcome.queryName).inc();
        return;
      }
      spansReturned.labels(outcome.queryName).observe(outcome.resultCount ?? 0);
    },
    recordSkip(entry: SkippedDispatch) {
      skipped.labels(entry.bucketName, entry.queryName).inc();
    },
    setExecutorInfo(queryName: string, info: ExecutorInfo) {
      targetQps.labels(queryName).set(info.targetQps);
      workers.labels(queryName).set(info.workers);
      queryFailures.labels(queryName).inc(0);
    }
  };
}
