/**
 * Retention Metrics
 *
 * Registered on the prom-client default registry and served by /metrics.
 */

import { Counter, Histogram } from 'prom-client';

export const retentionRuns = new Counter({
  name: 'retention_runs_total',
  help: 'Retention runs by mode and outcome',
  labelNames: ['mode', 'outcome'] as const,
});

export const partitionsDropped = new Counter({
  name: 'retention_partitions_dropped_total',
  help: 'Partitions dropped by retention',
  labelNames: ['table'] as const,
});

export const partitionDropFailures = new Counter({
  name: 'retention_partition_drop_failures_total',
  help: 'Partition or parent drops that failed',
  labelNames: ['table'] as const,
});

export const runDuration = new Histogram({
  name: 'retention_run_duration_seconds',
  help: 'Wall time of a retention run',
  labelNames: ['mode'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60],
});
