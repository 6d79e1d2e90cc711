import type { RunMetricsRecord } from '../domain/metrics/run-metrics.js';

/**
 * Append-only destination for one record per completed run.
 * Readers (dashboards, CLIs) live outside the pipeline.
 */
export interface MetricsSinkPort {
  append(record: RunMetricsRecord): Promise<void>;
}
