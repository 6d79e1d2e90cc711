import type { MetricsSinkPort } from '../../ports/metrics-sink.port.js';
import type { RunMetricsRecord } from '../../domain/metrics/run-metrics.js';

/**
 * Keeps records in process. Used when no metrics path is configured.
 */
export class InMemoryMetricsSink implements MetricsSinkPort {
  private readonly _records: RunMetricsRecord[] = [];

  async append(record: RunMetricsRecord): Promise<void> {
    this._records.push(record);
  }

  get records(): readonly RunMetricsRecord[] {
    return this._records;
  }
}
