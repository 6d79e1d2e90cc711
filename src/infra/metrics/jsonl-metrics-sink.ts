import fs from 'node:fs/promises';
import path from 'node:path';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { MetricsSinkPort } from '../../ports/metrics-sink.port.js';
import type { RunMetricsRecord } from '../../domain/metrics/run-metrics.js';
import { RunMetricsRecordSchema } from '../../domain/metrics/run-metrics.js';

export type MetricsReadError =
  | { readonly code: 'METRICS_READ_FAILED'; readonly message: string }
  | { readonly code: 'METRICS_CORRUPT_LINE'; readonly line: number; readonly message: string };

/**
 * Appends one JSON line per run. Writes for one sink are serialized so lines never interleave.
 */
export class JsonlMetricsSink implements MetricsSinkPort {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(record: RunMetricsRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.tail.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    });
    // A failed write does not block later ones; the caller still sees the failure.
    this.tail = write.catch(() => undefined);
    return write;
  }

  /** Reads every record back; a missing file is an empty stream. */
  async readAll(): Promise<Result<RunMetricsRecord[], MetricsReadError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return ok([]);
      return err({ code: 'METRICS_READ_FAILED', message: e instanceof Error ? e.message : String(e) });
    }

    const records: RunMetricsRecord[] = [];
    const lines = raw.split('\n');
    for (const [i, line] of lines.entries()) {
      if (line.trim().length === 0) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (e) {
        return err({ code: 'METRICS_CORRUPT_LINE', line: i + 1, message: e instanceof Error ? e.message : String(e) });
      }
      const parsed = RunMetricsRecordSchema.safeParse(value);
      if (!parsed.success) {
        return err({ code: 'METRICS_CORRUPT_LINE', line: i + 1, message: parsed.error.errors[0]?.message ?? 'invalid record' });
      }
      records.push(parsed.data);
    }
    return ok(records);
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
