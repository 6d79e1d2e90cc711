import { z } from 'zod';

export const RunStatusSchema = z.enum(['PASS', 'FAIL', 'TIMEOUT']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

/**
 * One record per completed run. The schema is used to read JSONL streams back.
 */
export const RunMetricsRecordSchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string(),
  status: RunStatusSchema,
  success: z.boolean(),
  finalScore: z.number().min(0).max(1),
  phasesCompleted: z.array(z.string()),
  defectsInitial: z.number().int().min(0),
  defectsFixed: z.number().int().min(0),
  defectsRemaining: z.number().int().min(0),
  collaboratorCalls: z.object({
    validator: z.number().int().min(0),
    generative: z.number().int().min(0),
  }),
  generativeUsage: z.object({
    costUnits: z.number().min(0),
    latencyMs: z.number().min(0),
  }),
  totalDurationMs: z.number().min(0),
  rollbackOccurred: z.boolean(),
  reason: z.string(),
});

export type RunMetricsRecord = z.infer<typeof RunMetricsRecordSchema>;

export interface RunMetricsSummary {
  readonly runs: number;
  readonly successRate: number;
  readonly meanFinalScore: number;
  readonly rollbackRate: number;
  readonly timeoutCount: number;
  readonly meanDurationMs: number;
  readonly generativeCalls: number;
}

export function summarizeRuns(records: readonly RunMetricsRecord[]): RunMetricsSummary {
  const runs = records.length;
  if (runs === 0) {
    return { runs: 0, successRate: 0, meanFinalScore: 0, rollbackRate: 0, timeoutCount: 0, meanDurationMs: 0, generativeCalls: 0 };
  }

  const sum = (pick: (r: RunMetricsRecord) => number): number => records.reduce((acc, r) => acc + pick(r), 0);

  return {
    runs,
    successRate: sum((r) => (r.success ? 1 : 0)) / runs,
    meanFinalScore: sum((r) => r.finalScore) / runs,
    rollbackRate: sum((r) => (r.rollbackOccurred ? 1 : 0)) / runs,
    timeoutCount: sum((r) => (r.status === 'TIMEOUT' ? 1 : 0)),
    meanDurationMs: sum((r) => r.totalDurationMs) / runs,
    generativeCalls: sum((r) => r.collaboratorCalls.generative),
  };
}
