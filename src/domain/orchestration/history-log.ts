import type { ValidationScore } from '../validation/validation-score.js';
import type { InteractionReport } from '../validation/interaction-report.js';
import type { RepairPhase } from './repair-state.js';

export interface HistoryEntry {
  readonly sequence: number;
  readonly phase: RepairPhase;
  readonly document: string;
  /** Null for the baseline and for validations that did not complete. */
  readonly score: ValidationScore | null;
  readonly report: InteractionReport | null;
  readonly note: string | null;
}

/**
 * Append-only record of one run's document versions, with a best pointer.
 *
 * Invariant: `best` is the earliest entry holding the highest global score, or the
 * baseline while nothing has been scored.
 */
export class HistoryLog {
  private readonly entries: HistoryEntry[] = [];
  private bestIndex = 0;

  constructor(baseline: string) {
    this.entries.push({ sequence: 0, phase: 'CLASSIFY', document: baseline, score: null, report: null, note: 'baseline' });
  }

  append(input: {
    readonly phase: RepairPhase;
    readonly document: string;
    readonly score: ValidationScore | null;
    readonly report?: InteractionReport | null;
    readonly note?: string;
  }): HistoryEntry {
    const entry: HistoryEntry = {
      sequence: this.entries.length,
      phase: input.phase,
      document: input.document,
      score: input.score,
      report: input.report ?? null,
      note: input.note ?? null,
    };
    this.entries.push(entry);

    const best = this.best;
    if (entry.score !== null && (best.score === null || entry.score.globalScore > best.score.globalScore)) {
      this.bestIndex = entry.sequence;
    }
    return entry;
  }

  get best(): HistoryEntry {
    return this.at(this.bestIndex);
  }

  get baseline(): HistoryEntry {
    return this.at(0);
  }

  /** Most recent entry with a score, or the baseline. */
  get latestScored(): HistoryEntry {
    for (let i = this.entries.length - 1; i > 0; i--) {
      const entry = this.at(i);
      if (entry.score !== null) return entry;
    }
    return this.baseline;
  }

  get bestScore(): number | null {
    return this.best.score?.globalScore ?? null;
  }

  byPhase(phase: RepairPhase): readonly HistoryEntry[] {
    return this.entries.filter((entry) => entry.phase === phase);
  }

  all(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  private at(index: number): HistoryEntry {
    const entry = this.entries[index];
    if (!entry) throw new Error(`History index ${index} out of range (size ${this.entries.length})`);
    return entry;
  }
}
