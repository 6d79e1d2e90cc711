import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { RepairConfig, ValidatedConfig } from '../../config/app-config.js';
import type { ClassifiedError } from '../../domain/defects/classified-error.js';
import { prioritizeErrors } from '../../domain/defects/classified-error.js';
import type { PatchSet } from '../../domain/patches/patch-set.js';
import { isEmptyPatchSet } from '../../domain/patches/patch-set.js';
import { parsePatchProposal } from '../../domain/patches/patch-schema.js';
import type { InteractionReport } from '../../domain/validation/interaction-report.js';
import { InteractionReportSchema } from '../../domain/validation/interaction-report.js';
import { computeValidationScore } from '../../domain/validation/validation-score.js';
import { HistoryLog } from '../../domain/orchestration/history-log.js';
import type { HistoryEntry } from '../../domain/orchestration/history-log.js';
import type { RepairPhase, RepairState, TerminalState, Transition } from '../../domain/orchestration/repair-state.js';
import { deadlineReached, isTerminal, nextState } from '../../domain/orchestration/repair-state.js';
import { selectForFeedbackPass, selectForGenerative } from '../../domain/orchestration/generative-selection.js';
import type { RunMetricsRecord } from '../../domain/metrics/run-metrics.js';
import type { ValidatorPort } from '../../ports/validator.port.js';
import type { GenerativeDefect, GenerativeFixerPort } from '../../ports/generative-fixer.port.js';
import type { MetricsSinkPort } from '../../ports/metrics-sink.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';
import type { RunIdFactoryPort } from '../../ports/run-id.port.js';
import type { ClassificationError } from './classifier.js';
import { Classifier } from './classifier.js';
import { RuleEngine } from './rule-engine.js';
import { PatchApplier } from './patch-applier.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { CallBounds, CollaboratorError } from './orchestration/collaborator-call.js';
import { callWithDeadline } from './orchestration/collaborator-call.js';

export interface RepairOptions {
  /** Replaces the injected configuration for this run only. */
  readonly config?: ValidatedConfig;
  /** External cancellation. In-flight collaborator calls are abandoned. */
  readonly signal?: AbortSignal;
  readonly renderingHandle?: unknown;
}

export interface OrchestratorResult {
  readonly runId: string;
  readonly status: TerminalState;
  readonly success: boolean;
  readonly originalDocument: string;
  readonly finalDocument: string;
  readonly finalScore: number;
  readonly phasesCompleted: readonly RepairState[];
  readonly defectsFixed: number;
  readonly defectsRemaining: number;
  readonly remainingDefects: readonly ClassifiedError[];
  readonly history: readonly HistoryEntry[];
  readonly reason: string;
  readonly rollbackOccurred: boolean;
  readonly classificationError: ClassificationError | null;
  readonly metrics: RunMetricsRecord;
}

/**
 * Everything one run owns. Nothing here is shared between runs.
 */
interface RunContext {
  readonly runId: string;
  readonly config: RepairConfig;
  readonly logger: Logger;
  readonly original: string;
  readonly startedAtMs: number;
  readonly deadlineMs: number;
  readonly history: HistoryLog;
  readonly controller: AbortController;
  readonly renderingHandle: unknown;
  readonly phases: RepairState[];
  working: string;
  report: InteractionReport | null;
  defects: readonly ClassifiedError[];
  initialDefects: number;
  attemptsRemaining: number;
  feedbackPassDone: boolean;
  validatorCalls: number;
  generativeCalls: number;
  costUnits: number;
  latencyMs: number;
  rollbackOccurred: boolean;
  classificationError: ClassificationError | null;
}

/**
 * Orchestrator - drives one document through the bounded repair loop.
 *
 * Phases run strictly in sequence; only Validator and GenerativeFixer calls
 * suspend, and each is bounded by the run deadline. Every VALIDATE step appends
 * to the run history, and with rollback enabled the result is the best entry.
 */
@singleton()
export class Orchestrator {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.Repair) private readonly config: ValidatedConfig,
    @inject(DI.Services.Classifier) private readonly classifier: Classifier,
    @inject(DI.Services.RuleEngine) private readonly ruleEngine: RuleEngine,
    @inject(DI.Services.PatchApplier) private readonly patchApplier: PatchApplier,
    @inject(DI.Ports.Validator) private readonly validator: ValidatorPort,
    @inject(DI.Ports.GenerativeFixer) private readonly generativeFixer: GenerativeFixerPort,
    @inject(DI.Ports.MetricsSink) private readonly metricsSink: MetricsSinkPort,
    @inject(DI.Ports.TimeClock) private readonly clock: TimeClockPort,
    @inject(DI.Ports.IdFactory) private readonly runIds: RunIdFactoryPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
  ) {
    this.logger = loggerFactory.create('Orchestrator');
  }

  async repair(document: string, options: RepairOptions = {}): Promise<OrchestratorResult> {
    const run = this.startRun(document, options);
    const external = options.signal;
    const onAbort = (): void => run.controller.abort();
    if (external?.aborted) run.controller.abort();
    external?.addEventListener('abort', onAbort, { once: true });

    try {
      const terminal = await this.drive(run);
      return await this.finish(run, terminal);
    } finally {
      external?.removeEventListener('abort', onAbort);
      run.controller.abort();
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Loop
  // ═══════════════════════════════════════════════════════════════════

  private async drive(run: RunContext): Promise<{ readonly state: TerminalState; readonly reason: string }> {
    let state: RepairPhase = 'CLASSIFY';
    for (;;) {
      run.phases.push(state);
      const transition = await this.step(run, state);
      run.logger.debug({ from: state, to: transition.next, reason: transition.reason }, 'Transition');

      if (isTerminal(transition.next)) {
        run.phases.push(transition.next);
        return { state: transition.next, reason: transition.reason };
      }
      state = transition.next;
    }
  }

  private step(run: RunContext, state: RepairPhase): Promise<Transition> | Transition {
    switch (state) {
      case 'CLASSIFY':
        return this.classifyPhase(run);
      case 'DETERMINISTIC_FIX':
        return this.deterministicPhase(run);
      case 'VALIDATE_1':
      case 'VALIDATE_2':
        return this.validatePhase(run, state);
      case 'FEEDBACK_FIX':
        return this.feedbackPhase(run);
      case 'GENERATIVE_FIX':
        return this.generativePhase(run);
      default:
        return assertNever(state);
    }
  }

  private transition(run: RunContext, state: RepairPhase, facts: { readonly score?: number | null; readonly bestScore?: number | null }): Transition {
    return nextState({
      state,
      score: facts.score ?? null,
      bestScore: facts.bestScore ?? run.history.bestScore,
      defectCount: run.defects.length,
      feedbackEligible: run.feedbackPassDone ? 0 : selectForFeedbackPass(run.defects).length,
      generativeEligible: selectForGenerative(run.defects, run.config).length,
      attemptsRemaining: run.attemptsRemaining,
      deadlineExpired: deadlineReached(this.clock.nowMs(), run.deadlineMs),
      passBar: run.config.passBar,
      catastrophicDrop: run.config.catastrophicDrop,
    });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Phases
  // ═══════════════════════════════════════════════════════════════════

  private classifyPhase(run: RunContext): Transition {
    const classified = this.classifier.classify(run.working, null, run.config);
    if (classified.isErr()) {
      run.classificationError = classified.error;
      run.logger.error({ code: classified.error.code, detail: classified.error.message }, 'Initial classification failed');
      return { next: 'FAIL', reason: `Classification failed: ${classified.error.message}` };
    }

    run.defects = prioritizeErrors(classified.value);
    run.initialDefects = run.defects.length;
    run.logger.info(
      { defects: run.defects.length, kinds: run.defects.map((d) => d.kind.kind) },
      'Document classified',
    );
    return this.transition(run, 'CLASSIFY', {});
  }

  private deterministicPhase(run: RunContext): Transition {
    const patchSet = this.ruleEngine.applyRules(run.defects, run.config);
    this.applyPatchSet(run, patchSet, 'deterministic');
    return this.transition(run, 'DETERMINISTIC_FIX', {});
  }

  private async validatePhase(run: RunContext, phase: 'VALIDATE_1' | 'VALIDATE_2'): Promise<Transition> {
    const bestBefore = run.history.bestScore;
    const called = await callWithDeadline('validator', this.bounds(run), (signal) => {
      run.validatorCalls++;
      return this.validator.validate({ document: run.working, renderingHandle: run.renderingHandle, signal });
    }).andThen((raw): Result<InteractionReport, CollaboratorError> => {
      const parsed = InteractionReportSchema.safeParse(raw);
      if (parsed.success) return ok(parsed.data);
      const issue = parsed.error.errors[0];
      return err({
        code: 'MALFORMED_RESPONSE',
        collaborator: 'validator',
        message: `Validator report rejected: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      });
    });

    if (called.isErr()) {
      const terminal = this.terminalFor(called.error);
      if (terminal) return terminal;

      run.logger.warn({ phase, code: called.error.code, detail: called.error.message }, 'Validation attempt failed');
      run.history.append({ phase, document: run.working, score: null, note: called.error.message });
      if (phase === 'VALIDATE_1') run.attemptsRemaining--;
      this.reclassify(run, run.report);
      return this.transition(run, phase, { score: null, bestScore: bestBefore });
    }

    const report = called.value;
    const score = computeValidationScore(report, run.config.thresholds, run.config.passBar);
    run.history.append({ phase, document: run.working, score, report });
    run.report = report;
    run.logger.info({ phase, score: score.globalScore, best: bestBefore }, 'Validation scored');

    if (run.config.enableRollback && bestBefore !== null && score.globalScore < bestBefore) {
      const best = run.history.best;
      run.rollbackOccurred = true;
      run.working = best.document;
      run.report = best.report;
      run.logger.info({ from: score.globalScore, to: bestBefore, sequence: best.sequence }, 'Regression; continuing from best snapshot');
    }

    this.reclassify(run, run.report);
    return this.transition(run, phase, { score: score.globalScore, bestScore: bestBefore });
  }

  /** One more rules pass over deterministic defects that only validation revealed. */
  private feedbackPhase(run: RunContext): Transition {
    run.feedbackPassDone = true;
    const targets = selectForFeedbackPass(run.defects);
    run.logger.info({ defects: targets.length, kinds: targets.map((d) => d.kind.kind) }, 'Applying rules to validation findings');
    this.applyPatchSet(run, this.ruleEngine.applyRules(targets, run.config), 'feedback');
    return this.transition(run, 'FEEDBACK_FIX', {});
  }

  private async generativePhase(run: RunContext): Promise<Transition> {
    run.attemptsRemaining--;
    const selected = selectForGenerative(run.defects, run.config);

    const called = await callWithDeadline('generative_fixer', this.bounds(run), (signal) => {
      run.generativeCalls++;
      return this.generativeFixer.propose({
        document: run.working,
        defects: selected.map(toGenerativeDefect),
        attemptsRemaining: run.attemptsRemaining,
        signal,
      });
    });

    if (called.isErr()) {
      const terminal = this.terminalFor(called.error);
      if (terminal) return terminal;
      run.logger.warn({ code: called.error.code, detail: called.error.message }, 'Generative attempt failed');
      return this.transition(run, 'GENERATIVE_FIX', {});
    }

    const proposal = called.value;
    run.costUnits += proposal.usage?.costUnits ?? 0;
    run.latencyMs += proposal.usage?.latencyMs ?? 0;

    const parsed = parsePatchProposal(proposal.patches);
    if (parsed.isErr()) {
      run.logger.warn({ issues: parsed.error }, 'Generative proposal malformed; treated as empty');
      return this.transition(run, 'GENERATIVE_FIX', {});
    }

    if (isEmptyPatchSet(parsed.value)) {
      run.logger.info({ defects: selected.length }, 'Generative fixer returned no patches');
    } else {
      this.applyPatchSet(run, parsed.value, 'generative');
    }
    return this.transition(run, 'GENERATIVE_FIX', {});
  }

  // ═══════════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════════

  private applyPatchSet(run: RunContext, patchSet: PatchSet, source: 'deterministic' | 'feedback' | 'generative'): void {
    const injected = this.patchApplier.inject(run.working, patchSet);
    injected.match(
      (outcome) => {
        run.working = outcome.document;
        run.logger.info(
          { source, proposed: patchSet.patches.length, applied: outcome.appliedCount, skipped: outcome.skipped.length },
          'Patch set applied',
        );
      },
      (error) => {
        run.logger.warn({ source, code: error.code, detail: error.message }, 'Patch set rejected; document unchanged');
      },
    );
  }

  private reclassify(run: RunContext, report: InteractionReport | null): void {
    const classified = this.classifier.classify(run.working, report, run.config);
    if (classified.isErr()) {
      run.logger.warn({ code: classified.error.code, detail: classified.error.message }, 'Reclassification failed; keeping previous defects');
      return;
    }
    run.defects = prioritizeErrors(classified.value);
  }

  private terminalFor(error: CollaboratorError): Transition | null {
    switch (error.code) {
      case 'DEADLINE_EXCEEDED':
        return { next: 'TIMEOUT', reason: error.message };
      case 'CANCELLED':
        return { next: 'FAIL', reason: 'Run cancelled' };
      case 'COLLABORATOR_THREW':
      case 'MALFORMED_RESPONSE':
        return null;
      default:
        return assertNever(error);
    }
  }

  private bounds(run: RunContext): CallBounds {
    return { clock: this.clock, deadlineMs: run.deadlineMs, signal: run.controller.signal };
  }

  private startRun(document: string, options: RepairOptions): RunContext {
    const config = options.config ?? this.config;
    const runId = this.runIds.next();
    const startedAtMs = this.clock.nowMs();

    return {
      runId,
      config,
      logger: this.logger.child({ runId }),
      original: document,
      startedAtMs,
      deadlineMs: startedAtMs + config.globalTimeoutMs,
      history: new HistoryLog(document),
      controller: new AbortController(),
      renderingHandle: options.renderingHandle,
      phases: [],
      working: document,
      report: null,
      defects: [],
      initialDefects: 0,
      attemptsRemaining: config.maxGenerativeAttempts,
      feedbackPassDone: false,
      validatorCalls: 0,
      generativeCalls: 0,
      costUnits: 0,
      latencyMs: 0,
      rollbackOccurred: false,
      classificationError: null,
    };
  }

  private async finish(
    run: RunContext,
    terminal: { readonly state: TerminalState; readonly reason: string },
  ): Promise<OrchestratorResult> {
    const noDefects = terminal.state === 'PASS' && run.classificationError === null && run.initialDefects === 0;
    const finalEntry = run.config.enableRollback ? run.history.best : run.history.latestScored;
    const finalDocument = noDefects ? run.original : finalEntry.document;
    const finalScore = noDefects ? 1 : finalEntry.score?.globalScore ?? 0;

    let remaining: readonly ClassifiedError[] = [];
    if (run.classificationError === null && !noDefects) {
      remaining = this.classifier.classify(finalDocument, finalEntry.report, run.config).match(
        (errors) => errors,
        () => run.defects,
      );
    }

    const metrics: RunMetricsRecord = {
      runId: run.runId,
      startedAt: new Date(run.startedAtMs).toISOString(),
      status: terminal.state,
      success: terminal.state === 'PASS',
      finalScore,
      phasesCompleted: [...run.phases],
      defectsInitial: run.initialDefects,
      defectsFixed: Math.max(0, run.initialDefects - remaining.length),
      defectsRemaining: remaining.length,
      collaboratorCalls: { validator: run.validatorCalls, generative: run.generativeCalls },
      generativeUsage: { costUnits: run.costUnits, latencyMs: run.latencyMs },
      totalDurationMs: Math.max(0, this.clock.nowMs() - run.startedAtMs),
      rollbackOccurred: run.rollbackOccurred,
      reason: terminal.reason,
    };

    try {
      await this.metricsSink.append(metrics);
    } catch (e) {
      run.logger.error({ err: e }, 'Failed to append run metrics');
    }

    run.logger.info(
      { status: terminal.state, finalScore, phases: run.phases.length, rollback: run.rollbackOccurred },
      'Run finished',
    );

    return {
      runId: run.runId,
      status: terminal.state,
      success: metrics.success,
      originalDocument: run.original,
      finalDocument,
      finalScore,
      phasesCompleted: [...run.phases],
      defectsFixed: metrics.defectsFixed,
      defectsRemaining: metrics.defectsRemaining,
      remainingDefects: remaining,
      history: run.history.all(),
      reason: terminal.reason,
      rollbackOccurred: run.rollbackOccurred,
      classificationError: run.classificationError,
      metrics,
    };
  }
}

function toGenerativeDefect(error: ClassifiedError): GenerativeDefect {
  return {
    selector: error.selector,
    kind: error.kind.kind,
    confidence: error.confidence,
    rationale: error.rationale,
    error,
  };
}
