import type { ValidationRequest, ValidatorPort } from '../../src/ports/validator.port.js';
import type { InteractionReportInput } from '../../src/domain/validation/interaction-report.js';

/**
 * One scripted validator response: a report, a failure, or a function that
 * decides (and may move a fake clock or hang).
 */
export type ValidatorStep =
  | { readonly kind: 'report'; readonly report: InteractionReportInput }
  | { readonly kind: 'throw'; readonly error: Error }
  | { readonly kind: 'run'; readonly run: (request: ValidationRequest) => Promise<InteractionReportInput> };

export const Step = {
  report: (report: InteractionReportInput): ValidatorStep => ({ kind: 'report', report }),
  /** Well-typed but outside the report schema: coverage above 1 and an empty selector. */
  malformed: (): ValidatorStep => ({
    kind: 'report',
    report: { elements: [{ selector: '', status: 'responsive', globalCoverage: 2, localCoverage: 0 }] },
  }),
  throws: (message: string): ValidatorStep => ({ kind: 'throw', error: new Error(message) }),
  run: (run: (request: ValidationRequest) => Promise<InteractionReportInput>): ValidatorStep => ({ kind: 'run', run }),
  /** Never settles; only the request signal can release the caller. */
  hang: (): ValidatorStep => ({ kind: 'run', run: () => new Promise<InteractionReportInput>(() => undefined) }),
} as const;

/**
 * Plays steps in order; the last step repeats once the script runs out.
 * Records every request it received.
 */
export class ScriptedValidator implements ValidatorPort {
  readonly requests: ValidationRequest[] = [];

  constructor(private readonly steps: readonly ValidatorStep[]) {}

  get calls(): number {
    return this.requests.length;
  }

  validate(request: ValidationRequest): Promise<InteractionReportInput> {
    const step = this.steps[Math.min(this.requests.length, this.steps.length - 1)];
    this.requests.push(request);
    if (!step) return Promise.reject(new Error('ScriptedValidator has no steps'));

    switch (step.kind) {
      case 'report':
        return Promise.resolve(step.report);
      case 'throw':
        return Promise.reject(step.error);
      case 'run':
        return step.run(request);
    }
  }
}

/**
 * Report with `passing` responsive elements out of `total`, so the global score is passing / total.
 */
export function reportWithScore(passing: number, total: number): InteractionReportInput {
  return {
    elements: Array.from({ length: total }, (_, i) =>
      i < passing
        ? { selector: `#target-${i}`, status: 'responsive' as const, globalCoverage: 0.05, localCoverage: 0.5 }
        : { selector: `#target-${i}`, status: 'no_visual_change' as const, globalCoverage: 0, localCoverage: 0 },
    ),
  };
}
