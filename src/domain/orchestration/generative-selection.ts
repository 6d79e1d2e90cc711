import type { ClassifiedError } from '../defects/classified-error.js';

export interface GenerativeSelectionPolicy {
  readonly generativeConfidenceThreshold: number;
  readonly maxErrorsPerGenerativeCall: number;
}

/**
 * Defects handed to the generative fixer: only those no deterministic rule owns,
 * most confident first. Defects at or above the threshold are preferred; when none
 * reach it, the best remaining ones are sent so low-confidence gaps still get a try.
 */
export function selectForGenerative(
  errors: readonly ClassifiedError[],
  policy: GenerativeSelectionPolicy,
): ClassifiedError[] {
  const eligible = errors.filter((e) => e.requiresGenerative).sort((a, b) => b.confidence - a.confidence);
  const confident = eligible.filter((e) => e.confidence >= policy.generativeConfidenceThreshold);
  const pool = confident.length > 0 ? confident : eligible;
  return pool.slice(0, policy.maxErrorsPerGenerativeCall);
}

/**
 * Defects the feedback pass hands back to the rules: owned by a deterministic rule,
 * first seen in a rendered report, and located in the document.
 */
export function selectForFeedbackPass(errors: readonly ClassifiedError[]): ClassifiedError[] {
  return errors.filter((e) => !e.requiresGenerative && e.evidence === 'rendered' && e.elementTag !== 'unknown');
}
