import type { InteractionReport } from './interaction-report.js';

export interface CoverageThresholds {
  /** Minimum viewport-wide pixel-delta fraction. */
  readonly globalCoverage: number;
  /** Minimum element-local pixel-delta fraction. */
  readonly localCoverage: number;
}

export interface ElementScore {
  readonly selector: string;
  readonly passed: boolean;
  readonly globalCoverage: number;
  readonly localCoverage: number;
}

export interface ValidationScore {
  readonly elements: readonly ElementScore[];
  /** Fraction of tested elements that passed; 1 when nothing was tested. */
  readonly globalScore: number;
  readonly passed: boolean;
}

export function elementPasses(
  coverage: { readonly globalCoverage: number; readonly localCoverage: number },
  thresholds: CoverageThresholds,
): boolean {
  return coverage.globalCoverage >= thresholds.globalCoverage || coverage.localCoverage >= thresholds.localCoverage;
}

/**
 * Elements reported as `not_tested` are left out of the denominator.
 */
export function computeValidationScore(
  report: InteractionReport,
  thresholds: CoverageThresholds,
  passBar: number,
): ValidationScore {
  const elements: ElementScore[] = report.elements
    .filter((outcome) => outcome.status !== 'not_tested')
    .map((outcome) => ({
      selector: outcome.selector,
      passed: elementPasses(outcome, thresholds),
      globalCoverage: outcome.globalCoverage,
      localCoverage: outcome.localCoverage,
    }));

  const globalScore = elements.length === 0 ? 1 : elements.filter((e) => e.passed).length / elements.length;

  return { elements, globalScore, passed: globalScore >= passBar };
}

export function failingSelectors(score: ValidationScore): ReadonlySet<string> {
  return new Set(score.elements.filter((e) => !e.passed).map((e) => e.selector));
}
