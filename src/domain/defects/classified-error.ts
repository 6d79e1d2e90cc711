import type { Brand } from '../../runtime/brand.js';
import type { ErrorKind } from './error-kind.js';
import { familyPriority, isDeterministicFixable } from './error-kind.js';

/** Certainty of root-cause attribution, always within [0, 1]. */
export type Confidence = Brand<number, 'Confidence'>;

export function toConfidence(value: number): Confidence {
  if (Number.isNaN(value)) return 0 as Confidence;
  return Math.min(1, Math.max(0, value)) as Confidence;
}

/**
 * Evidence tiers. Confidence is monotonic in this order.
 */
export type Evidence = 'static' | 'rendered' | 'static_and_rendered';

export const CONFIDENCE_BY_EVIDENCE: Readonly<Record<Evidence, number>> = {
  static: 0.8,
  rendered: 0.85,
  static_and_rendered: 0.95,
};

/** Ceiling for defects that could not be attributed to a known kind. */
export const UNKNOWN_CONFIDENCE = 0.4;

export interface BoundingBox {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type PointerRouting = 'auto' | 'none' | 'inherit';

export interface StyleSnapshot {
  readonly opacity: number;
  readonly layerIndex: number | null;
  readonly display: 'none' | 'visible';
  readonly visibility: 'visible' | 'hidden';
  readonly pointerRouting: PointerRouting;
  readonly transform: string | null;
  readonly boundingBox: BoundingBox | null;
}

export interface ClassifiedError {
  readonly kind: ErrorKind;
  readonly selector: string;
  readonly elementTag: string;
  /** Class tokens on the element when it was classified. */
  readonly classes: readonly string[];
  readonly style: StyleSnapshot;
  readonly blockingElement: string | null;
  readonly confidence: Confidence;
  readonly requiresGenerative: boolean;
  readonly evidence: Evidence;
  readonly rationale: string;
}

export interface ClassifiedErrorInput {
  readonly kind: ErrorKind;
  readonly selector: string;
  readonly elementTag: string;
  readonly classes: readonly string[];
  readonly style: StyleSnapshot;
  readonly blockingElement?: string | null;
  readonly evidence: Evidence;
  readonly rationale: string;
}

/**
 * Builds a ClassifiedError, deriving confidence and routing from the kind and the evidence tier.
 */
export function classifiedError(input: ClassifiedErrorInput): ClassifiedError {
  const confidence =
    input.kind.family === 'unknown' ? UNKNOWN_CONFIDENCE : CONFIDENCE_BY_EVIDENCE[input.evidence];

  return {
    kind: input.kind,
    selector: input.selector,
    elementTag: input.elementTag,
    classes: input.classes,
    style: input.style,
    blockingElement: input.blockingElement ?? null,
    confidence: toConfidence(confidence),
    requiresGenerative: !isDeterministicFixable(input.kind),
    evidence: input.evidence,
    rationale: input.rationale,
  };
}

export function withEvidence(error: ClassifiedError, evidence: Evidence): ClassifiedError {
  return classifiedError({ ...error, evidence });
}

export const EMPTY_STYLE: StyleSnapshot = {
  opacity: 1,
  layerIndex: null,
  display: 'visible',
  visibility: 'visible',
  pointerRouting: 'auto',
  transform: null,
  boundingBox: null,
};

/** Family priority first, then higher confidence first. Stable for equal keys. */
export function prioritizeErrors(errors: readonly ClassifiedError[]): ClassifiedError[] {
  return [...errors].sort(
    (a, b) => familyPriority(a.kind.family) - familyPriority(b.kind.family) || b.confidence - a.confidence,
  );
}
