/**
 * Defect taxonomy.
 *
 * The tag (`family`) selects the payload shape; `kind` names the concrete
 * sub-kind inside the family. Rules dispatch on both, never on field probing.
 */

export type LayerRole = 'content' | 'overlay' | 'dialog';

export type VisibilityKind = {
  readonly family: 'visibility';
  readonly kind: 'invisible_opacity' | 'invisible_display' | 'invisible_visibility';
  /** Utility classes responsible for the suppression. */
  readonly suppressingClasses: readonly string[];
};

export type StackingKind = {
  readonly family: 'stacking';
  readonly kind: 'stacking_conflict' | 'stacking_missing';
  readonly role: LayerRole;
  readonly blockerLayerIndex: number | null;
};

export type PointerRoutingKind = {
  readonly family: 'pointer_routing';
  readonly kind: 'pointer_blocked' | 'pointer_intercepted' | 'decorative_overlay';
  readonly blockerLayerIndex: number | null;
  /** For `decorative_overlay`: an interactive element the overlay covers, when one is known. */
  readonly victim: string | null;
};

export type SpatialTransformKind = {
  readonly family: 'spatial_transform';
  readonly kind: 'transform_backface' | 'transform_offscreen';
  readonly offendingClasses: readonly string[];
  /** Selector of the element holding the 3-D context, if any. */
  readonly container: string | null;
};

export type FeedbackIntensityKind = {
  readonly family: 'feedback_intensity';
  readonly kind: 'feedback_too_subtle' | 'feedback_missing';
  readonly globalCoverage: number | null;
  readonly localCoverage: number | null;
};

export type ScriptFaultKind = {
  readonly family: 'script_fault';
  readonly kind: 'script_runtime_error' | 'script_missing_reference';
  readonly message: string;
};

export type UnknownKind = {
  readonly family: 'unknown';
  readonly kind: 'unknown';
  readonly reason: string;
};

export type ErrorKind =
  | VisibilityKind
  | StackingKind
  | PointerRoutingKind
  | SpatialTransformKind
  | FeedbackIntensityKind
  | ScriptFaultKind
  | UnknownKind;

export type ErrorFamily = ErrorKind['family'];
export type ErrorKindName = ErrorKind['kind'];

/** Static fixability table. A `false` entry routes the defect to the generative fixer. */
export const DETERMINISTIC_FIXABLE = {
  invisible_opacity: true,
  invisible_display: true,
  invisible_visibility: true,
  stacking_conflict: true,
  stacking_missing: true,
  pointer_blocked: true,
  pointer_intercepted: true,
  decorative_overlay: true,
  transform_backface: true,
  transform_offscreen: true,
  feedback_too_subtle: true,
  feedback_missing: false,
  script_runtime_error: false,
  script_missing_reference: false,
  unknown: false,
} as const satisfies Record<ErrorKindName, boolean>;

export const ALL_ERROR_KIND_NAMES: readonly ErrorKindName[] = Object.freeze(
  Object.keys(DETERMINISTIC_FIXABLE).filter(isErrorKindName),
);

export function isDeterministicFixable(kind: ErrorKind): boolean {
  return DETERMINISTIC_FIXABLE[kind.kind];
}

export function isErrorKindName(value: string): value is ErrorKindName {
  return Object.prototype.hasOwnProperty.call(DETERMINISTIC_FIXABLE, value);
}

/**
 * Ordering used when defects are reported or handed to the generative fixer:
 * lower numbers are more fundamental (an invisible element cannot be clicked at all).
 */
const FAMILY_PRIORITY: Record<ErrorFamily, number> = {
  visibility: 1,
  pointer_routing: 2,
  stacking: 3,
  spatial_transform: 4,
  feedback_intensity: 5,
  script_fault: 6,
  unknown: 7,
};

export function familyPriority(family: ErrorFamily): number {
  return FAMILY_PRIORITY[family];
}
