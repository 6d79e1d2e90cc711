import type { ClassifiedError } from '../domain/defects/classified-error.js';
import type { ErrorKindName } from '../domain/defects/error-kind.js';

export interface GenerativeDefect {
  readonly selector: string;
  readonly kind: ErrorKindName;
  readonly confidence: number;
  readonly rationale: string;
  /** Full classification, for backends that use the style snapshot. */
  readonly error: ClassifiedError;
}

export interface GenerativeRequest {
  readonly document: string;
  readonly defects: readonly GenerativeDefect[];
  /** Attempts left after this one. */
  readonly attemptsRemaining: number;
  readonly signal: AbortSignal;
}

export interface GenerativeUsage {
  readonly costUnits: number;
  readonly latencyMs: number;
}

/**
 * Raw proposal. `patches` is parsed against the patch schema by the pipeline;
 * anything that fails parsing is treated as an empty proposal.
 */
export interface GenerativeProposal {
  readonly patches: unknown;
  readonly usage?: GenerativeUsage;
}

/**
 * External model backend for defects no deterministic rule handles.
 *
 * Fails closed: when it has no confident proposal it returns `patches: []`.
 */
export interface GenerativeFixerPort {
  propose(request: GenerativeRequest): Promise<GenerativeProposal>;
}
