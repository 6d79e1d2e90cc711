import type { InteractionReportInput } from '../domain/validation/interaction-report.js';

export interface ValidationRequest {
  /** Full markup, inline behavior included. */
  readonly document: string;
  /** Opaque handle to a prepared rendering context, when the host has one. */
  readonly renderingHandle?: unknown;
  /** Aborted when the run times out or is cancelled; implementations should stop work. */
  readonly signal: AbortSignal;
}

/**
 * Headless rendering and interaction environment.
 *
 * Each call stands alone: no state may leak between calls for different document
 * versions. Instances shared across concurrent runs must tolerate concurrent calls.
 * The returned report is schema-checked by the pipeline before use.
 */
export interface ValidatorPort {
  validate(request: ValidationRequest): Promise<InteractionReportInput>;
}
