import { singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { MarkupDocument } from '../../markup/markup-document.js';
import type { MarkupElement } from '../../markup/markup-document.js';
import { SelectorBuilder } from '../../markup/selector-builder.js';
import type { ClassifiedError } from '../../domain/defects/classified-error.js';
import { classifiedError, EMPTY_STYLE, withEvidence } from '../../domain/defects/classified-error.js';
import type { ErrorKind } from '../../domain/defects/error-kind.js';
import type { ElementOutcome, InteractionReport } from '../../domain/validation/interaction-report.js';
import { computeValidationScore, failingSelectors } from '../../domain/validation/validation-score.js';
import { hasFeedbackClasses, layerIndexOf, styleSnapshotOf } from '../../domain/styling/utility-classes.js';
import type { RepairConfig } from '../../config/app-config.js';
import { describeCause } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';
import { discoverInteractive } from './classification/interactive-elements.js';
import type { DetectionContext } from './classification/static-detectors.js';
import {
  coveringOverlays,
  detectDecorativeOverlays,
  detectMissingReferences,
  detectPointerBlocked,
  detectPointerIntercepted,
  detectStacking,
  detectTransforms,
  detectVisibility,
} from './classification/static-detectors.js';

export type ClassificationError = {
  readonly code: 'EMPTY_DOCUMENT' | 'DOCUMENT_TOO_LARGE' | 'ANALYSIS_FAILED';
  readonly message: string;
};

/**
 * Classifier - turns a document (and, after a fix attempt, the interaction report
 * for it) into the list of defects to repair.
 *
 * Pure: same markup, report and config always give the same list.
 */
@singleton()
export class Classifier {
  classify(
    markup: string,
    report: InteractionReport | null,
    config: RepairConfig,
  ): Result<readonly ClassifiedError[], ClassificationError> {
    if (markup.trim().length === 0) {
      return err({ code: 'EMPTY_DOCUMENT', message: 'Document is empty' });
    }
    const bytes = Buffer.byteLength(markup, 'utf8');
    if (bytes > config.maxDocumentBytes) {
      return err({
        code: 'DOCUMENT_TOO_LARGE',
        message: `Document is ${bytes} bytes; limit is ${config.maxDocumentBytes}`,
      });
    }

    try {
      return ok(this.analyze(markup, report, config));
    } catch (e) {
      return err({ code: 'ANALYSIS_FAILED', message: describeCause(e) });
    }
  }

  private analyze(markup: string, report: InteractionReport | null, config: RepairConfig): ClassifiedError[] {
    const doc = MarkupDocument.parse(markup);
    const ctx: DetectionContext = { doc, selectors: new SelectorBuilder(doc) };
    const interactive = discoverInteractive(doc);
    const overlays = coveringOverlays(doc);

    const errors: ClassifiedError[] = [];
    const byElement = new Map<number, number[]>();
    const record = (el: MarkupElement, error: ClassifiedError): void => {
      byElement.set(el.index, [...(byElement.get(el.index) ?? []), errors.length]);
      errors.push(error);
    };

    for (const el of interactive) {
      for (const found of detectVisibility(ctx, el)) record(el, found);

      const blocked = detectPointerBlocked(ctx, el, overlays);
      if (blocked) record(el, blocked);

      const intercepted = detectPointerIntercepted(ctx, el);
      if (intercepted) record(el, intercepted);

      if (!blocked) {
        const stacking = detectStacking(ctx, el);
        if (stacking) record(el, stacking);
      }

      for (const found of detectTransforms(ctx, el)) record(el, found);
    }

    errors.push(...detectDecorativeOverlays(ctx, overlays, interactive));
    errors.push(...detectMissingReferences(ctx));

    if (report === null) return errors;

    const failing = failingSelectors(computeValidationScore(report, config.thresholds, config.passBar));
    for (const outcome of report.elements) {
      if (!failing.has(outcome.selector)) continue;

      const el = doc.select(outcome.selector).match(
        (matched) => matched[0] ?? null,
        () => null,
      );
      const known = el ? byElement.get(el.index) : undefined;

      if (known && known.length > 0) {
        for (const position of known) {
          const existing = errors[position];
          if (existing) errors[position] = withEvidence(existing, 'static_and_rendered');
        }
        continue;
      }

      errors.push(this.attributeRendered(ctx, outcome, el));
    }

    for (const message of report.scriptErrors) {
      errors.push(
        classifiedError({
          kind: { family: 'script_fault', kind: 'script_runtime_error', message },
          selector: 'script',
          elementTag: 'script',
          classes: [],
          style: EMPTY_STYLE,
          evidence: 'rendered',
          rationale: `Script error during interaction: ${message}`,
        }),
      );
    }

    return errors;
  }

  /** A failed interaction with no structural explanation. */
  private attributeRendered(ctx: DetectionContext, outcome: ElementOutcome, el: MarkupElement | null): ClassifiedError {
    const classes = el?.classes ?? [];
    const kind = renderedKind(ctx, outcome, classes);

    return classifiedError({
      kind,
      selector: el ? ctx.selectors.selectorFor(el) : outcome.selector,
      elementTag: el?.tag ?? 'unknown',
      classes,
      style: { ...(el ? styleSnapshotOf(classes) : EMPTY_STYLE), boundingBox: outcome.boundingBox },
      blockingElement: kind.kind === 'pointer_blocked' ? outcome.blockingElement : null,
      evidence: 'rendered',
      rationale: `Interaction reported ${outcome.status} (global ${formatCoverage(outcome.globalCoverage)}, local ${formatCoverage(outcome.localCoverage)})`,
    });
  }
}

function renderedKind(ctx: DetectionContext, outcome: ElementOutcome, classes: readonly string[]): ErrorKind {
  switch (outcome.status) {
    case 'intercepted': {
      const blocker = outcome.blockingElement
        ? ctx.doc.select(outcome.blockingElement).match(
            (matched) => matched[0] ?? null,
            () => null,
          )
        : null;
      return {
        family: 'pointer_routing',
        kind: 'pointer_blocked',
        blockerLayerIndex: blocker ? layerIndexOf(blocker.classes) : null,
        victim: null,
      };
    }
    case 'responsive':
    case 'no_visual_change': {
      const measured = outcome.globalCoverage > 0 || outcome.localCoverage > 0;
      return {
        family: 'feedback_intensity',
        kind: measured || hasFeedbackClasses(classes) ? 'feedback_too_subtle' : 'feedback_missing',
        globalCoverage: outcome.globalCoverage,
        localCoverage: outcome.localCoverage,
      };
    }
    case 'timeout':
    case 'error':
    case 'not_tested':
      return { family: 'unknown', kind: 'unknown', reason: `Interaction ${outcome.status}` };
    default:
      return assertNever(outcome.status);
  }
}

function formatCoverage(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
