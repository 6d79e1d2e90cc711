import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { MarkupDocument } from '../../markup/markup-document.js';
import type { MarkupElement } from '../../markup/markup-document.js';
import { applyTextEdits, classAttributeEdit, scanStartTag } from '../../markup/start-tag.js';
import type { TextEdit } from '../../markup/start-tag.js';
import type { Patch, PatchSet } from '../../domain/patches/patch-set.js';
import { applyPatchToClasses, describePatch, isValidClassToken } from '../../domain/patches/patch-set.js';

export type SkipReason = 'NO_MATCH' | 'INVALID_SELECTOR' | 'INVALID_CLASS_TOKEN' | 'NO_EFFECT';

export interface SkippedPatch {
  readonly patch: Patch;
  readonly reason: SkipReason;
  readonly detail?: string;
}

export interface InjectionOutcome {
  readonly document: string;
  /** Patches that changed at least one element. */
  readonly appliedCount: number;
  readonly applied: readonly Patch[];
  readonly skipped: readonly SkippedPatch[];
}

export type PatchApplyError =
  | { readonly code: 'UNLOCATABLE_TAG'; readonly selector: string; readonly message: string }
  | { readonly code: 'STRUCTURE_CHANGED'; readonly message: string };

export interface ElementPreview {
  readonly selector: string;
  readonly tag: string;
  readonly before: readonly string[];
  readonly after: readonly string[];
}

interface PlannedChanges {
  readonly doc: MarkupDocument;
  readonly classes: Map<number, string[]>;
  readonly matchedBy: Map<number, string>;
  readonly applied: Patch[];
  readonly skipped: SkippedPatch[];
}

/**
 * PatchApplier - applies a merged PatchSet to markup as one unit.
 *
 * Only the class attribute inside matched start tags is rewritten; every other
 * byte of the input is carried over. A set that would alter the element tree is
 * rejected whole and the caller keeps its current version.
 */
@singleton()
export class PatchApplier {
  private readonly logger: Logger;

  constructor(@inject(DI.Logging.Factory) loggerFactory: ILoggerFactory) {
    this.logger = loggerFactory.create('PatchApplier');
  }

  inject(document: string, patchSet: PatchSet): Result<InjectionOutcome, PatchApplyError> {
    if (patchSet.patches.length === 0) {
      return ok({ document, appliedCount: 0, applied: [], skipped: [] });
    }

    const plan = this.plan(document, patchSet);
    for (const skipped of plan.skipped) {
      this.logger.debug({ patch: describePatch(skipped.patch), reason: skipped.reason, detail: skipped.detail }, 'Patch skipped');
    }

    const edits: TextEdit[] = [];
    for (const el of plan.doc.elements) {
      const next = plan.classes.get(el.index);
      if (next === undefined || sameTokens(next, el.classes)) continue;

      const tag = scanStartTag(document, el.startIndex);
      if (!tag) {
        return err({
          code: 'UNLOCATABLE_TAG',
          selector: plan.matchedBy.get(el.index) ?? el.tag,
          message: `Could not locate the start tag of <${el.tag}> at offset ${el.startIndex}`,
        });
      }
      const edit = classAttributeEdit(document, tag, next);
      if (edit) edits.push(edit);
    }

    const output = applyTextEdits(document, edits);
    if (output !== document && MarkupDocument.parse(output).shape() !== plan.doc.shape()) {
      this.logger.warn({ edits: edits.length }, 'Patch set altered document structure; rejected');
      return err({ code: 'STRUCTURE_CHANGED', message: 'Applying the patch set changed the element tree' });
    }

    return ok({
      document: output,
      appliedCount: plan.applied.length,
      applied: plan.applied,
      skipped: plan.skipped,
    });
  }

  /** Class changes the set would make, per matched element. Does not modify anything. */
  preview(document: string, patchSet: PatchSet): ElementPreview[] {
    const plan = this.plan(document, patchSet);
    const previews: ElementPreview[] = [];
    for (const el of plan.doc.elements) {
      const next = plan.classes.get(el.index);
      if (next === undefined || sameTokens(next, el.classes)) continue;
      previews.push({ selector: plan.matchedBy.get(el.index) ?? el.tag, tag: el.tag, before: el.classes, after: next });
    }
    return previews;
  }

  private plan(document: string, patchSet: PatchSet): PlannedChanges {
    const doc = MarkupDocument.parse(document);
    const classes = new Map<number, string[]>();
    const matchedBy = new Map<number, string>();
    const applied: Patch[] = [];
    const skipped: SkippedPatch[] = [];

    for (const patch of patchSet.patches) {
      const badToken = [...patch.classesToAdd, ...patch.classesToRemove].find((cls) => !isValidClassToken(cls));
      if (badToken !== undefined) {
        skipped.push({ patch, reason: 'INVALID_CLASS_TOKEN', detail: badToken });
        continue;
      }

      const selected = doc.select(patch.selector);
      if (selected.isErr()) {
        skipped.push({ patch, reason: 'INVALID_SELECTOR', detail: selected.error.message });
        continue;
      }
      const matched = selected.value;
      if (matched.length === 0) {
        skipped.push({ patch, reason: 'NO_MATCH' });
        continue;
      }

      let changed = false;
      for (const el of matched) {
        const before = current(classes, el);
        const after = applyPatchToClasses(before, patch);
        if (!sameTokens(before, after)) changed = true;
        classes.set(el.index, after);
        if (!matchedBy.has(el.index)) matchedBy.set(el.index, patch.selector);
      }

      if (changed) applied.push(patch);
      else skipped.push({ patch, reason: 'NO_EFFECT' });
    }

    return { doc, classes, matchedBy, applied, skipped };
  }
}

function current(classes: Map<number, string[]>, el: MarkupElement): string[] {
  return classes.get(el.index) ?? [...el.classes];
}

function sameTokens(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i]);
}
