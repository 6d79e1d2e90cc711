/**
 * Structural defect detection from markup alone (no rendering).
 * Everything here yields `static` evidence.
 */

import type { MarkupDocument, MarkupElement } from '../../../markup/markup-document.js';
import type { SelectorBuilder } from '../../../markup/selector-builder.js';
import type { ClassifiedError, ClassifiedErrorInput } from '../../../domain/defects/classified-error.js';
import { classifiedError } from '../../../domain/defects/classified-error.js';
import type { LayerRole } from '../../../domain/defects/error-kind.js';
import {
  BLOCKER_LAYER_MIN,
  Fixes,
  baseClasses,
  coversContainer,
  hasRotateY,
  isOffscreenTranslate,
  layerIndexOf,
  pointerRoutingOf,
  positioningOf,
  styleSnapshotOf,
} from '../../../domain/styling/utility-classes.js';
import { hasInteractiveDescendant } from './interactive-elements.js';

export interface DetectionContext {
  readonly doc: MarkupDocument;
  readonly selectors: SelectorBuilder;
}

function staticError(
  ctx: DetectionContext,
  el: MarkupElement,
  input: Pick<ClassifiedErrorInput, 'kind' | 'rationale'> & { readonly blocker?: MarkupElement },
): ClassifiedError {
  return classifiedError({
    kind: input.kind,
    selector: ctx.selectors.selectorFor(el),
    elementTag: el.tag,
    classes: el.classes,
    style: styleSnapshotOf(el.classes),
    blockingElement: input.blocker ? ctx.selectors.selectorFor(input.blocker) : null,
    evidence: 'static',
    rationale: input.rationale,
  });
}

// =============================================================================
// Visibility
// =============================================================================

export function detectVisibility(ctx: DetectionContext, el: MarkupElement): ClassifiedError[] {
  const base = new Set(baseClasses(el.classes));
  const found: ClassifiedError[] = [];

  if (base.has('opacity-0')) {
    found.push(
      staticError(ctx, el, {
        kind: { family: 'visibility', kind: 'invisible_opacity', suppressingClasses: ['opacity-0'] },
        rationale: 'Element is fully transparent',
      }),
    );
  }
  if (base.has('hidden')) {
    found.push(
      staticError(ctx, el, {
        kind: { family: 'visibility', kind: 'invisible_display', suppressingClasses: ['hidden'] },
        rationale: 'Element is not displayed',
      }),
    );
  }
  if (base.has('invisible')) {
    found.push(
      staticError(ctx, el, {
        kind: { family: 'visibility', kind: 'invisible_visibility', suppressingClasses: ['invisible'] },
        rationale: 'Element has visibility hidden',
      }),
    );
  }
  return found;
}

// =============================================================================
// Overlays and pointer routing
// =============================================================================

/** Effective paint layer: unpositioned content sits below any positioned layer. */
function paintLayer(el: MarkupElement): number {
  return positioningOf(el.classes) === 'static' ? -1 : layerIndexOf(el.classes) ?? 0;
}

function isCoveringOverlay(el: MarkupElement): boolean {
  const position = positioningOf(el.classes);
  return (position === 'absolute' || position === 'fixed') && coversContainer(el.classes) && pointerRoutingOf(el.classes) !== 'none';
}

function containingBlock(doc: MarkupDocument, el: MarkupElement): MarkupElement | null {
  if (positioningOf(el.classes) === 'fixed') return null;
  return doc.ancestors(el).find((a) => positioningOf(a.classes) !== 'static') ?? null;
}

/** True when `overlay` paints over `el` and covers the area `el` lives in. */
export function overlayBlocks(doc: MarkupDocument, overlay: MarkupElement, el: MarkupElement): boolean {
  if (overlay === el || doc.isAncestorOf(overlay, el) || doc.isAncestorOf(el, overlay)) return false;

  const block = containingBlock(doc, overlay);
  if (block !== null && block !== el && !doc.isAncestorOf(block, el)) return false;

  const overlayLayer = paintLayer(overlay);
  const elLayer = paintLayer(el);
  return overlayLayer > elLayer || (overlayLayer === elLayer && overlay.index > el.index);
}

export function coveringOverlays(doc: MarkupDocument): MarkupElement[] {
  return doc.elements.filter(isCoveringOverlay);
}

/** The topmost overlay blocking `el`, if any. */
export function findBlockingOverlay(doc: MarkupDocument, overlays: readonly MarkupElement[], el: MarkupElement): MarkupElement | null {
  const blocking = overlays.filter((overlay) => overlayBlocks(doc, overlay, el));
  if (blocking.length === 0) return null;
  return blocking.reduce((top, candidate) => (paintLayer(candidate) > paintLayer(top) ? candidate : top));
}

export function detectPointerBlocked(
  ctx: DetectionContext,
  el: MarkupElement,
  overlays: readonly MarkupElement[],
): ClassifiedError | null {
  const blocker = findBlockingOverlay(ctx.doc, overlays, el);
  if (!blocker) return null;
  return staticError(ctx, el, {
    kind: { family: 'pointer_routing', kind: 'pointer_blocked', blockerLayerIndex: layerIndexOf(blocker.classes), victim: null },
    rationale: `Covered by an overlay at layer ${layerIndexOf(blocker.classes) ?? 'auto'}`,
    blocker,
  });
}

export function detectPointerIntercepted(ctx: DetectionContext, el: MarkupElement): ClassifiedError | null {
  if (pointerRoutingOf(el.classes) === 'auto') return null;
  for (const ancestor of ctx.doc.ancestors(el)) {
    const routing = pointerRoutingOf(ancestor.classes);
    if (routing === 'auto') return null;
    if (routing === 'none') {
      return staticError(ctx, el, {
        kind: { family: 'pointer_routing', kind: 'pointer_intercepted', blockerLayerIndex: null, victim: null },
        rationale: 'An ancestor disables pointer events',
      });
    }
  }
  return null;
}

/**
 * Decorative overlays (no interactive content, no text) that block at least one interactive element.
 */
export function detectDecorativeOverlays(
  ctx: DetectionContext,
  overlays: readonly MarkupElement[],
  interactive: readonly MarkupElement[],
): ClassifiedError[] {
  const found: ClassifiedError[] = [];
  for (const overlay of overlays) {
    if (hasInteractiveDescendant(ctx.doc, overlay) || ctx.doc.textOf(overlay).trim().length > 0) continue;
    const victim = interactive.find((el) => overlayBlocks(ctx.doc, overlay, el));
    if (!victim) continue;
    found.push(
      staticError(ctx, overlay, {
        kind: {
          family: 'pointer_routing',
          kind: 'decorative_overlay',
          blockerLayerIndex: layerIndexOf(overlay.classes),
          victim: ctx.selectors.selectorFor(victim),
        },
        rationale: 'Decorative overlay intercepts clicks meant for content beneath it',
      }),
    );
  }
  return found;
}

// =============================================================================
// Stacking
// =============================================================================

function roleOf(doc: MarkupDocument, el: MarkupElement): LayerRole {
  const inDialog = [el, ...doc.ancestors(el)].some(
    (e) => e.attributes['role'] === 'dialog' || e.attributes['role'] === 'alertdialog' || e.attributes['aria-modal'] === 'true' || e.tag === 'dialog',
  );
  if (inDialog) return 'dialog';
  return isCoveringOverlay(el) ? 'overlay' : 'content';
}

export function detectStacking(ctx: DetectionContext, el: MarkupElement): ClassifiedError | null {
  const elLayer = paintLayer(el);
  const siblings = ctx.doc.siblings(el);

  const blocker = siblings.find((s) => {
    const position = positioningOf(s.classes);
    const z = layerIndexOf(s.classes);
    return (
      (position === 'absolute' || position === 'fixed') &&
      z !== null &&
      z >= BLOCKER_LAYER_MIN &&
      z > elLayer &&
      pointerRoutingOf(s.classes) !== 'none'
    );
  });

  if (blocker) {
    const blockerLayer = layerIndexOf(blocker.classes);
    return staticError(ctx, el, {
      kind: { family: 'stacking', kind: 'stacking_conflict', role: roleOf(ctx.doc, el), blockerLayerIndex: blockerLayer },
      rationale: `A positioned sibling at layer ${blockerLayer ?? 'auto'} stacks above the element`,
      blocker,
    });
  }

  const position = positioningOf(el.classes);
  if (
    (position === 'absolute' || position === 'fixed') &&
    layerIndexOf(el.classes) === null &&
    siblings.some((s) => layerIndexOf(s.classes) !== null)
  ) {
    return staticError(ctx, el, {
      kind: { family: 'stacking', kind: 'stacking_missing', role: roleOf(ctx.doc, el), blockerLayerIndex: null },
      rationale: 'Positioned element has no layer index while its siblings do',
    });
  }

  return null;
}

// =============================================================================
// Spatial transforms
// =============================================================================

export function detectTransforms(ctx: DetectionContext, el: MarkupElement): ClassifiedError[] {
  const found: ClassifiedError[] = [];
  const base = baseClasses(el.classes);
  const parent = ctx.doc.parent(el);

  if (base.includes(Fixes.backfaceHidden) && hasRotateY(el.classes)) {
    const parentHas3d = parent !== null && parent.classes.includes(Fixes.preserve3d);
    if (!parentHas3d) {
      found.push(
        staticError(ctx, el, {
          kind: {
            family: 'spatial_transform',
            kind: 'transform_backface',
            offendingClasses: base.filter((cls) => cls === Fixes.backfaceHidden || hasRotateY([cls])),
            container: parent ? ctx.selectors.selectorFor(parent) : null,
          },
          rationale: 'Rotated face with hidden backface and no 3-D context on its container',
        }),
      );
    }
  }

  const offscreen = base.filter(isOffscreenTranslate);
  if (offscreen.length > 0) {
    found.push(
      staticError(ctx, el, {
        kind: { family: 'spatial_transform', kind: 'transform_offscreen', offendingClasses: offscreen, container: null },
        rationale: 'Translated out of its visible area',
      }),
    );
  }

  return found;
}

// =============================================================================
// Script references
// =============================================================================

const ID_REFERENCES = [
  /getElementById\(\s*(['"`])([^'"`]+)\1\s*\)/g,
  /querySelector(?:All)?\(\s*(['"`])#([A-Za-z_][\w-]*)\1\s*\)/g,
];

export function detectMissingReferences(ctx: DetectionContext): ClassifiedError[] {
  const ids = new Set(ctx.doc.elements.flatMap((el) => (el.attributes['id'] ? [el.attributes['id']] : [])));
  const found: ClassifiedError[] = [];

  for (const { element, body } of ctx.doc.inlineScripts()) {
    const missing = new Set<string>();
    for (const pattern of ID_REFERENCES) {
      for (const match of body.matchAll(pattern)) {
        const id = match[2];
        if (id !== undefined && !ids.has(id)) missing.add(id);
      }
    }
    for (const id of missing) {
      found.push(
        staticError(ctx, element, {
          kind: { family: 'script_fault', kind: 'script_missing_reference', message: `No element with id "${id}"` },
          rationale: `Script references missing element #${id}`,
        }),
      );
    }
  }

  return found;
}
