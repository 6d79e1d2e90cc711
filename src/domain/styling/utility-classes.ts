/**
 * Utility-class vocabulary: reading layout facts from class tokens and the
 * replacement classes the deterministic rules write.
 *
 * Only unprefixed tokens count as base state; `md:hidden` or `hover:z-50`
 * describe a variant, not the element at rest.
 */

import type { LayerRole } from '../defects/error-kind.js';
import type { PointerRouting, StyleSnapshot } from '../defects/classified-error.js';

// =============================================================================
// Replacement classes
// =============================================================================

export const Fixes = {
  pointerNone: 'pointer-events-none',
  pointerAuto: 'pointer-events-auto',
  relative: 'relative',
  opacityFull: 'opacity-100',
  displayBlock: 'block',
  visible: 'visible',
  preserve3d: '[transform-style:preserve-3d]',
  perspective: '[perspective:1000px]',
  backfaceHidden: '[backface-visibility:hidden]',
  backfaceVisible: '[backface-visibility:visible]',
  translateXReset: 'translate-x-0',
  translateYReset: 'translate-y-0',
} as const;

/** Active-state classes per feedback mode. */
export const FEEDBACK_CLASSES = {
  standard: ['active:scale-95', 'active:brightness-75'],
  strong: ['active:scale-95', 'active:brightness-75', 'transition-all', 'duration-150', 'focus:ring-4', 'focus:ring-blue-500'],
} as const;

/** Stacking scale in ascending order. */
const LAYER_SCALE: readonly { readonly value: number; readonly cls: string }[] = [
  { value: 0, cls: 'z-0' },
  { value: 10, cls: 'z-10' },
  { value: 20, cls: 'z-20' },
  { value: 30, cls: 'z-30' },
  { value: 40, cls: 'z-40' },
  { value: 50, cls: 'z-50' },
  { value: 100, cls: 'z-[100]' },
  { value: 9999, cls: 'z-[9999]' },
];

export const ROLE_LAYER: Readonly<Record<LayerRole, number>> = {
  content: 10,
  overlay: 40,
  dialog: 50,
};

/** Layer index at which a positioned element is treated as a potential blocker. */
export const BLOCKER_LAYER_MIN = 40;

export function layerClassFor(value: number): string {
  return LAYER_SCALE.find((step) => step.value === value)?.cls ?? `z-[${value}]`;
}

/** First scale step strictly above `value`. */
export function layerClassAbove(value: number): { readonly value: number; readonly cls: string } {
  return LAYER_SCALE.find((step) => step.value > value) ?? { value: value + 1, cls: `z-[${value + 1}]` };
}

// =============================================================================
// Reading classes
// =============================================================================

export function baseClasses(classes: readonly string[]): string[] {
  return classes.filter((cls) => !cls.includes(':') || (cls.startsWith('[') && cls.endsWith(']')));
}

const LAYER_CLASS = /^(-?)z-(\d+|\[(-?\d+)\])$/;

export function isLayerClass(cls: string): boolean {
  return LAYER_CLASS.test(cls);
}

/** Last layer class wins, as in the generated stylesheet order. */
export function layerIndexOf(classes: readonly string[]): number | null {
  let found: number | null = null;
  for (const cls of baseClasses(classes)) {
    const m = LAYER_CLASS.exec(cls);
    if (!m) continue;
    const raw = m[3] ?? m[2] ?? '';
    const value = Number(raw.replace(/[[\]]/g, ''));
    if (Number.isFinite(value)) found = m[1] === '-' ? -value : value;
  }
  return found;
}

export type Positioning = 'static' | 'relative' | 'absolute' | 'fixed' | 'sticky';

export function positioningOf(classes: readonly string[]): Positioning {
  let position: Positioning = 'static';
  for (const cls of baseClasses(classes)) {
    if (cls === 'relative' || cls === 'absolute' || cls === 'fixed' || cls === 'sticky' || cls === 'static') {
      position = cls;
    }
  }
  return position;
}

export function isPositioned(classes: readonly string[]): boolean {
  return positioningOf(classes) !== 'static';
}

export function pointerRoutingOf(classes: readonly string[]): PointerRouting {
  let routing: PointerRouting = 'inherit';
  for (const cls of baseClasses(classes)) {
    if (cls === Fixes.pointerNone) routing = 'none';
    if (cls === Fixes.pointerAuto) routing = 'auto';
  }
  return routing;
}

/** Covers its containing block: `inset-0` or all four edges pinned. */
export function coversContainer(classes: readonly string[]): boolean {
  const base = new Set(baseClasses(classes));
  if (base.has('inset-0')) return true;
  const x = base.has('inset-x-0') || (base.has('left-0') && base.has('right-0'));
  const y = base.has('inset-y-0') || (base.has('top-0') && base.has('bottom-0'));
  return x && y;
}

export function opacityOf(classes: readonly string[]): number {
  let opacity = 1;
  for (const cls of baseClasses(classes)) {
    const m = /^opacity-(\d+)$/.exec(cls);
    if (m) opacity = Number(m[1]) / 100;
  }
  return opacity;
}

const ROTATE_Y = /^(rotate-y-180|\[transform:rotateY\(180deg\)\]|\[transform:rotateY\(-180deg\)\]|-rotate-y-180)$/;
const TRANSLATE = /^-?translate-[xy]-(.+)$/;

export function transformClassesOf(classes: readonly string[]): string[] {
  return baseClasses(classes).filter(
    (cls) => ROTATE_Y.test(cls) || TRANSLATE.test(cls) || cls.startsWith('[transform') || cls.startsWith('[backface'),
  );
}

export function hasRotateY(classes: readonly string[]): boolean {
  return baseClasses(classes).some((cls) => ROTATE_Y.test(cls));
}

export function isTranslateClass(cls: string): boolean {
  return TRANSLATE.test(cls);
}

/**
 * A translate that moves an element by at least its own size or the viewport:
 * `full`, ≥100vw/vh/% or ≥1000px.
 */
export function isOffscreenTranslate(cls: string): boolean {
  const m = TRANSLATE.exec(cls);
  if (!m) return false;
  const amount = m[1] ?? '';
  if (amount === 'full') return true;
  const arbitrary = /^\[(-?\d+(?:\.\d+)?)(px|vw|vh|%)\]$/.exec(amount);
  if (!arbitrary) return false;
  const value = Math.abs(Number(arbitrary[1]));
  return arbitrary[2] === 'px' ? value >= 1000 : value >= 100;
}

const FEEDBACK_PREFIXES = ['active:', 'hover:', 'focus:', 'focus-visible:'];

export function hasFeedbackClasses(classes: readonly string[]): boolean {
  return classes.some((cls) => FEEDBACK_PREFIXES.some((p) => cls.startsWith(p)) || cls.startsWith('transition'));
}

/** Weaker active-state classes the amplifier replaces. */
export function isActiveIntensityClass(cls: string): boolean {
  return /^active:(scale|brightness|opacity)-/.test(cls);
}

export function styleSnapshotOf(classes: readonly string[]): StyleSnapshot {
  const base = new Set(baseClasses(classes));
  const transform = transformClassesOf(classes);
  return {
    opacity: opacityOf(classes),
    layerIndex: layerIndexOf(classes),
    display: base.has('hidden') ? 'none' : 'visible',
    visibility: base.has('invisible') ? 'hidden' : 'visible',
    pointerRouting: pointerRoutingOf(classes),
    transform: transform.length > 0 ? transform.join(' ') : null,
    boundingBox: null,
  };
}
