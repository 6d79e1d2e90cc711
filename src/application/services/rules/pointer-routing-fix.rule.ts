import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import {
  Fixes,
  isPositioned,
  layerClassAbove,
  layerIndexOf,
  pointerRoutingOf,
} from '../../../domain/styling/utility-classes.js';
import { assertNever } from '../../../runtime/assert-never.js';
import type { RepairRule } from './repair-rule.js';
import { staleLayerClasses } from './repair-rule.js';

function unblock(error: ClassifiedError, blockerLayer: number | null): Patch[] {
  const current = layerIndexOf(error.classes) ?? 0;
  const layer = layerClassAbove(Math.max(current, blockerLayer ?? current)).cls;

  const add: string[] = [];
  if (pointerRoutingOf(error.classes) !== 'auto') add.push(Fixes.pointerAuto);
  if (!isPositioned(error.classes)) add.push(Fixes.relative);
  add.push(layer);

  const patches = [
    createPatch({
      selector: error.selector,
      add,
      remove: staleLayerClasses(error.classes, layer),
      rationale: 'Route pointer events to the element and lift it above its blocker',
    }),
  ];

  if (error.blockingElement !== null) {
    patches.push(
      createPatch({
        selector: error.blockingElement,
        add: [Fixes.pointerNone],
        remove: [Fixes.pointerAuto],
        rationale: 'Make blocking overlay pass-through',
      }),
    );
  }
  return patches;
}

export const pointerRoutingFixRule: RepairRule = {
  id: 'pointer-routing-fix',
  priority: 25,
  kinds: ['pointer_blocked', 'pointer_intercepted'],

  apply(error: ClassifiedError): readonly Patch[] {
    if (error.kind.family !== 'pointer_routing') return [];

    switch (error.kind.kind) {
      case 'pointer_blocked':
        return unblock(error, error.kind.blockerLayerIndex);
      case 'pointer_intercepted':
        return [
          createPatch({
            selector: error.selector,
            add: [Fixes.pointerAuto],
            remove: [Fixes.pointerNone],
            rationale: 'Override inherited pointer-events-none',
          }),
        ];
      case 'decorative_overlay':
        return [];
      default:
        return assertNever(error.kind);
    }
  },
};
