import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import {
  Fixes,
  ROLE_LAYER,
  isPositioned,
  layerClassAbove,
  layerClassFor,
  layerIndexOf,
} from '../../../domain/styling/utility-classes.js';
import type { RepairRule } from './repair-rule.js';
import { staleLayerClasses } from './repair-rule.js';

/**
 * Raises the element above its blocker, or gives it the layer of its role when
 * no blocker is known. Never lowers an existing layer.
 */
function targetLayer(error: ClassifiedError, blockerLayer: number | null, roleLayer: number): string {
  const current = layerIndexOf(error.classes);
  if (blockerLayer !== null) return layerClassAbove(Math.max(blockerLayer, current ?? blockerLayer)).cls;
  if (current !== null && current >= roleLayer) return layerClassAbove(current).cls;
  return layerClassFor(roleLayer);
}

export const stackingFixRule: RepairRule = {
  id: 'stacking-fix',
  priority: 15,
  kinds: ['stacking_conflict', 'stacking_missing'],

  apply(error: ClassifiedError): readonly Patch[] {
    if (error.kind.family !== 'stacking') return [];

    const layer = targetLayer(error, error.kind.blockerLayerIndex, ROLE_LAYER[error.kind.role]);
    const add = isPositioned(error.classes) ? [layer] : [Fixes.relative, layer];

    return [
      createPatch({
        selector: error.selector,
        add,
        remove: staleLayerClasses(error.classes, layer),
        rationale:
          error.kind.kind === 'stacking_conflict'
            ? `Raise above blocking layer ${error.kind.blockerLayerIndex ?? 'auto'}`
            : `Assign ${error.kind.role} layer`,
      }),
    ];
  },
};
