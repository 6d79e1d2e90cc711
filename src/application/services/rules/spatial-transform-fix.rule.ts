import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import { Fixes, baseClasses, isTranslateClass } from '../../../domain/styling/utility-classes.js';
import type { RepairRule } from './repair-rule.js';

const TRANSLATE_RESETS: readonly string[] = [Fixes.translateXReset, Fixes.translateYReset];

export const spatialTransformFixRule: RepairRule = {
  id: 'spatial-transform-fix',
  priority: 30,
  kinds: ['transform_backface', 'transform_offscreen'],

  apply(error: ClassifiedError): readonly Patch[] {
    if (error.kind.family !== 'spatial_transform') return [];

    if (error.kind.kind === 'transform_offscreen') {
      return [
        createPatch({
          selector: error.selector,
          add: TRANSLATE_RESETS,
          remove: baseClasses(error.classes).filter((cls) => isTranslateClass(cls) && !TRANSLATE_RESETS.includes(cls)),
          rationale: 'Move the element back into its visible area',
        }),
      ];
    }

    const patches: Patch[] = [];
    if (error.kind.container !== null) {
      patches.push(
        createPatch({
          selector: error.kind.container,
          add: [Fixes.preserve3d, Fixes.perspective],
          rationale: 'Give the flipped face a 3-D rendering context',
        }),
      );
    }
    patches.push(
      createPatch({
        selector: error.selector,
        add: [Fixes.backfaceVisible],
        remove: [Fixes.backfaceHidden],
        rationale: 'Show the rotated face',
      }),
    );
    return patches;
  },
};
