import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import { Fixes } from '../../../domain/styling/utility-classes.js';
import type { RepairRule } from './repair-rule.js';

/**
 * Targets the overlay itself: decorative layers must never take pointer input.
 */
export const passthroughRule: RepairRule = {
  id: 'passthrough',
  priority: 26,
  kinds: ['decorative_overlay'],

  apply(error: ClassifiedError): readonly Patch[] {
    if (error.kind.kind !== 'decorative_overlay') return [];
    const victim = error.kind.victim;
    return [
      createPatch({
        selector: error.selector,
        add: [Fixes.pointerNone],
        remove: [Fixes.pointerAuto],
        rationale: victim ? `Decorative overlay covers ${victim}` : 'Decorative overlay',
      }),
    ];
  },
};
