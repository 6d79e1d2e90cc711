import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import { Fixes } from '../../../domain/styling/utility-classes.js';
import type { RepairRule } from './repair-rule.js';

const RESTORE = {
  invisible_opacity: Fixes.opacityFull,
  invisible_display: Fixes.displayBlock,
  invisible_visibility: Fixes.visible,
} as const;

export const visibilityRestoreRule: RepairRule = {
  id: 'visibility-restore',
  priority: 5,
  kinds: ['invisible_opacity', 'invisible_display', 'invisible_visibility'],

  apply(error: ClassifiedError): readonly Patch[] {
    if (error.kind.family !== 'visibility') return [];
    return [
      createPatch({
        selector: error.selector,
        add: [RESTORE[error.kind.kind]],
        remove: error.kind.suppressingClasses,
        rationale: `Restore visibility (${error.kind.kind})`,
      }),
    ];
  },
};
