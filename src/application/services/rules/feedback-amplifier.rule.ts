import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import { createPatch } from '../../../domain/patches/patch-set.js';
import { FEEDBACK_CLASSES, isActiveIntensityClass } from '../../../domain/styling/utility-classes.js';
import type { RepairRule, RuleContext } from './repair-rule.js';

export const feedbackAmplifierRule: RepairRule = {
  id: 'feedback-amplifier',
  priority: 50,
  kinds: ['feedback_too_subtle'],

  apply(error: ClassifiedError, ctx: RuleContext): readonly Patch[] {
    if (error.kind.kind !== 'feedback_too_subtle') return [];

    const add: readonly string[] = FEEDBACK_CLASSES[ctx.config.feedbackMode];
    return [
      createPatch({
        selector: error.selector,
        add,
        remove: error.classes.filter((cls) => isActiveIntensityClass(cls) && !add.includes(cls)),
        rationale: `Amplify active-state feedback (${ctx.config.feedbackMode})`,
      }),
    ];
  },
};
