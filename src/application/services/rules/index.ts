import type { RepairRule } from './repair-rule.js';
import { visibilityRestoreRule } from './visibility-restore.rule.js';
import { stackingFixRule } from './stacking-fix.rule.js';
import { pointerRoutingFixRule } from './pointer-routing-fix.rule.js';
import { passthroughRule } from './passthrough.rule.js';
import { spatialTransformFixRule } from './spatial-transform-fix.rule.js';
import { feedbackAmplifierRule } from './feedback-amplifier.rule.js';

export type { RepairRule, RuleContext } from './repair-rule.js';
export {
  visibilityRestoreRule,
  stackingFixRule,
  pointerRoutingFixRule,
  passthroughRule,
  spatialTransformFixRule,
  feedbackAmplifierRule,
};

export const DEFAULT_RULES: readonly RepairRule[] = [
  visibilityRestoreRule,
  stackingFixRule,
  pointerRoutingFixRule,
  passthroughRule,
  spatialTransformFixRule,
  feedbackAmplifierRule,
];
