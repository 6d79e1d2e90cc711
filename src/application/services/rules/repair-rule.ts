import type { ClassifiedError } from '../../../domain/defects/classified-error.js';
import type { ErrorKindName } from '../../../domain/defects/error-kind.js';
import type { Patch } from '../../../domain/patches/patch-set.js';
import type { RepairConfig } from '../../../config/app-config.js';
import { baseClasses, isLayerClass } from '../../../domain/styling/utility-classes.js';

export interface RuleContext {
  readonly config: RepairConfig;
}

/**
 * A deterministic repair rule.
 *
 * `apply` is only ever called with errors whose kind is listed in `kinds`, and must
 * then return at least one patch that targets the error's selector.
 */
export interface RepairRule {
  readonly id: string;
  /** Lower runs first. */
  readonly priority: number;
  readonly kinds: readonly ErrorKindName[];
  apply(error: ClassifiedError, ctx: RuleContext): readonly Patch[];
}

/** Layer classes on the element other than `keep`. */
export function staleLayerClasses(classes: readonly string[], keep: string): string[] {
  return baseClasses(classes).filter((cls) => isLayerClass(cls) && cls !== keep);
}
