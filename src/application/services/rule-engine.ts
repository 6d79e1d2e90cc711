import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ClassifiedError } from '../../domain/defects/classified-error.js';
import type { ErrorKindName } from '../../domain/defects/error-kind.js';
import { ALL_ERROR_KIND_NAMES, DETERMINISTIC_FIXABLE, isDeterministicFixable } from '../../domain/defects/error-kind.js';
import type { PatchSet, PrioritizedPatch } from '../../domain/patches/patch-set.js';
import { buildPatchSet } from '../../domain/patches/patch-set.js';
import type { RepairConfig } from '../../config/app-config.js';
import type { RepairRule } from './rules/index.js';

export type RuleCatalogError =
  | {
      readonly code: 'OVERLAPPING_KINDS';
      readonly kind: ErrorKindName;
      readonly rules: readonly [string, string];
      readonly message: string;
    }
  | { readonly code: 'NON_DETERMINISTIC_KIND'; readonly kind: ErrorKindName; readonly rule: string; readonly message: string }
  | { readonly code: 'UNCOVERED_KINDS'; readonly kinds: readonly ErrorKindName[]; readonly message: string };

/**
 * Validated rule catalog: every deterministic kind has exactly one rule.
 */
export class RuleCatalog {
  private constructor(
    readonly rules: readonly RepairRule[],
    private readonly byKind: ReadonlyMap<ErrorKindName, RepairRule>,
  ) {}

  static create(rules: readonly RepairRule[]): Result<RuleCatalog, RuleCatalogError> {
    const byKind = new Map<ErrorKindName, RepairRule>();

    for (const rule of rules) {
      for (const kind of rule.kinds) {
        const owner = byKind.get(kind);
        if (owner) {
          return err({
            code: 'OVERLAPPING_KINDS',
            kind,
            rules: [owner.id, rule.id],
            message: `Rules '${owner.id}' and '${rule.id}' both declare '${kind}'`,
          });
        }
        if (!DETERMINISTIC_FIXABLE[kind]) {
          return err({
            code: 'NON_DETERMINISTIC_KIND',
            kind,
            rule: rule.id,
            message: `Rule '${rule.id}' declares '${kind}', which is not deterministic-fixable`,
          });
        }
        byKind.set(kind, rule);
      }
    }

    const uncovered = ALL_ERROR_KIND_NAMES.filter((kind) => DETERMINISTIC_FIXABLE[kind] && !byKind.has(kind));
    if (uncovered.length > 0) {
      return err({
        code: 'UNCOVERED_KINDS',
        kinds: uncovered,
        message: `No rule handles: ${uncovered.join(', ')}`,
      });
    }

    const ordered = [...rules].sort((a, b) => a.priority - b.priority);
    return ok(new RuleCatalog(ordered, byKind));
  }

  ruleFor(kind: ErrorKindName): RepairRule | undefined {
    return this.byKind.get(kind);
  }
}

/**
 * RuleEngine - maps deterministic-fixable defects to class patches.
 *
 * Dispatch is a lookup on the defect's kind tag; the catalog guarantees at most
 * one rule per kind. Output is one merged PatchSet in rule-priority order.
 */
@singleton()
export class RuleEngine {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Services.RuleCatalog) private readonly catalog: RuleCatalog,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
  ) {
    this.logger = loggerFactory.create('RuleEngine');
  }

  applyRules(errors: readonly ClassifiedError[], config: RepairConfig): PatchSet {
    const entries: PrioritizedPatch[] = [];
    const fired = new Map<string, number>();

    for (const error of errors) {
      if (!isDeterministicFixable(error.kind)) continue;

      const rule = this.catalog.ruleFor(error.kind.kind);
      if (!rule) {
        this.logger.warn({ kind: error.kind.kind, selector: error.selector }, 'No rule for deterministic kind');
        continue;
      }

      const patches = rule.apply(error, { config });
      for (const patch of patches) entries.push({ patch, priority: rule.priority });
      fired.set(rule.id, (fired.get(rule.id) ?? 0) + 1);
    }

    const patchSet = buildPatchSet(entries);
    this.logger.debug(
      { rules: Object.fromEntries(fired), proposed: entries.length, merged: patchSet.patches.length },
      'Deterministic rules applied',
    );
    return patchSet;
  }
}
