import type { AppError } from './app-error.js';
import type { RuleCatalogError } from '../application/services/rule-engine.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'RuleCatalogInvalid':
      return `${error.message}\n\n${catalogDetail(error.reason)}`;

    default:
      return assertNever(error);
  }
}

function catalogDetail(reason: RuleCatalogError): string {
  switch (reason.code) {
    case 'OVERLAPPING_KINDS':
      return `  - ${reason.kind}: claimed by ${reason.rules[0]} and ${reason.rules[1]}`;
    case 'NON_DETERMINISTIC_KIND':
      return `  - ${reason.kind}: declared by ${reason.rule} but needs generative repair`;
    case 'UNCOVERED_KINDS':
      return reason.kinds.map((kind) => `  - ${kind}: no rule`).join('\n');
    default:
      return assertNever(reason);
  }
}

/**
 * One-line description of a thrown value, for log messages and result reasons.
 */
export function describeCause(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
