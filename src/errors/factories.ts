import type { AppError, ConfigIssue, ConfigInvalidError, RuleCatalogInvalidError } from './app-error.js';
import type { RuleCatalogError } from '../application/services/rule-engine.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid repair configuration',
  }),

  ruleCatalogInvalid: (reason: RuleCatalogError): RuleCatalogInvalidError => ({
    _tag: 'RuleCatalogInvalid',
    reason,
    message: 'Invalid repair rule catalog',
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
