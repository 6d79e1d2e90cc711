import type { Brand } from '../runtime/brand.js';
import type { RuleCatalogError } from '../application/services/rule-engine.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** The rule set handed to the composition root cannot cover the deterministic kinds. */
export type RuleCatalogInvalidError = Readonly<{
  readonly _tag: 'RuleCatalogInvalid';
  readonly reason: RuleCatalogError;
  readonly message: string;
}>;

export type AppError = ConfigInvalidError | RuleCatalogInvalidError;

/**
 * Marks a config object that went through schema parsing.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
