export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  RuleCatalogInvalidError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, describeCause } from './formatter.js';
