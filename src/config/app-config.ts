/**
 * Repair run configuration - parse, don't validate.
 *
 * - One immutable value per run, threaded through every component call
 * - Zod validates at the boundary (env or programmatic overrides)
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { CoverageThresholds } from '../domain/validation/validation-score.js';

export type FeedbackMode = 'standard' | 'strong';

export interface RepairConfig {
  /** Global score at or above which a document passes. */
  readonly passBar: number;
  readonly thresholds: CoverageThresholds;
  readonly maxGenerativeAttempts: number;
  readonly globalTimeoutMs: number;
  readonly enableRollback: boolean;
  /** Drop below the best score that ends the generative loop instead of retrying. */
  readonly catastrophicDrop: number;
  readonly feedbackMode: FeedbackMode;
  readonly maxErrorsPerGenerativeCall: number;
  readonly generativeConfidenceThreshold: number;
  readonly maxDocumentBytes: number;
  /** JSONL metrics destination; null keeps records in memory. */
  readonly metricsPath: string | null;
}

export type ValidatedConfig = ValidatedAppConfig<RepairConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_REPAIR_CONFIG: RepairConfig = Object.freeze({
  passBar: 0.9,
  thresholds: Object.freeze({ globalCoverage: 0.02, localCoverage: 0.3 }),
  maxGenerativeAttempts: 3,
  globalTimeoutMs: 120_000,
  enableRollback: true,
  catastrophicDrop: 0.25,
  feedbackMode: 'standard',
  maxErrorsPerGenerativeCall: 5,
  generativeConfidenceThreshold: 0.7,
  maxDocumentBytes: 2_000_000,
  metricsPath: null,
});

// =============================================================================
// Schema (single source of truth for bounds)
// =============================================================================

const Fraction = z.number().min(0, 'must be >= 0').max(1, 'must be <= 1');

const Fields = {
  passBar: z.number().gt(0, 'must be > 0').max(1, 'must be <= 1'),
  globalCoverage: Fraction,
  localCoverage: Fraction,
  maxGenerativeAttempts: z.number().int().min(0).max(20, 'cannot exceed 20 attempts'),
  globalTimeoutMs: z.number().int().min(1).max(3_600_000, 'cannot exceed 1 hour (3600000ms)'),
  enableRollback: z.boolean(),
  catastrophicDrop: Fraction,
  feedbackMode: z.enum(['standard', 'strong']),
  maxErrorsPerGenerativeCall: z.number().int().min(1).max(50),
  generativeConfidenceThreshold: Fraction,
  maxDocumentBytes: z.number().int().min(1),
  metricsPath: z.string().min(1).nullable(),
} as const;

const RepairConfigSchema = z.object({
  passBar: Fields.passBar,
  thresholds: z.object({ globalCoverage: Fields.globalCoverage, localCoverage: Fields.localCoverage }),
  maxGenerativeAttempts: Fields.maxGenerativeAttempts,
  globalTimeoutMs: Fields.globalTimeoutMs,
  enableRollback: Fields.enableRollback,
  catastrophicDrop: Fields.catastrophicDrop,
  feedbackMode: Fields.feedbackMode,
  maxErrorsPerGenerativeCall: Fields.maxErrorsPerGenerativeCall,
  generativeConfidenceThreshold: Fields.generativeConfidenceThreshold,
  maxDocumentBytes: Fields.maxDocumentBytes,
  metricsPath: Fields.metricsPath,
});

function numberVar(target: z.ZodNumber, fallback: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(target.default(fallback));
}

const EnvSchema = z.object({
  MARKUP_REPAIR_PASS_BAR: numberVar(Fields.passBar, DEFAULT_REPAIR_CONFIG.passBar),
  MARKUP_REPAIR_GLOBAL_COVERAGE: numberVar(Fields.globalCoverage, DEFAULT_REPAIR_CONFIG.thresholds.globalCoverage),
  MARKUP_REPAIR_LOCAL_COVERAGE: numberVar(Fields.localCoverage, DEFAULT_REPAIR_CONFIG.thresholds.localCoverage),
  MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS: numberVar(
    Fields.maxGenerativeAttempts,
    DEFAULT_REPAIR_CONFIG.maxGenerativeAttempts,
  ),
  MARKUP_REPAIR_TIMEOUT_MS: numberVar(Fields.globalTimeoutMs, DEFAULT_REPAIR_CONFIG.globalTimeoutMs),
  MARKUP_REPAIR_ROLLBACK: z.enum(['0', '1']).default('1'),
  MARKUP_REPAIR_CATASTROPHIC_DROP: numberVar(Fields.catastrophicDrop, DEFAULT_REPAIR_CONFIG.catastrophicDrop),
  MARKUP_REPAIR_FEEDBACK_MODE: Fields.feedbackMode.default(DEFAULT_REPAIR_CONFIG.feedbackMode),
  MARKUP_REPAIR_MAX_ERRORS_PER_CALL: numberVar(
    Fields.maxErrorsPerGenerativeCall,
    DEFAULT_REPAIR_CONFIG.maxErrorsPerGenerativeCall,
  ),
  MARKUP_REPAIR_GENERATIVE_CONFIDENCE: numberVar(
    Fields.generativeConfidenceThreshold,
    DEFAULT_REPAIR_CONFIG.generativeConfidenceThreshold,
  ),
  MARKUP_REPAIR_MAX_DOCUMENT_BYTES: numberVar(Fields.maxDocumentBytes, DEFAULT_REPAIR_CONFIG.maxDocumentBytes),
  MARKUP_REPAIR_METRICS_PATH: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type RepairConfigOverrides = Partial<Omit<RepairConfig, 'thresholds'>> & {
  readonly thresholds?: Partial<CoverageThresholds>;
};

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(freezeConfig(buildConfig(parsed.data)));
}

/**
 * Programmatic construction: defaults, then overrides, validated with the same bounds as env parsing.
 */
export function defineRepairConfig(overrides: RepairConfigOverrides = {}, base: RepairConfig = DEFAULT_REPAIR_CONFIG): LoadConfigResult {
  const candidate = {
    ...base,
    ...overrides,
    thresholds: { ...base.thresholds, ...overrides.thresholds },
  };

  const parsed = RepairConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(freezeConfig(parsed.data));
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): RepairConfig {
  return {
    passBar: env.MARKUP_REPAIR_PASS_BAR,
    thresholds: {
      globalCoverage: env.MARKUP_REPAIR_GLOBAL_COVERAGE,
      localCoverage: env.MARKUP_REPAIR_LOCAL_COVERAGE,
    },
    maxGenerativeAttempts: env.MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS,
    globalTimeoutMs: env.MARKUP_REPAIR_TIMEOUT_MS,
    enableRollback: env.MARKUP_REPAIR_ROLLBACK === '1',
    catastrophicDrop: env.MARKUP_REPAIR_CATASTROPHIC_DROP,
    feedbackMode: env.MARKUP_REPAIR_FEEDBACK_MODE,
    maxErrorsPerGenerativeCall: env.MARKUP_REPAIR_MAX_ERRORS_PER_CALL,
    generativeConfidenceThreshold: env.MARKUP_REPAIR_GENERATIVE_CONFIDENCE,
    maxDocumentBytes: env.MARKUP_REPAIR_MAX_DOCUMENT_BYTES,
    metricsPath: env.MARKUP_REPAIR_METRICS_PATH ?? null,
  };
}

function freezeConfig(config: RepairConfig): ValidatedConfig {
  return Object.freeze({ ...config, thresholds: Object.freeze({ ...config.thresholds }) }) as ValidatedConfig;
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
