import { describe, it, expect } from 'vitest';
import { DEFAULT_REPAIR_CONFIG, defineRepairConfig, loadConfig } from '../../../src/config/app-config.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('uses the defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'loading config');
    expect(config).toEqual(DEFAULT_REPAIR_CONFIG);
  });

  it('reads every variable', () => {
    const config = expectOk(
      loadConfig({
        env: {
          MARKUP_REPAIR_PASS_BAR: '0.75',
          MARKUP_REPAIR_GLOBAL_COVERAGE: '0.05',
          MARKUP_REPAIR_LOCAL_COVERAGE: '0.4',
          MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS: '5',
          MARKUP_REPAIR_TIMEOUT_MS: '30000',
          MARKUP_REPAIR_ROLLBACK: '0',
          MARKUP_REPAIR_CATASTROPHIC_DROP: '0.5',
          MARKUP_REPAIR_FEEDBACK_MODE: 'strong',
          MARKUP_REPAIR_MAX_ERRORS_PER_CALL: '8',
          MARKUP_REPAIR_GENERATIVE_CONFIDENCE: '0.6',
          MARKUP_REPAIR_MAX_DOCUMENT_BYTES: '4096',
          MARKUP_REPAIR_METRICS_PATH: '/tmp/runs.jsonl',
        },
      }),
      'loading config',
    );

    expect(config).toEqual({
      passBar: 0.75,
      thresholds: { globalCoverage: 0.05, localCoverage: 0.4 },
      maxGenerativeAttempts: 5,
      globalTimeoutMs: 30000,
      enableRollback: false,
      catastrophicDrop: 0.5,
      feedbackMode: 'strong',
      maxErrorsPerGenerativeCall: 8,
      generativeConfidenceThreshold: 0.6,
      maxDocumentBytes: 4096,
      metricsPath: '/tmp/runs.jsonl',
    });
  });

  it('treats blank numeric variables as unset', () => {
    const config = expectOk(loadConfig({ env: { MARKUP_REPAIR_PASS_BAR: '  ' } }), 'loading config');
    expect(config.passBar).toBe(0.9);
  });

  it('reports every invalid variable by name', () => {
    const error = expectErr(
      loadConfig({
        env: {
          MARKUP_REPAIR_PASS_BAR: '1.5',
          MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS: '21',
          MARKUP_REPAIR_FEEDBACK_MODE: 'loud',
        },
      }),
      'loading config',
    );

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues.map((i) => i.path)).toEqual([
      'MARKUP_REPAIR_PASS_BAR',
      'MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS',
      'MARKUP_REPAIR_FEEDBACK_MODE',
    ]);
    expect(error.issues[0]?.message).toBe('must be <= 1');
    expect(error.issues[1]?.message).toBe('cannot exceed 20 attempts');
  });

  it('rejects a non-numeric value', () => {
    const error = expectErr(loadConfig({ env: { MARKUP_REPAIR_TIMEOUT_MS: 'soon' } }), 'loading config');
    expect(error.issues.map((i) => i.path)).toEqual(['MARKUP_REPAIR_TIMEOUT_MS']);
  });

  it('returns a frozen value', () => {
    const config = expectOk(loadConfig({ env: {} }), 'loading config');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.thresholds)).toBe(true);
  });
});

describe('defineRepairConfig', () => {
  it('merges partial thresholds over the defaults', () => {
    const config = expectOk(defineRepairConfig({ thresholds: { localCoverage: 0.5 } }), 'defining config');
    expect(config.thresholds).toEqual({ globalCoverage: 0.02, localCoverage: 0.5 });
  });

  it('builds on a given base', () => {
    const base = expectOk(defineRepairConfig({ feedbackMode: 'strong' }), 'base');
    const config = expectOk(defineRepairConfig({ passBar: 0.8 }, base), 'derived');
    expect([config.feedbackMode, config.passBar]).toEqual(['strong', 0.8]);
  });

  it('applies the same bounds as the environment', () => {
    const error = expectErr(defineRepairConfig({ passBar: 0, thresholds: { globalCoverage: -1 } }), 'defining config');
    expect(error.issues).toEqual([
      { path: 'passBar', message: 'must be > 0' },
      { path: 'thresholds.globalCoverage', message: 'must be >= 0' },
    ]);
  });
});
