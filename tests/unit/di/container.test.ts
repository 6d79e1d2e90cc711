import { describe, it, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { createOrchestrator, createRepairContainer } from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import { Orchestrator } from '../../../src/application/services/orchestrator.js';
import { RuleEngine } from '../../../src/application/services/rule-engine.js';
import { visibilityRestoreRule } from '../../../src/application/services/rules/index.js';
import { JsonlMetricsSink } from '../../../src/infra/metrics/jsonl-metrics-sink.js';
import { InMemoryMetricsSink } from '../../../src/infra/metrics/in-memory-metrics-sink.js';
import type { MetricsSinkPort } from '../../../src/ports/metrics-sink.port.js';
import type { ValidatedConfig } from '../../../src/config/app-config.js';
import { ScriptedGenerativeFixer, ScriptedValidator, Step, reportWithScore } from '../../fakes/index.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function collaborators() {
  return {
    validator: new ScriptedValidator([Step.report(reportWithScore(1, 1))]),
    generativeFixer: new ScriptedGenerativeFixer(),
    loggerFactory: new FakeLoggerFactory(),
  };
}

describe('createRepairContainer', () => {
  it('resolves the orchestrator by token and by class to the same instance', () => {
    const c = expectOk(createRepairContainer({ ...collaborators(), env: {} }), 'container');

    const byToken = c.resolve<Orchestrator>(DI.Services.Orchestrator);
    expect(byToken).toBeInstanceOf(Orchestrator);
    expect(c.resolve(Orchestrator)).toBe(byToken);
    expect(c.resolve<RuleEngine>(DI.Services.RuleEngine)).toBe(c.resolve(RuleEngine));
  });

  it('keeps two pipelines apart', () => {
    const a = expectOk(createRepairContainer({ ...collaborators(), env: {} }), 'container a');
    const b = expectOk(createRepairContainer({ ...collaborators(), env: {} }), 'container b');

    expect(a.resolve(Orchestrator)).not.toBe(b.resolve(Orchestrator));
    expect(a.resolve<MetricsSinkPort>(DI.Ports.MetricsSink)).not.toBe(b.resolve<MetricsSinkPort>(DI.Ports.MetricsSink));
  });

  it('loads configuration from the given environment', () => {
    const c = expectOk(
      createRepairContainer({ ...collaborators(), env: { MARKUP_REPAIR_MAX_GENERATIVE_ATTEMPTS: '7' } }),
      'container',
    );
    expect(c.resolve<ValidatedConfig>(DI.Config.Repair).maxGenerativeAttempts).toBe(7);
  });

  it('picks the metrics sink from configuration', () => {
    const inMemory = expectOk(createRepairContainer({ ...collaborators(), env: {} }), 'in-memory');
    expect(inMemory.resolve<MetricsSinkPort>(DI.Ports.MetricsSink)).toBeInstanceOf(InMemoryMetricsSink);

    const metricsPath = path.join(os.tmpdir(), 'markup-repair-container', 'runs.jsonl');
    const onDisk = expectOk(
      createRepairContainer({ ...collaborators(), env: { MARKUP_REPAIR_METRICS_PATH: metricsPath } }),
      'jsonl',
    );
    expect(onDisk.resolve<MetricsSinkPort>(DI.Ports.MetricsSink)).toBeInstanceOf(JsonlMetricsSink);
  });

  it('prefers an explicit sink', () => {
    const sink = new InMemoryMetricsSink();
    const c = expectOk(createRepairContainer({ ...collaborators(), env: {}, metricsSink: sink }), 'container');
    expect(c.resolve<MetricsSinkPort>(DI.Ports.MetricsSink)).toBe(sink);
  });

  it('returns configuration problems as data', () => {
    const error = expectErr(createRepairContainer({ ...collaborators(), env: { MARKUP_REPAIR_PASS_BAR: '0' } }), 'container');
    expect(error._tag).toBe('ConfigInvalid');
  });

  it('refuses an incomplete rule catalog', () => {
    const error = expectErr(createRepairContainer({ ...collaborators(), env: {}, rules: [visibilityRestoreRule] }), 'container');
    expect(error._tag).toBe('RuleCatalogInvalid');
    if (error._tag === 'RuleCatalogInvalid') expect(error.reason.code).toBe('UNCOVERED_KINDS');
  });
});

describe('createOrchestrator', () => {
  it('builds a working pipeline', async () => {
    const parts = collaborators();
    const orchestrator = expectOk(createOrchestrator({ ...parts, env: {} }), 'orchestrator');

    const result = await orchestrator.repair('<button id="b" class="hidden">B</button>');

    expect(result.status).toBe('PASS');
    expect(result.finalDocument).toBe('<button id="b" class="block">B</button>');
    expect(parts.validator.calls).toBe(1);
    expect(parts.loggerFactory.getLogger('Orchestrator')?.hasEntry('info', 'Run finished')).toBe(true);
  });
});
