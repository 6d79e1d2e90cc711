import 'reflect-metadata';
import { container as rootContainer, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError, ConfigInvalidError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { ValidatorPort } from '../ports/validator.port.js';
import type { GenerativeFixerPort } from '../ports/generative-fixer.port.js';
import type { MetricsSinkPort } from '../ports/metrics-sink.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RunIdFactoryPort } from '../ports/run-id.port.js';
import { NodeTimeClock } from '../infra/local/node-time-clock.js';
import { NodeRunIdFactory } from '../infra/local/node-run-id-factory.js';
import { InMemoryMetricsSink } from '../infra/metrics/in-memory-metrics-sink.js';
import { JsonlMetricsSink } from '../infra/metrics/jsonl-metrics-sink.js';
import { Classifier } from '../application/services/classifier.js';
import { RuleCatalog, RuleEngine } from '../application/services/rule-engine.js';
import { PatchApplier } from '../application/services/patch-applier.js';
import { Orchestrator } from '../application/services/orchestrator.js';
import type { RepairRule } from '../application/services/rules/index.js';
import { DEFAULT_RULES } from '../application/services/rules/index.js';

export interface RepairContainerOptions {
  readonly validator: ValidatorPort;
  readonly generativeFixer: GenerativeFixerPort;
  /** Skips env loading when given. */
  readonly config?: ValidatedConfig;
  /** Read only when `config` is absent. Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
  readonly metricsSink?: MetricsSinkPort;
  readonly clock?: TimeClockPort;
  readonly runIds?: RunIdFactoryPort;
  readonly loggerFactory?: ILoggerFactory;
  readonly rules?: readonly RepairRule[];
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITION ROOT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Builds an isolated child container for one pipeline.
 *
 * Every service is registered on the child, so two pipelines built in one process
 * never share collaborators, sinks or config. Startup problems come back as data.
 */
export function createRepairContainer(options: RepairContainerOptions): Result<DependencyContainer, AppError> {
  const log = createBootstrapLogger('container');

  const configResult: Result<ValidatedConfig, ConfigInvalidError> = options.config
    ? ok(options.config)
    : loadConfig({ env: options.env ?? process.env });
  if (configResult.isErr()) {
    log.error({ issues: configResult.error.issues }, 'Configuration rejected');
    return err(configResult.error);
  }
  const config = configResult.value;

  const catalog = RuleCatalog.create(options.rules ?? DEFAULT_RULES);
  if (catalog.isErr()) {
    log.error({ code: catalog.error.code }, 'Rule catalog rejected');
    return err(Err.ruleCatalogInvalid(catalog.error));
  }

  const c = rootContainer.createChildContainer();

  registerConfig(c, config);
  registerPorts(c, options, config);
  c.register(DI.Services.RuleCatalog, { useValue: catalog.value });
  registerServices(c);

  log.debug({ rules: catalog.value.rules.map((r) => r.id), metricsPath: config.metricsPath }, 'Repair container ready');
  return ok(c);
}

/**
 * Convenience: builds a container and resolves the orchestrator from it.
 */
export function createOrchestrator(options: RepairContainerOptions): Result<Orchestrator, AppError> {
  return createRepairContainer(options).map((c) => c.resolve<Orchestrator>(DI.Services.Orchestrator));
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(c: DependencyContainer, config: ValidatedConfig): void {
  c.register<ValidatedConfig>(DI.Config.Repair, { useValue: config });
}

function registerPorts(c: DependencyContainer, options: RepairContainerOptions, config: ValidatedConfig): void {
  c.register<ILoggerFactory>(DI.Logging.Factory, { useValue: options.loggerFactory ?? new PinoLoggerFactory() });
  c.register<ValidatorPort>(DI.Ports.Validator, { useValue: options.validator });
  c.register<GenerativeFixerPort>(DI.Ports.GenerativeFixer, { useValue: options.generativeFixer });
  c.register<TimeClockPort>(DI.Ports.TimeClock, { useValue: options.clock ?? new NodeTimeClock() });
  c.register<RunIdFactoryPort>(DI.Ports.IdFactory, { useValue: options.runIds ?? new NodeRunIdFactory() });

  const sink: MetricsSinkPort =
    options.metricsSink ??
    (config.metricsPath !== null ? new JsonlMetricsSink(config.metricsPath) : new InMemoryMetricsSink());
  c.register<MetricsSinkPort>(DI.Ports.MetricsSink, { useValue: sink });
}

function registerServices(c: DependencyContainer): void {
  // Class registrations live on the child so @singleton() instances are per pipeline.
  c.registerSingleton(Classifier);
  c.registerSingleton(RuleEngine);
  c.registerSingleton(PatchApplier);
  c.registerSingleton(Orchestrator);

  c.register(DI.Services.Classifier, {
    useFactory: instanceCachingFactory((dc) => dc.resolve(Classifier)),
  });
  c.register(DI.Services.RuleEngine, {
    useFactory: instanceCachingFactory((dc) => dc.resolve(RuleEngine)),
  });
  c.register(DI.Services.PatchApplier, {
    useFactory: instanceCachingFactory((dc) => dc.resolve(PatchApplier)),
  });
  c.register(DI.Services.Orchestrator, {
    useFactory: instanceCachingFactory((dc) => dc.resolve(Orchestrator)),
  });
}
