import 'reflect-metadata';

// Composition root
export { createRepairContainer, createOrchestrator } from './di/container.js';
export type { RepairContainerOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, defineRepairConfig, DEFAULT_REPAIR_CONFIG } from './config/app-config.js';
export type { RepairConfig, RepairConfigOverrides, ValidatedConfig, FeedbackMode } from './config/app-config.js';

// Pipeline services
export { Orchestrator } from './application/services/orchestrator.js';
export type { OrchestratorResult, RepairOptions } from './application/services/orchestrator.js';
export { Classifier } from './application/services/classifier.js';
export type { ClassificationError } from './application/services/classifier.js';
export { RuleEngine, RuleCatalog } from './application/services/rule-engine.js';
export type { RuleCatalogError } from './application/services/rule-engine.js';
export { PatchApplier } from './application/services/patch-applier.js';
export type { InjectionOutcome, PatchApplyError, SkippedPatch, SkipReason, ElementPreview } from './application/services/patch-applier.js';
export { DEFAULT_RULES } from './application/services/rules/index.js';
export type { RepairRule, RuleContext } from './application/services/rules/index.js';

// Domain
export type { ClassifiedError, Confidence, Evidence, StyleSnapshot } from './domain/defects/classified-error.js';
export type { ErrorKind, ErrorKindName, ErrorFamily } from './domain/defects/error-kind.js';
export { isDeterministicFixable, ALL_ERROR_KIND_NAMES } from './domain/defects/error-kind.js';
export type { Patch, PatchSet } from './domain/patches/patch-set.js';
export { createPatch, buildPatchSet, mergePatches, EMPTY_PATCH_SET } from './domain/patches/patch-set.js';
export { PatchProposalSchema, parsePatchProposal } from './domain/patches/patch-schema.js';
export { InteractionReportSchema } from './domain/validation/interaction-report.js';
export type { InteractionReport, InteractionReportInput, ElementOutcome, InteractionStatus } from './domain/validation/interaction-report.js';
export { computeValidationScore } from './domain/validation/validation-score.js';
export type { ValidationScore, CoverageThresholds } from './domain/validation/validation-score.js';
export type { HistoryEntry } from './domain/orchestration/history-log.js';
export type { RepairState, TerminalState } from './domain/orchestration/repair-state.js';
export { RunMetricsRecordSchema, summarizeRuns } from './domain/metrics/run-metrics.js';
export type { RunMetricsRecord, RunMetricsSummary } from './domain/metrics/run-metrics.js';

// Ports and adapters
export type { ValidatorPort, ValidationRequest } from './ports/validator.port.js';
export type { GenerativeFixerPort, GenerativeRequest, GenerativeProposal, GenerativeDefect, GenerativeUsage } from './ports/generative-fixer.port.js';
export type { MetricsSinkPort } from './ports/metrics-sink.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { RunIdFactoryPort } from './ports/run-id.port.js';
export { JsonlMetricsSink } from './infra/metrics/jsonl-metrics-sink.js';
export { InMemoryMetricsSink } from './infra/metrics/in-memory-metrics-sink.js';

// Errors and logging
export type { AppError } from './errors/index.js';
export { formatAppError } from './errors/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory } from './core/logging/index.js';
