/**
 * Dependency injection token registry.
 *
 * ADDING A SERVICE:
 * 1. Add a token under the namespace it belongs to
 * 2. Mark the class @injectable() / @singleton()
 * 3. Use @inject(DI.X) on every constructor parameter (vitest/esbuild emit no paramtypes)
 * 4. Register it in createRepairContainer()
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated, immutable RepairConfig */
    Repair: Symbol('Config.Repair'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PIPELINE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    Classifier: Symbol('Services.Classifier'),
    RuleCatalog: Symbol('Services.RuleCatalog'),
    RuleEngine: Symbol('Services.RuleEngine'),
    PatchApplier: Symbol('Services.PatchApplier'),
    Orchestrator: Symbol('Services.Orchestrator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (collaborators and platform)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    Validator: Symbol('Ports.Validator'),
    GenerativeFixer: Symbol('Ports.GenerativeFixer'),
    MetricsSink: Symbol('Ports.MetricsSink'),
    TimeClock: Symbol('Ports.TimeClock'),
    IdFactory: Symbol('Ports.IdFactory'),
  },
} as const;
