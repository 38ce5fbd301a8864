/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the matching namespace
 * 2. Register it in src/di/container.ts
 * 3. Use @inject(DI.YourToken) in consumers (every constructor parameter is injected
 *    explicitly; nothing relies on emitted parameter types)
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (external effects)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    /** Cache filesystem (read + write) */
    FileSystem: Symbol('Ports.FileSystem'),
    /** Host environment-variable store */
    EnvironmentStore: Symbol('Ports.EnvironmentStore'),
    /** Interactive prompts (root path, confirmations) */
    InteractiveInput: Symbol('Ports.InteractiveInput'),
    /** Scene-graph active reference query */
    ReferenceSource: Symbol('Ports.ReferenceSource'),
    /** Scene file name whose stem suffixes a newly entered cache root ('' when none) */
    SceneName: Symbol('Ports.SceneName'),
    /** Host platform (NodeJS.Platform), for the file-manager command */
    Platform: Symbol('Ports.Platform'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    MetadataStore: Symbol('Services.MetadataStore'),
    SizeAggregator: Symbol('Services.SizeAggregator'),
    TreeBuilder: Symbol('Services.TreeBuilder'),
    ActiveVersionMatcher: Symbol('Services.ActiveVersionMatcher'),
    DeletionPolicy: Symbol('Services.DeletionPolicy'),
    CacheRootResolver: Symbol('Services.CacheRootResolver'),
    /** Orchestrator owning the canonical tree */
    Cache: Symbol('Services.Cache'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
