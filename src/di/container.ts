import 'reflect-metadata';
import * as path from 'path';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { CacheFileSystemPort } from '../ports/fs.port.js';
import type { InteractiveInputPort } from '../ports/interactive-input.port.js';
import type { ActiveReferenceSourcePort } from '../ports/reference-source.port.js';
import { NodeCacheFileSystem } from '../infra/local/fs/index.js';
import { LocalEnvironmentStore } from '../infra/local/environment-store/index.js';
import { NonInteractiveInput, ReadlineInteractiveInput } from '../infra/local/interactive-input/index.js';
import { JsonFileReferenceSource, StaticReferenceSource } from '../infra/local/reference-source/index.js';
import { MetadataStore } from '../application/services/metadata-store.js';
import { SizeAggregator } from '../application/services/size-aggregator.js';
import { TreeBuilder } from '../application/services/tree-builder.js';
import { ActiveVersionMatcher } from '../application/services/active-version-matcher.js';
import { DeletionPolicy } from '../application/services/deletion-policy.js';
import { CacheRootResolver } from '../application/services/cache-root-resolver.js';
import { CacheService } from '../application/services/cache-service.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let isInitializing = false; // Synchronous flag for race protection

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** JSON file listing the active references. Without one, no version is in use. */
  readonly referencesFile?: string;
  /** Scene file name of the host, appended to a newly entered cache root. */
  readonly sceneName?: string;
  /** false disables prompts (non-TTY stdin). Defaults to true. */
  readonly interactive?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function registerRuntime(options: ContainerInitOptions): RuntimeMode {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
  return mode;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Tests inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) {
    console.error(formatAppError(configResult.error));
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure' });
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;
  container.register(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORTS REGISTRATION
// Every port may be pre-registered by tests; only missing ones get local adapters.
// ═══════════════════════════════════════════════════════════════════════════

async function registerPorts(options: ContainerInitOptions): Promise<void> {
  if (!container.isRegistered(DI.Ports.FileSystem)) {
    container.register(DI.Ports.FileSystem, {
      useFactory: instanceCachingFactory(() => new NodeCacheFileSystem()),
    });
  }

  if (!container.isRegistered(DI.Ports.Platform)) {
    container.register<NodeJS.Platform>(DI.Ports.Platform, { useValue: process.platform });
  }

  if (!container.isRegistered(DI.Ports.SceneName)) {
    container.register<string>(DI.Ports.SceneName, { useValue: options.sceneName ?? '' });
  }

  if (!container.isRegistered(DI.Ports.InteractiveInput)) {
    const input: InteractiveInputPort =
      options.interactive === false ? new NonInteractiveInput() : new ReadlineInteractiveInput();
    container.register<InteractiveInputPort>(DI.Ports.InteractiveInput, { useValue: input });
  }

  if (!container.isRegistered(DI.Ports.ReferenceSource)) {
    const fs = container.resolve<CacheFileSystemPort>(DI.Ports.FileSystem);
    const source: ActiveReferenceSourcePort = options.referencesFile
      ? new JsonFileReferenceSource(path.resolve(options.referencesFile), fs)
      : new StaticReferenceSource();
    container.register<ActiveReferenceSourcePort>(DI.Ports.ReferenceSource, { useValue: source });
  }

  if (!container.isRegistered(DI.Ports.EnvironmentStore)) {
    const config = container.resolve<ValidatedConfig>(DI.Config.App);
    const fs = container.resolve<CacheFileSystemPort>(DI.Ports.FileSystem);
    const loaded = await LocalEnvironmentStore.load(process.env, path.join(config.paths.homeDir, 'env.json'), fs);
    if (loaded.isErr()) {
      throw new Error(`Environment store unavailable: ${loaded.error.message}`);
    }
    container.register(DI.Ports.EnvironmentStore, { useValue: loaded.value });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// Order follows the dependency graph: leaves first.
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register(DI.Services.MetadataStore, {
    useFactory: instanceCachingFactory((c) => c.resolve(MetadataStore)),
  });
  container.register(DI.Services.SizeAggregator, {
    useFactory: instanceCachingFactory((c) => c.resolve(SizeAggregator)),
  });
  container.register(DI.Services.TreeBuilder, {
    useFactory: instanceCachingFactory((c) => c.resolve(TreeBuilder)),
  });
  container.register(DI.Services.ActiveVersionMatcher, {
    useFactory: instanceCachingFactory((c) => c.resolve(ActiveVersionMatcher)),
  });
  container.register(DI.Services.DeletionPolicy, {
    useFactory: instanceCachingFactory((c) => c.resolve(DeletionPolicy)),
  });
  container.register(DI.Services.CacheRootResolver, {
    useFactory: instanceCachingFactory((c) => c.resolve(CacheRootResolver)),
  });
  container.register(DI.Services.Cache, {
    useFactory: instanceCachingFactory((c) => c.resolve(CacheService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Idempotent: calls after a successful initialization return immediately.
 * Fail-fast: a failed initialization is not retried; the caller should exit.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return;
  if (isInitializing) {
    throw new Error('[DI] Container initialization already in progress');
  }

  isInitializing = true;
  try {
    registerRuntime(options);
    registerConfig();
    registerLogging();
    await registerPorts(options);
    registerServices();
    initialized = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[DI] Container initialization failed: ${message}`);
  } finally {
    isInitializing = false;
  }
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  isInitializing = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
