import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { EnvironmentStorePort } from '../../ports/environment-store.port.js';
import type { InteractiveInputPort } from '../../ports/interactive-input.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ValidatedConfig } from '../../config/app-config.js';

export type ResolveError =
  | { readonly code: 'UNRESOLVED'; readonly variable: string; readonly message: string }
  | { readonly code: 'STORE_FAILED'; readonly variable: string; readonly message: string };

/**
 * Scene file name up to its first dot: `shot010_fx.v2.hip` -> `shot010_fx`.
 */
export function sceneStem(sceneName: string): string {
  const base = path.basename(sceneName);
  const dot = base.indexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * Cache root = the path the user entered, with the scene stem appended when the host has a
 * scene open.
 */
export function composeCacheRoot(enteredPath: string, sceneName: string | undefined): string {
  const stem = sceneName ? sceneStem(sceneName) : '';
  return stem ? path.join(enteredPath, stem) : enteredPath;
}

/**
 * ResolveCacheRoot: reads the cache root from the host environment store. When the variable
 * is empty, asks the user for a base path, appends the scene stem and persists the result
 * before returning it.
 */
@injectable()
export class CacheRootResolver {
  private readonly logger: Logger;
  private readonly variable: string;

  constructor(
    @inject(DI.Ports.EnvironmentStore) private readonly store: EnvironmentStorePort,
    @inject(DI.Ports.InteractiveInput) private readonly input: InteractiveInputPort,
    @inject(DI.Ports.SceneName) private readonly sceneName: string,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.variable = config.cacheRoot.variable;
    this.logger = loggerFactory.create('CacheRootResolver');
  }

  get variableName(): string {
    return this.variable;
  }

  current(): string | undefined {
    const value = this.store.get(this.variable)?.trim();
    return value ? value : undefined;
  }

  resolve(): ResultAsync<string, ResolveError> {
    const existing = this.current();
    if (existing) return okAsync(existing);

    return ResultAsync.fromSafePromise(this.input.ask(`Enter the cache path for $${this.variable}:`)).andThen(
      (answer): ResultAsync<string, ResolveError> => {
        if (answer === null) {
          return errAsync({
            code: 'UNRESOLVED',
            variable: this.variable,
            message: `Operation canceled. $${this.variable} was not set.`,
          });
        }
        return this.set(answer, this.sceneName);
      }
    );
  }

  /**
   * Persist a cache root explicitly. Returns the stored value.
   */
  set(enteredPath: string, sceneName: string | undefined = this.sceneName): ResultAsync<string, ResolveError> {
    const trimmed = enteredPath.trim();
    if (trimmed === '') {
      return errAsync({ code: 'UNRESOLVED', variable: this.variable, message: 'Cache path is empty' });
    }
    const cacheRoot = composeCacheRoot(trimmed, sceneName);
    return this.store
      .set(this.variable, cacheRoot)
      .mapErr((e): ResolveError => ({ code: 'STORE_FAILED', variable: this.variable, message: e.message }))
      .map(() => {
        this.logger.info({ variable: this.variable, cacheRoot }, 'Cache root set');
        return cacheRoot;
      });
  }
}
