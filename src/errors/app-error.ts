import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** The user declined to provide a cache root. Fatal to the current command only. */
export type RootUnresolvedError = Readonly<{
  readonly _tag: 'RootUnresolved';
  readonly variable: string;
  readonly message: string;
}>;

/** The cache root could not be scanned, even after creating it. */
export type RootUnavailableError = Readonly<{
  readonly _tag: 'RootUnavailable';
  readonly rootPath: string;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | RootUnresolvedError | RootUnavailableError | UnexpectedError;

/**
 * Branded config type: proof that a value went through loadConfig (or the test factory).
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
