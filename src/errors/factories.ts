import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  RootUnavailableError,
  RootUnresolvedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  rootUnresolved: (variable: string): RootUnresolvedError => ({
    _tag: 'RootUnresolved',
    variable,
    message: `Operation canceled. $${variable} was not set.`,
  }),

  rootUnavailable: (rootPath: string, message: string): RootUnavailableError => ({
    _tag: 'RootUnavailable',
    rootPath,
    message,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
