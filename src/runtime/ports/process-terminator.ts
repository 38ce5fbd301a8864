/**
 * Port for ending the current process with a status.
 * Only composition roots hold one; commands return a CliResult instead.
 *
 * `misuse` is a bad invocation (missing or empty arguments), `failure` everything else.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export type FailureExitCode = Exclude<ExitCode, { readonly kind: 'success' }>;

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

/** Conventional shell status: 0, 1, 2. */
export function exitStatus(code: ExitCode): number {
  switch (code.kind) {
    case 'success':
      return 0;
    case 'failure':
      return 1;
    case 'misuse':
      return 2;
  }
}
