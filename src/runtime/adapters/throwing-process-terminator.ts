import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Used under tests: a command that tries to end the process throws instead, so the
 * test sees which exit it asked for.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
