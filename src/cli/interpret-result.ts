/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult turns into a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { exitStatus, type ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result, then terminate through the injected terminator on failure.
 * Success lets the process end on its own.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      terminator.terminate(result.exitCode);
  }
}

/**
 * Same as interpretCliResult, for failures raised before the container exists.
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  if (result.kind === 'failure') {
    process.exit(exitStatus(result.exitCode));
  }
}
