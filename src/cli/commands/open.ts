/**
 * Open Command
 *
 * Prints the command that opens the cache root in the platform file manager,
 * or opens it directly with --launch.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { ResolveError } from '../../application/services/cache-root-resolver.js';
import { describeRefreshError } from '../refresh-error.js';

export interface OpenCommandDeps {
  readonly openCacheFolderCommand: () => ResultAsync<string, ResolveError>;
  readonly getRootPath: () => string | null;
  readonly launch: (target: string) => Promise<void>;
}

export interface OpenCommandOptions {
  readonly launch?: boolean;
}

export async function executeOpenCommand(
  deps: OpenCommandDeps,
  options: OpenCommandOptions = {}
): Promise<CliResult> {
  const command = await deps.openCacheFolderCommand();
  if (command.isErr()) {
    return failure(describeRefreshError(command.error));
  }

  if (!options.launch) {
    return success({ message: command.value });
  }

  const rootPath = deps.getRootPath();
  if (rootPath === null) {
    return failure('Cache root is not resolved');
  }

  try {
    await deps.launch(rootPath);
    return success({ message: `Opened ${rootPath}` });
  } catch (error) {
    return failure(`Failed to open ${rootPath}: ${error instanceof Error ? error.message : String(error)}`, {
      suggestions: [`Run it yourself: ${command.value}`],
    });
  }
}
