/**
 * Set-Root Command
 *
 * Persists the cache root variable, with the scene stem appended when a scene is given.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { ResolveError } from '../../application/services/cache-root-resolver.js';
import { describeRefreshError } from '../refresh-error.js';

export interface SetRootCommandDeps {
  readonly variableName: string;
  readonly setRoot: (enteredPath: string, sceneName: string | undefined) => ResultAsync<string, ResolveError>;
}

export interface SetRootCommandOptions {
  readonly scene?: string;
}

export async function executeSetRootCommand(
  enteredPath: string,
  deps: SetRootCommandDeps,
  options: SetRootCommandOptions = {}
): Promise<CliResult> {
  if (enteredPath.trim() === '') {
    return misuse('Cache path is empty');
  }

  const stored = await deps.setRoot(enteredPath, options.scene);
  if (stored.isErr()) {
    return failure(describeRefreshError(stored.error));
  }

  return success({ message: `$${deps.variableName} set to ${stored.value}` });
}
