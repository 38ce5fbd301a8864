/**
 * Delete Command
 *
 * Deletes cache versions (leaf folders) by id after a confirmation.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { CacheTree, NodeId } from '../../domain/cache-node.js';
import { formatSize } from '../../domain/format.js';
import type { DeletionOutcome, RefreshError } from '../../application/services/cache-service.js';
import { describeRefreshError } from '../refresh-error.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DeleteCommandDeps {
  readonly refresh: () => ResultAsync<CacheTree, RefreshError>;
  readonly confirm: (prompt: string) => Promise<boolean>;
  readonly deleteSelected: (ids: readonly NodeId[]) => Promise<DeletionOutcome[]>;
}

export interface DeleteCommandOptions {
  /** Skip the confirmation prompt. */
  readonly yes?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeDeleteCommand(
  ids: readonly string[],
  deps: DeleteCommandDeps,
  options: DeleteCommandOptions = {}
): Promise<CliResult> {
  const targets = [...new Set(ids.map((id) => id.replace(/^\/+|\/+$/g, '')))].filter((id) => id !== '');
  if (targets.length === 0) {
    return misuse('No cache version given', ['Run "cachekeeper tree" to list versions, then pass their paths']);
  }

  const refreshed = await deps.refresh();
  if (refreshed.isErr()) {
    return failure(describeRefreshError(refreshed.error));
  }

  if (!options.yes) {
    const confirmed = await deps.confirm(`Delete ${targets.length} cache version(s)?`);
    if (!confirmed) {
      return success({ message: 'Deletion canceled' });
    }
  }

  const outcomes = await deps.deleteSelected(targets);

  const details: string[] = [];
  const warnings: string[] = [];
  let failed = 0;
  let freed = 0;

  for (const { nodeId, result } of outcomes) {
    if (result.isOk()) {
      freed += result.value.size;
      details.push(`Deleted ${nodeId} (${formatSize(result.value.size)})`);
    } else if (result.error.code === 'ALREADY_DELETED') {
      warnings.push(result.error.message);
    } else {
      failed++;
      details.push(`${nodeId}: ${result.error.message}`);
    }
  }

  if (failed > 0) {
    return failure(`${failed} of ${outcomes.length} deletion(s) failed`, { details, warnings });
  }

  return success({
    message: `Deleted ${outcomes.length - warnings.length} cache version(s), ${formatSize(freed)} freed`,
    details,
    warnings,
  });
}
