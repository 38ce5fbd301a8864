/**
 * Tree Command
 *
 * Rescans the cache root and prints the tree, in-use versions highlighted.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { CacheTree } from '../../domain/cache-node.js';
import { countNodes } from '../../domain/cache-node.js';
import { formatSize } from '../../domain/format.js';
import type { PresentationRow } from '../../domain/presentation.js';
import type { RefreshError } from '../../application/services/cache-service.js';
import { describeRefreshError } from '../refresh-error.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TreeCommandDeps {
  readonly refresh: () => ResultAsync<CacheTree, RefreshError>;
  readonly rows: () => readonly PresentationRow[];
}

export interface TreeCommandOptions {
  readonly json?: boolean;
  /** Also show size and date on branch rows. */
  readonly all?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeTreeCommand(
  deps: TreeCommandDeps,
  options: TreeCommandOptions = {}
): Promise<CliResult> {
  const refreshed = await deps.refresh();
  if (refreshed.isErr()) {
    return failure(describeRefreshError(refreshed.error));
  }

  const tree = refreshed.value;
  const rows = deps.rows();

  if (options.json) {
    return success({ message: '', json: { rootPath: tree.rootPath, rows } });
  }

  if (rows.length === 0) {
    return success({
      message: `Target : ${tree.rootPath}`,
      details: ['Cache is empty'],
    });
  }

  const counts = countNodes(tree.root);
  const inUse = rows.filter((row) => row.inUse).length;
  return success({
    message: `Target : ${tree.rootPath}`,
    rows,
    showBranchDetails: options.all,
    details: [`${counts.leaves} versions in ${counts.branches} folders, ${formatSize(tree.root.size)} total, ${inUse} in use`],
  });
}
