import { EventEmitter } from 'events';
import { inject, injectable } from 'tsyringe';
import { ResultAsync, err, errAsync, okAsync, type Result } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { CacheWritePort } from '../../ports/fs.port.js';
import type { ActiveReferenceSourcePort } from '../../ports/reference-source.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { CacheNode, CacheTree, NodeId } from '../../domain/cache-node.js';
import { findNode } from '../../domain/cache-node.js';
import type { VersionReference } from '../../domain/version-reference.js';
import { toPresentationRows, type PresentationRow } from '../../domain/presentation.js';
import { buildOpenFolderCommand } from '../../domain/open-folder-command.js';
import { OperationGate } from '../../utils/operation-gate.js';
import { TreeBuilder, type TreeBuildError } from './tree-builder.js';
import { ActiveVersionMatcher } from './active-version-matcher.js';
import { DeletionPolicy, type DeletedNode, type DeletionError } from './deletion-policy.js';
import { CacheRootResolver, type ResolveError } from './cache-root-resolver.js';

export type RefreshError =
  | ResolveError
  | Exclude<TreeBuildError, { readonly code: 'ROOT_NOT_FOUND' }>
  | { readonly code: 'ROOT_UNAVAILABLE'; readonly rootPath: string; readonly message: string };

export interface DeletionOutcome {
  readonly nodeId: NodeId;
  readonly result: Result<DeletedNode, DeletionError>;
}

export const CacheServiceEvents = {
  TreeReplaced: 'tree:replaced',
  NodeDeleted: 'node:deleted',
} as const;

/**
 * Orchestrates the cache browser: owns the canonical tree, the current selection and the
 * resolved cache root.
 *
 * Events:
 * - `tree:replaced` (CacheTree) after every successful refresh
 * - `node:deleted` (DeletedNode) once per removed leaf
 *
 * Refresh and delete go through one OperationGate and never interleave.
 */
@injectable()
export class CacheService extends EventEmitter {
  private readonly logger: Logger;
  private readonly gate = new OperationGate();
  private tree: CacheTree | null = null;
  private rootPath: string | null = null;
  private readonly selection = new Set<NodeId>();

  constructor(
    @inject(DI.Services.CacheRootResolver) private readonly resolver: CacheRootResolver,
    @inject(DI.Services.TreeBuilder) private readonly builder: TreeBuilder,
    @inject(DI.Services.ActiveVersionMatcher) private readonly matcher: ActiveVersionMatcher,
    @inject(DI.Services.DeletionPolicy) private readonly deletion: DeletionPolicy,
    @inject(DI.Ports.ReferenceSource) private readonly references: ActiveReferenceSourcePort,
    @inject(DI.Ports.FileSystem) private readonly fs: CacheWritePort,
    @inject(DI.Ports.Platform) private readonly platform: NodeJS.Platform,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    super();
    this.logger = loggerFactory.create('CacheService');
  }

  refresh(): ResultAsync<CacheTree, RefreshError> {
    return new ResultAsync(this.gate.run(async () => this.rebuild()));
  }

  getTree(): CacheTree | null {
    return this.tree;
  }

  getRootPath(): string | null {
    return this.rootPath;
  }

  findNode(id: NodeId): CacheNode | undefined {
    return this.tree ? findNode(this.tree.root, id) : undefined;
  }

  rows(): PresentationRow[] {
    return this.tree ? toPresentationRows(this.tree) : [];
  }

  /**
   * Adds ids to the selection. Only unprotected leaves are selectable; returns the ids that
   * were accepted.
   */
  select(ids: readonly NodeId[]): NodeId[] {
    const accepted: NodeId[] = [];
    for (const id of ids) {
      const node = this.findNode(id);
      if (node && node.kind === 'leaf' && node.relativePath.length > 0 && !node.protected) {
        this.selection.add(id);
        accepted.push(id);
      }
    }
    return accepted;
  }

  clearSelection(): void {
    this.selection.clear();
  }

  getSelection(): NodeId[] {
    return [...this.selection];
  }

  /**
   * Deletes every id (the current selection when omitted) independently. A failure on one id
   * does not stop the rest.
   */
  deleteSelected(ids?: readonly NodeId[]): Promise<DeletionOutcome[]> {
    return this.gate.run(async () => {
      const targets = ids ? [...ids] : this.getSelection();
      const outcomes: DeletionOutcome[] = [];

      for (const nodeId of targets) {
        this.selection.delete(nodeId);
        const tree = this.tree;
        const node = tree ? findNode(tree.root, nodeId) : undefined;
        if (!tree || !node) {
          const unknown: DeletionError = { code: 'UNKNOWN_NODE', nodeId, message: `Unknown cache node: ${nodeId}` };
          this.logger.warn({ nodeId }, unknown.message);
          outcomes.push({ nodeId, result: err(unknown) });
          continue;
        }

        const result = await this.deletion.delete(tree, node);
        if (result.isOk()) {
          this.emit(CacheServiceEvents.NodeDeleted, result.value);
        }
        outcomes.push({ nodeId, result });
      }

      const failed = outcomes.filter((o) => o.result.isErr()).length;
      this.logger.info({ requested: targets.length, deleted: targets.length - failed, failed }, 'Deletion batch finished');
      return outcomes;
    });
  }

  /**
   * Command that opens the cache root in the platform file manager.
   */
  openCacheFolderCommand(): ResultAsync<string, ResolveError> {
    return this.resolveRoot().map((rootPath) => buildOpenFolderCommand(rootPath, this.platform));
  }

  private resolveRoot(): ResultAsync<string, ResolveError> {
    if (this.rootPath !== null) return okAsync(this.rootPath);
    return this.resolver.resolve().map((rootPath) => {
      this.rootPath = rootPath;
      return rootPath;
    });
  }

  private rebuild(): ResultAsync<CacheTree, RefreshError> {
    return this.resolveRoot()
      .andThen((rootPath) => this.buildWithRetry(rootPath))
      .andThen((tree) => this.activeReferences().map((refs) => ({ tree, refs })))
      .map(({ tree, refs }) => {
        const summary = this.matcher.match(tree, refs);
        this.logger.debug({ references: refs.length, ...summary }, 'Active versions matched');
        this.tree = tree;
        this.selection.clear();
        this.emit(CacheServiceEvents.TreeReplaced, tree);
        return tree;
      });
  }

  private buildWithRetry(rootPath: string): ResultAsync<CacheTree, RefreshError> {
    return this.builder.build(rootPath).orElse((e): ResultAsync<CacheTree, RefreshError> => {
      if (e.code !== 'ROOT_NOT_FOUND') return errAsync(e);

      this.logger.info({ rootPath }, 'Cache root missing, creating it');
      return this.fs
        .mkdirp(rootPath)
        .mapErr((fsError): RefreshError => rootUnavailable(rootPath, fsError.message))
        .andThen(() =>
          this.builder
            .build(rootPath)
            .mapErr((retryError): RefreshError =>
              retryError.code === 'ROOT_NOT_FOUND' ? rootUnavailable(rootPath, retryError.message) : retryError
            )
        );
    });
  }

  private activeReferences(): ResultAsync<readonly VersionReference[], never> {
    return this.references.list().orElse((e): ResultAsync<readonly VersionReference[], never> => {
      this.logger.warn({ code: e.code }, `Active references unavailable: ${e.message}`);
      return okAsync([]);
    });
  }
}

function rootUnavailable(rootPath: string, message: string): RefreshError {
  return { code: 'ROOT_UNAVAILABLE', rootPath, message };
}
