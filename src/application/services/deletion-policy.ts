import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { CacheFileSystemPort, FsError } from '../../ports/fs.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { CacheNode, CacheTree, NodeId } from '../../domain/cache-node.js';
import { detachNode, nodeIdOf } from '../../domain/cache-node.js';
import { MetadataStore } from './metadata-store.js';

export type DeletionError =
  | { readonly code: 'NOT_LEAF'; readonly nodeId: NodeId; readonly message: string }
  | { readonly code: 'PROTECTED'; readonly nodeId: NodeId; readonly message: string }
  | { readonly code: 'ALREADY_DELETED'; readonly nodeId: NodeId; readonly message: string }
  | { readonly code: 'UNKNOWN_NODE'; readonly nodeId: NodeId; readonly message: string }
  | { readonly code: 'IO_ERROR'; readonly nodeId: NodeId; readonly message: string };

export interface DeletedNode {
  readonly nodeId: NodeId;
  readonly absolutePath: string;
  readonly size: number;
}

/**
 * Deletes the backing directory of a single leaf, then drops the node from the tree.
 *
 * Preconditions are re-checked at call time, never trusted from the scan:
 * - the node has no children in memory AND no subdirectory on disk (NOT_LEAF)
 * - the sidecar does not mark it protected (PROTECTED)
 * - the directory still exists (ALREADY_DELETED)
 *
 * The absolute path is rebuilt from the tree's root and the node's relative path.
 * ALREADY_DELETED still detaches the node: no node outlives its directory.
 */
@injectable()
export class DeletionPolicy {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Ports.FileSystem) private readonly fs: CacheFileSystemPort,
    @inject(DI.Services.MetadataStore) private readonly metadata: MetadataStore,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('DeletionPolicy');
  }

  absolutePathOf(tree: CacheTree, node: CacheNode): string {
    return path.join(tree.rootPath, ...node.relativePath);
  }

  delete(tree: CacheTree, node: CacheNode): ResultAsync<DeletedNode, DeletionError> {
    const nodeId = nodeIdOf(node);

    if (node.relativePath.length === 0) {
      return errAsync({ code: 'NOT_LEAF', nodeId, message: 'The cache root itself cannot be deleted' });
    }
    if (node.children.length > 0) {
      return errAsync(subdirectoryFound(nodeId));
    }

    const absolutePath = this.absolutePathOf(tree, node);
    const toDeletionError = (e: FsError): DeletionError =>
      e.code === 'FS_NOT_FOUND'
        ? { code: 'ALREADY_DELETED', nodeId, message: `Already deleted: ${absolutePath}` }
        : { code: 'IO_ERROR', nodeId, message: e.message };

    return this.fs
      .readdir(absolutePath)
      .mapErr(toDeletionError)
      .andThen(
        (entries): ResultAsync<void, DeletionError> =>
          entries.some((e) => e.kind === 'directory') ? errAsync(subdirectoryFound(nodeId)) : okAsync(undefined)
      )
      .andThen(() => ResultAsync.fromSafePromise(this.metadata.read(absolutePath)))
      .andThen(
        (metadata): ResultAsync<void, DeletionError> =>
          metadata.protected
            ? errAsync({ code: 'PROTECTED', nodeId, message: `Protected cache, not deleted: ${nodeId}` })
            : okAsync(undefined)
      )
      .andThen(() => this.fs.removeTree(absolutePath).mapErr(toDeletionError))
      .map((): DeletedNode => {
        detachNode(tree.root, node);
        this.logger.info({ nodeId, absolutePath, size: node.size }, 'Cache version deleted');
        return { nodeId, absolutePath, size: node.size };
      })
      .mapErr((e) => {
        if (e.code === 'ALREADY_DELETED') {
          detachNode(tree.root, node);
        }
        this.logger.warn({ nodeId, code: e.code }, e.message);
        return e;
      });
  }
}

function subdirectoryFound(nodeId: NodeId): DeletionError {
  return { code: 'NOT_LEAF', nodeId, message: `Subdirectory found in ${nodeId}. Aborting.` };
}
