import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { CacheReadPort, DirEntry, PathStat } from '../../ports/fs.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { CacheNode, CacheTree } from '../../domain/cache-node.js';
import { countNodes } from '../../domain/cache-node.js';
import { runPool } from '../../utils/worker-pool.js';
import { MetadataStore } from './metadata-store.js';
import { SizeAggregator } from './size-aggregator.js';

export type TreeBuildError =
  | { readonly code: 'ROOT_NOT_FOUND'; readonly rootPath: string; readonly message: string }
  | { readonly code: 'ROOT_UNREADABLE'; readonly rootPath: string; readonly message: string }
  | { readonly code: 'SCAN_FAILED'; readonly rootPath: string; readonly message: string };

export interface TreeBuildOptions {
  /** Overrides the configured pool size for this scan. */
  readonly concurrency?: number;
}

const byName = (a: DirEntry, b: DirEntry) => a.name.localeCompare(b.name);

/**
 * Materializes the cache directory into a CacheNode tree.
 *
 * - A directory is a leaf iff it has no directory children (one level of look-ahead).
 * - Leaves get sidecar metadata and a recursive size; branches sum their own files and
 *   their children's sizes in the same pass.
 * - The root's immediate subdirectories are spread over a bounded worker pool. Every worker
 *   owns one disjoint subtree and recurses into it sequentially; `build` resolves after all
 *   workers have joined.
 * - A directory that disappears mid-scan lists as empty; an entry that disappears before it
 *   is stat'ed is dropped.
 */
@injectable()
export class TreeBuilder {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly maxDepth: number;

  constructor(
    @inject(DI.Ports.FileSystem) private readonly fs: CacheReadPort,
    @inject(DI.Services.MetadataStore) private readonly metadata: MetadataStore,
    @inject(DI.Services.SizeAggregator) private readonly sizes: SizeAggregator,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.concurrency = config.scan.concurrency;
    this.maxDepth = config.scan.maxDepth;
    this.logger = loggerFactory.create('TreeBuilder');
  }

  build(rootPath: string, options: TreeBuildOptions = {}): ResultAsync<CacheTree, TreeBuildError> {
    const startedAt = Date.now();
    const concurrency = options.concurrency ?? this.concurrency;

    return this.fs
      .stat(rootPath)
      .mapErr((e): TreeBuildError =>
        e.code === 'FS_NOT_FOUND'
          ? { code: 'ROOT_NOT_FOUND', rootPath, message: e.message }
          : { code: 'ROOT_UNREADABLE', rootPath, message: e.message }
      )
      .andThen(
        (stat): ResultAsync<PathStat, TreeBuildError> =>
          stat.kind === 'directory'
            ? okAsync(stat)
            : errAsync({ code: 'ROOT_UNREADABLE', rootPath, message: `Not a directory: ${rootPath}` })
      )
      .andThen((stat) =>
        this.fs
          .readdir(rootPath)
          .mapErr((e): TreeBuildError =>
            e.code === 'FS_NOT_FOUND'
              ? { code: 'ROOT_NOT_FOUND', rootPath, message: e.message }
              : { code: 'ROOT_UNREADABLE', rootPath, message: e.message }
          )
          .map((entries) => ({ stat, entries }))
      )
      .andThen(({ stat, entries }) =>
        ResultAsync.fromPromise(
          this.buildRoot(rootPath, stat.mtime, entries, concurrency),
          (e): TreeBuildError => ({
            code: 'SCAN_FAILED',
            rootPath,
            message: e instanceof Error ? e.message : String(e),
          })
        )
      )
      .map((root) => {
        const counts = countNodes(root);
        this.logger.info(
          { rootPath, durationMs: Date.now() - startedAt, branches: counts.branches, leaves: counts.leaves, concurrency },
          'Cache tree populated'
        );
        return { rootPath, root, scannedAt: new Date() };
      });
  }

  private async buildRoot(
    rootPath: string,
    mtime: Date,
    entries: readonly DirEntry[],
    concurrency: number
  ): Promise<CacheNode> {
    const subdirs = entries.filter((e) => e.kind === 'directory').sort(byName);

    // Fan-out: one pool task per top-level subtree, each writing only its own node.
    const built = await runPool(subdirs, concurrency, async (entry) => {
      this.logger.debug({ subtree: entry.name }, 'Scanning subtree');
      return this.buildNode(path.join(rootPath, entry.name), [entry.name], 1);
    });
    const children = built.filter((node): node is CacheNode => node !== null);

    const ownFiles = await this.sumFiles(rootPath, entries);
    return {
      name: path.basename(rootPath) || rootPath,
      kind: subdirs.length > 0 ? 'branch' : 'leaf',
      children,
      size: ownFiles + children.reduce((sum, c) => sum + c.size, 0),
      modifiedTime: mtime,
      comment: '',
      protected: false,
      relativePath: [],
      inUse: false,
    };
  }

  /**
   * Sequential recursion inside one worker's subtree. Returns null when the directory
   * vanished before it could be stat'ed.
   */
  private async buildNode(absPath: string, relativePath: readonly string[], depth: number): Promise<CacheNode | null> {
    const stat = await this.fs.stat(absPath).unwrapOr(null);
    if (!stat || stat.kind !== 'directory') return null;

    const entries = await this.fs.readdir(absPath).unwrapOr([]);
    const subdirs = entries.filter((e) => e.kind === 'directory').sort(byName);

    if (subdirs.length === 0) {
      const metadata = await this.metadata.read(absPath);
      const size = await this.sizes.size(absPath);
      return {
        name: relativePath[relativePath.length - 1] ?? path.basename(absPath),
        kind: 'leaf',
        children: [],
        size,
        modifiedTime: stat.mtime,
        comment: metadata.comment,
        protected: metadata.protected,
        relativePath,
        inUse: false,
      };
    }

    const children: CacheNode[] = [];
    if (depth < this.maxDepth) {
      for (const entry of subdirs) {
        const child = await this.buildNode(path.join(absPath, entry.name), [...relativePath, entry.name], depth + 1);
        if (child) children.push(child);
      }
    } else {
      this.logger.warn({ path: absPath, maxDepth: this.maxDepth }, 'Maximum scan depth reached; subtree not expanded');
    }

    const ownFiles = await this.sumFiles(absPath, entries);
    return {
      name: relativePath[relativePath.length - 1] ?? path.basename(absPath),
      kind: 'branch',
      children,
      size: ownFiles + children.reduce((sum, c) => sum + c.size, 0),
      modifiedTime: stat.mtime,
      comment: '',
      protected: false,
      relativePath,
      inUse: false,
    };
  }

  private async sumFiles(dirPath: string, entries: readonly DirEntry[]): Promise<number> {
    let total = 0;
    for (const entry of entries) {
      if (entry.kind !== 'file') continue;
      total += await this.fs.stat(path.join(dirPath, entry.name)).map((s) => s.sizeBytes).unwrapOr(0);
    }
    return total;
  }
}
