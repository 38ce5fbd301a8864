import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import fc from 'fast-check';
import { ResultAsync } from 'neverthrow';
import { TreeBuilder } from '../../../src/application/services/tree-builder.js';
import { MetadataStore } from '../../../src/application/services/metadata-store.js';
import { SizeAggregator } from '../../../src/application/services/size-aggregator.js';
import { NodeCacheFileSystem } from '../../../src/infra/local/fs/index.js';
import type { CacheFileSystemPort, DirEntry, FsError } from '../../../src/ports/fs.port.js';
import type { ValidatedConfig } from '../../../src/config/app-config.js';
import type { CacheNode } from '../../../src/domain/cache-node.js';
import { findNode } from '../../../src/domain/cache-node.js';
import { InMemoryCacheFileSystem, fsError } from '../../fakes/index.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';
import { makeTempRoot, removeTempRoot, sidecar, testConfig, writeLayout } from '../../helpers/cache-fixture.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function createBuilder(port: CacheFileSystemPort, config: ValidatedConfig = testConfig(), loggers = new FakeLoggerFactory()) {
  return new TreeBuilder(
    port,
    new MetadataStore(port, config, loggers),
    new SizeAggregator(port, config),
    config,
    loggers
  );
}

/** Strip mutable scan-time state so two scans can be compared. */
function shape(node: CacheNode): unknown {
  return {
    name: node.name,
    kind: node.kind,
    size: node.size,
    mtime: node.modifiedTime.getTime(),
    comment: node.comment,
    protected: node.protected,
    relativePath: node.relativePath,
    children: node.children.map(shape),
  };
}

describe('TreeBuilder (local filesystem)', () => {
  const approved = sidecar({ comment: 'approved', cache_protect: 1 });
  let root: string;

  beforeEach(async () => {
    root = await makeTempRoot();
    await writeLayout(root, {
      'shot010/fx/v003/frame.bgeo': 'x'.repeat(100),
      'shot010/fx/v003/cacheinfo.json': approved,
      'shot010/fx/v004/frame.bgeo': 'y'.repeat(50),
      'shot010/fx/notes.txt': 'notes..',
      'shot020/': '',
      'readme.txt': '0123456789',
    });
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('classifies directories by whether they have subdirectories', async () => {
    const tree = expectOk(await createBuilder(new NodeCacheFileSystem()).build(root), 'scan');

    expect(tree.rootPath).toBe(root);
    expect(tree.root.kind).toBe('branch');
    expect(tree.root.children.map((c) => [c.name, c.kind])).toEqual([
      ['shot010', 'branch'],
      ['shot020', 'leaf'],
    ]);
    expect(findNode(tree.root, 'shot010/fx')?.kind).toBe('branch');
    expect(findNode(tree.root, 'shot010/fx/v003')?.kind).toBe('leaf');
    expect(findNode(tree.root, 'shot010/fx/v004')?.relativePath).toEqual(['shot010', 'fx', 'v004']);
  });

  it('annotates leaves from their sidecar and leaves branches at defaults', async () => {
    const tree = expectOk(await createBuilder(new NodeCacheFileSystem()).build(root), 'scan');

    expect(findNode(tree.root, 'shot010/fx/v003')).toMatchObject({ comment: 'approved', protected: true });
    expect(findNode(tree.root, 'shot010/fx/v004')).toMatchObject({ comment: '', protected: false });
    expect(findNode(tree.root, 'shot010/fx')).toMatchObject({ comment: '', protected: false });
  });

  it('sizes leaves recursively and branches as own files plus children', async () => {
    const tree = expectOk(await createBuilder(new NodeCacheFileSystem()).build(root), 'scan');
    const v003 = 100 + approved.length;

    expect(findNode(tree.root, 'shot010/fx/v003')?.size).toBe(v003);
    expect(findNode(tree.root, 'shot010/fx/v004')?.size).toBe(50);
    expect(findNode(tree.root, 'shot010/fx')?.size).toBe(v003 + 50 + 7);
    expect(findNode(tree.root, 'shot010')?.size).toBe(v003 + 50 + 7);
    expect(findNode(tree.root, 'shot020')?.size).toBe(0);
    expect(tree.root.size).toBe(v003 + 50 + 7 + 10);
  });

  it('produces the same tree on an unchanged directory', async () => {
    const builder = createBuilder(new NodeCacheFileSystem());
    const first = expectOk(await builder.build(root), 'first scan');
    const second = expectOk(await builder.build(root), 'second scan');

    expect(shape(second.root)).toEqual(shape(first.root));
  });

  it('produces the same tree for every pool size', async () => {
    const builder = createBuilder(new NodeCacheFileSystem());
    const reference = shape(expectOk(await builder.build(root, { concurrency: 1 }), 'sequential').root);

    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 8 }), async (concurrency) => {
        const tree = expectOk(await builder.build(root, { concurrency }), `pool of ${concurrency}`);
        expect(shape(tree.root)).toEqual(reference);
      }),
      { numRuns: 8 }
    );
  });

  it('follows a symbolic link to a directory', async () => {
    await fs.symlink(path.join(root, 'shot010', 'fx'), path.join(root, 'linked'), 'dir');

    const tree = expectOk(await createBuilder(new NodeCacheFileSystem()).build(root), 'scan');
    expect(findNode(tree.root, 'linked')?.children.map((c) => c.name)).toEqual(['v003', 'v004']);
  });

  it('terminates on a symbolic link cycle', async () => {
    await fs.symlink(path.join(root, 'shot010'), path.join(root, 'shot010', 'fx', 'v004', 'back'), 'dir');

    const loggers = new FakeLoggerFactory();
    const tree = expectOk(
      await createBuilder(new NodeCacheFileSystem(), testConfig({ maxDepth: 6 }), loggers).build(root),
      'scan with cycle'
    );

    expect(findNode(tree.root, 'shot010/fx/v004')?.kind).toBe('branch');
    expect(loggers.logger('TreeBuilder').hasEntry('warn', 'Maximum scan depth reached')).toBe(true);
  });

  it('logs a summary once the scan completes', async () => {
    const loggers = new FakeLoggerFactory();
    expectOk(await createBuilder(new NodeCacheFileSystem(), testConfig(), loggers).build(root), 'scan');

    const summary = loggers.logger('TreeBuilder').getEntries('info');
    expect(summary).toHaveLength(1);
    expect(summary[0]?.msg).toBe('Cache tree populated');
    expect(summary[0]?.obj).toMatchObject({ rootPath: root, branches: 2, leaves: 3, concurrency: 2 });
  });

  it('reports a missing root', async () => {
    const error = expectErr(await createBuilder(new NodeCacheFileSystem()).build(path.join(root, 'nope')), 'missing');
    expect(error.code).toBe('ROOT_NOT_FOUND');
  });

  it('refuses a root that is a file', async () => {
    const error = expectErr(await createBuilder(new NodeCacheFileSystem()).build(path.join(root, 'readme.txt')), 'file');
    expect(error.code).toBe('ROOT_UNREADABLE');
  });
});

describe('TreeBuilder (changes during the scan)', () => {
  it('treats an empty root as a leaf with no children', async () => {
    const port = new InMemoryCacheFileSystem().seed({ '/cache/': '' });
    const tree = expectOk(await createBuilder(port).build('/cache'), 'empty');

    expect(tree.root).toMatchObject({ name: 'cache', kind: 'leaf', children: [], size: 0, relativePath: [] });
  });

  it('drops an entry that vanished between listing and stat', async () => {
    const port = new InMemoryCacheFileSystem().seed({ '/cache/fx/v001/': '', '/cache/fx/v002/': '' });
    port.failOnce('stat', '/cache/fx/v001', fsError('FS_NOT_FOUND', 'gone'));

    const tree = expectOk(await createBuilder(port).build('/cache'), 'scan');
    expect(findNode(tree.root, 'fx')?.children.map((c) => c.name)).toEqual(['v002']);
  });

  it('treats a directory that vanished before listing as an empty leaf', async () => {
    const port = new InMemoryCacheFileSystem().seed({ '/cache/fx/v001/': '' });
    port.failOnce('readdir', '/cache/fx', fsError('FS_NOT_FOUND', 'gone'));

    const tree = expectOk(await createBuilder(port).build('/cache'), 'scan');
    expect(findNode(tree.root, 'fx')).toMatchObject({ kind: 'leaf', children: [] });
  });

  it('reports an unreadable root', async () => {
    const port = new InMemoryCacheFileSystem().seed({ '/cache/': '' });
    port.failOnce('readdir', '/cache', fsError('FS_PERMISSION_DENIED', 'denied'));

    expect(expectErr(await createBuilder(port).build('/cache'), 'unreadable').code).toBe('ROOT_UNREADABLE');
  });

  it('does not expand below the maximum depth', async () => {
    const loggers = new FakeLoggerFactory();
    const port = new InMemoryCacheFileSystem().seed({ '/cache/a/b/c/': '' });

    const tree = expectOk(await createBuilder(port, testConfig({ maxDepth: 1 }), loggers).build('/cache'), 'scan');
    expect(findNode(tree.root, 'a')).toMatchObject({ kind: 'branch', children: [] });
    expect(loggers.logger('TreeBuilder').hasEntry('warn', 'Maximum scan depth reached')).toBe(true);
  });
});

/** A generated directory: maybe a file of its own, then subdirectories named d0, d1, ... */
interface Layout {
  readonly withFile: boolean;
  readonly dirs: readonly Layout[];
}

function layoutArbitrary(depth: number): fc.Arbitrary<Layout> {
  const dirs = depth === 0 ? fc.constant<Layout[]>([]) : fc.array(layoutArbitrary(depth - 1), { maxLength: 3 });
  return fc.record({ withFile: fc.boolean(), dirs });
}

function seedLayout(layout: Layout, dir: string, out: Record<string, string> = {}): Record<string, string> {
  out[`${dir}/`] = '';
  if (layout.withFile) out[`${dir}/data.bin`] = 'x';
  layout.dirs.forEach((child, i) => seedLayout(child, `${dir}/d${i}`, out));
  return out;
}

function expectClassified(node: CacheNode, layout: Layout): void {
  expect(node.kind).toBe(layout.dirs.length > 0 ? 'branch' : 'leaf');
  expect(node.children.map((c) => c.name)).toEqual(layout.dirs.map((_, i) => `d${i}`));
  layout.dirs.forEach((child, i) => {
    const built = node.children[i];
    if (!built) throw new Error(`missing child d${i} of ${node.name}`);
    expectClassified(built, child);
  });
}

describe('TreeBuilder classification', () => {
  it('makes a directory a leaf exactly when it has no subdirectories', async () => {
    await fc.assert(
      fc.asyncProperty(layoutArbitrary(4), async (layout) => {
        const port = new InMemoryCacheFileSystem().seed(seedLayout(layout, '/cache'));
        const tree = expectOk(await createBuilder(port).build('/cache'), 'generated layout');

        expectClassified(tree.root, layout);
      }),
      { numRuns: 100 }
    );
  });
});

/** Holds every sidecar read back briefly and records when listings and reads happen. */
class SlowSidecarFileSystem extends InMemoryCacheFileSystem {
  readonly events: string[] = [];

  override readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    this.events.push(`readdir ${dirPath}`);
    return super.readdir(dirPath);
  }

  override readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    this.events.push(`read:start ${filePath}`);
    const delayed = new Promise<void>((resolve) => setTimeout(resolve, 5)).then(() => super.readFileUtf8(filePath));
    return new ResultAsync(delayed).map((content) => {
      this.events.push(`read:end ${filePath}`);
      return content;
    });
  }
}

describe('TreeBuilder leaf annotation', () => {
  it('sizes a leaf only after its sidecar was read', async () => {
    const port = new SlowSidecarFileSystem().seed({
      '/cache/fx/v001/a.bin': 'abc',
      '/cache/fx/v001/cacheinfo.json': sidecar({ comment: 'kept' }),
    });

    const tree = expectOk(await createBuilder(port).build('/cache'), 'scan');

    expect(findNode(tree.root, 'fx/v001')).toMatchObject({ comment: 'kept' });
    const readEnd = port.events.indexOf('read:end /cache/fx/v001/cacheinfo.json');
    const sizeListing = port.events.lastIndexOf('readdir /cache/fx/v001');
    expect(readEnd).toBeGreaterThanOrEqual(0);
    expect(sizeListing).toBeGreaterThan(readEnd);
  });
});
