/**
 * In-memory fake for the cache filesystem port.
 *
 * Paths are POSIX and absolute. Directories are tracked explicitly; writing a file requires
 * its parent directory. Any operation can be made to fail once for a given path.
 */

import * as path from 'path';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { CacheFileSystemPort, DirEntry, FsError, PathStat } from '../../src/ports/fs.port.js';

type Entry = { kind: 'directory'; mtime: Date } | { kind: 'file'; content: string; mtime: Date };

export type FsOperation = 'readdir' | 'stat' | 'readFileUtf8' | 'mkdirp' | 'removeTree' | 'writeFileUtf8';

export class InMemoryCacheFileSystem implements CacheFileSystemPort {
  private readonly entries = new Map<string, Entry>([['/', { kind: 'directory', mtime: new Date(0) }]]);
  private readonly failures = new Map<string, FsError>();
  readonly calls: Array<{ op: FsOperation; path: string }> = [];

  constructor(private readonly now: () => Date = () => new Date(0)) {}

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  /** Keys ending in '/' are directories, everything else a file with that content. */
  seed(layout: Readonly<Record<string, string>>): this {
    for (const [key, content] of Object.entries(layout)) {
      const target = normalize(key);
      if (key.endsWith('/')) {
        this.ensureDir(target);
      } else {
        this.ensureDir(path.posix.dirname(target));
        this.entries.set(target, { kind: 'file', content, mtime: this.now() });
      }
    }
    return this;
  }

  failOnce(op: FsOperation, target: string, error: FsError): this {
    this.failures.set(`${op}:${normalize(target)}`, error);
    return this;
  }

  has(target: string): boolean {
    return this.entries.has(normalize(target));
  }

  readText(target: string): string | undefined {
    const entry = this.entries.get(normalize(target));
    return entry?.kind === 'file' ? entry.content : undefined;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Port
  // ═══════════════════════════════════════════════════════════════════

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    const dir = normalize(dirPath);
    const injected = this.take('readdir', dir);
    if (injected) return errAsync(injected);

    const entry = this.entries.get(dir);
    if (!entry) return errAsync(notFound(dir));
    if (entry.kind !== 'directory') return errAsync(fsError('FS_NOT_A_DIRECTORY', `Not a directory: ${dir}`));

    const children: DirEntry[] = [];
    for (const [key, child] of this.entries) {
      if (key !== dir && path.posix.dirname(key) === dir) {
        children.push({ name: path.posix.basename(key), kind: child.kind });
      }
    }
    return okAsync(children);
  }

  stat(targetPath: string): ResultAsync<PathStat, FsError> {
    const target = normalize(targetPath);
    const injected = this.take('stat', target);
    if (injected) return errAsync(injected);

    const entry = this.entries.get(target);
    if (!entry) return errAsync(notFound(target));
    return okAsync({
      kind: entry.kind,
      sizeBytes: entry.kind === 'file' ? Buffer.byteLength(entry.content, 'utf8') : 0,
      mtime: entry.mtime,
    });
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    const target = normalize(filePath);
    const injected = this.take('readFileUtf8', target);
    if (injected) return errAsync(injected);

    const entry = this.entries.get(target);
    if (!entry) return errAsync(notFound(target));
    if (entry.kind !== 'file') return errAsync(fsError('FS_IO_ERROR', `Is a directory: ${target}`));
    return okAsync(entry.content);
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    const dir = normalize(dirPath);
    const injected = this.take('mkdirp', dir);
    if (injected) return errAsync(injected);

    this.ensureDir(dir);
    return okAsync(undefined);
  }

  removeTree(dirPath: string): ResultAsync<void, FsError> {
    const dir = normalize(dirPath);
    const injected = this.take('removeTree', dir);
    if (injected) return errAsync(injected);

    if (!this.entries.has(dir)) return errAsync(notFound(dir));
    for (const key of [...this.entries.keys()]) {
      if (key === dir || key.startsWith(`${dir}/`)) this.entries.delete(key);
    }
    return okAsync(undefined);
  }

  writeFileUtf8(filePath: string, content: string): ResultAsync<void, FsError> {
    const target = normalize(filePath);
    const injected = this.take('writeFileUtf8', target);
    if (injected) return errAsync(injected);

    const parent = this.entries.get(path.posix.dirname(target));
    if (!parent || parent.kind !== 'directory') return errAsync(notFound(path.posix.dirname(target)));
    this.entries.set(target, { kind: 'file', content, mtime: this.now() });
    return okAsync(undefined);
  }

  private ensureDir(dir: string): void {
    let current = '/';
    for (const segment of dir.split('/').filter(Boolean)) {
      current = path.posix.join(current, segment);
      if (!this.entries.has(current)) this.entries.set(current, { kind: 'directory', mtime: this.now() });
    }
  }

  private take(op: FsOperation, target: string): FsError | undefined {
    this.calls.push({ op, path: target });
    const key = `${op}:${target}`;
    const error = this.failures.get(key);
    if (error) this.failures.delete(key);
    return error;
  }
}

function normalize(target: string): string {
  const normalized = path.posix.normalize(target);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

export function fsError(code: FsError['code'], message: string): FsError {
  return { code, message };
}

function notFound(target: string): FsError {
  return fsError('FS_NOT_FOUND', `Not found: ${target}`);
}
