import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { CacheFileSystemPort, DirEntry, DirEntryKind, FsError, PathStat } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node errors expose a string `code`; treat it as best-effort.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, targetPath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${targetPath}` };
  if (code === 'ENOTDIR') return { code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${targetPath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${targetPath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${targetPath}: ${e instanceof Error ? e.message : String(e)}` };
}

function kindOfStats(stats: Stats): DirEntryKind {
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

/**
 * Resolve a dirent's kind, following symbolic links. A dangling link (or one that vanished
 * between readdir and stat) reports `other`.
 */
async function kindOfDirent(dirPath: string, entry: Dirent): Promise<DirEntryKind> {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return 'other';
  try {
    return kindOfStats(await fs.stat(path.join(dirPath, entry.name)));
  } catch {
    return 'other';
  }
}

export class NodeCacheFileSystem implements CacheFileSystemPort {
  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    return RA.fromPromise(
      (async () => {
        const entries = await fs.readdir(dirPath, { withFileTypes: true });
        return Promise.all(
          entries.map(async (entry): Promise<DirEntry> => ({ name: entry.name, kind: await kindOfDirent(dirPath, entry) }))
        );
      })(),
      (e) => mapFsError(e, dirPath)
    );
  }

  stat(targetPath: string): ResultAsync<PathStat, FsError> {
    return RA.fromPromise(fs.stat(targetPath), (e) => mapFsError(e, targetPath)).map((s) => ({
      kind: kindOfStats(s),
      sizeBytes: s.size,
      mtime: s.mtime,
    }));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  removeTree(dirPath: string): ResultAsync<void, FsError> {
    // No `force`: a path that vanished must surface as FS_NOT_FOUND, not silently succeed.
    return RA.fromPromise(fs.rm(dirPath, { recursive: true }), (e) => mapFsError(e, dirPath));
  }

  writeFileUtf8(filePath: string, content: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, content, 'utf8'), (e) => mapFsError(e, filePath));
  }
}
