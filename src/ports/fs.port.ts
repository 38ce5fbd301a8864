import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

export type DirEntryKind = 'file' | 'directory' | 'other';

/**
 * A directory entry with its kind already resolved.
 * Symbolic links are followed: a link to a directory reports `directory`.
 */
export interface DirEntry {
  readonly name: string;
  readonly kind: DirEntryKind;
}

export interface PathStat {
  readonly kind: DirEntryKind;
  readonly sizeBytes: number;
  readonly mtime: Date;
}

/**
 * Port: read side of the cache filesystem.
 * Used by: TreeBuilder, SizeAggregator, MetadataStore, DeletionPolicy.
 */
export interface CacheReadPort {
  /** Entries of a directory (names only, not full paths). */
  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError>;
  /** Follows symbolic links. */
  stat(targetPath: string): ResultAsync<PathStat, FsError>;
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
}

/**
 * Port: mutating operations.
 * Used by: CacheService (root creation), DeletionPolicy, EnvironmentStore.
 */
export interface CacheWritePort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  /** Recursive removal of a directory and everything under it. */
  removeTree(dirPath: string): ResultAsync<void, FsError>;
  writeFileUtf8(filePath: string, content: string): ResultAsync<void, FsError>;
}

export interface CacheFileSystemPort extends CacheReadPort, CacheWritePort {}
