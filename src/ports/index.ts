export type {
  FsError,
  DirEntry,
  DirEntryKind,
  PathStat,
  CacheReadPort,
  CacheWritePort,
  CacheFileSystemPort,
} from './fs.port.js';
export type { EnvironmentStorePort } from './environment-store.port.js';
export type { InteractiveInputPort } from './interactive-input.port.js';
export type { ActiveReferenceSourcePort, ReferenceSourceError } from './reference-source.port.js';
