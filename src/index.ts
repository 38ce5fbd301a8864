// DI Container exports
export { initializeContainer, container, resetContainer, type ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Services
export { CacheService, CacheServiceEvents } from './application/services/cache-service.js';
export type { DeletionOutcome, RefreshError } from './application/services/cache-service.js';
export { CacheRootResolver, composeCacheRoot, sceneStem } from './application/services/cache-root-resolver.js';
export type { ResolveError } from './application/services/cache-root-resolver.js';
export { TreeBuilder, type TreeBuildError, type TreeBuildOptions } from './application/services/tree-builder.js';
export { MetadataStore, parseSidecar, type CacheMetadata } from './application/services/metadata-store.js';
export { SizeAggregator } from './application/services/size-aggregator.js';
export { ActiveVersionMatcher, type MatchSummary } from './application/services/active-version-matcher.js';
export { DeletionPolicy, type DeletedNode, type DeletionError } from './application/services/deletion-policy.js';

// Domain
export type { CacheNode, CacheNodeKind, CacheTree, NodeId } from './domain/cache-node.js';
export { nodeIdOf, findNode } from './domain/cache-node.js';
export type { VersionReference } from './domain/version-reference.js';
export { parseVersionName, renderReferenceVersion } from './domain/version-name.js';
export { formatSize, formatDate } from './domain/format.js';
export { toPresentationRows, type PresentationRow } from './domain/presentation.js';
export { buildOpenFolderCommand } from './domain/open-folder-command.js';

// Ports
export type {
  CacheFileSystemPort,
  CacheReadPort,
  CacheWritePort,
  FsError,
  EnvironmentStorePort,
  InteractiveInputPort,
  ActiveReferenceSourcePort,
  ReferenceSourceError,
} from './ports/index.js';

// Config
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
