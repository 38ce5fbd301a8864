import type { ResultAsync } from 'neverthrow';
import type { FsError } from './fs.port.js';

/**
 * Port: the host's environment-variable store.
 *
 * The cache root lives here between sessions. Reads are synchronous (the store is loaded
 * once); writes persist.
 */
export interface EnvironmentStorePort {
  get(name: string): string | undefined;
  set(name: string, value: string): ResultAsync<void, FsError>;
}
