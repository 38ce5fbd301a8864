import * as path from 'path';
import { z } from 'zod';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { CacheFileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { EnvironmentStorePort } from '../../../ports/environment-store.port.js';

const PersistedVariablesSchema = z.record(z.string());

/**
 * Environment store backed by the live process environment plus a JSON file of persisted
 * variables (`<home>/env.json`).
 *
 * Lookup: live environment first, then the file. `set` writes both, so a value set during a
 * session is visible immediately and survives the next start.
 */
export class LocalEnvironmentStore implements EnvironmentStorePort {
  private constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly filePath: string,
    private readonly fs: CacheFileSystemPort,
    private readonly persisted: Map<string, string>
  ) {}

  static load(
    env: Record<string, string | undefined>,
    filePath: string,
    fs: CacheFileSystemPort
  ): ResultAsync<LocalEnvironmentStore, FsError> {
    return fs
      .readFileUtf8(filePath)
      .map((raw) => parsePersisted(raw))
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(new Map<string, string>()) : errAsync(e)))
      .map((persisted) => new LocalEnvironmentStore(env, filePath, fs, persisted));
  }

  get(name: string): string | undefined {
    const live = this.env[name];
    if (live !== undefined && live.trim() !== '') return live;
    return this.persisted.get(name);
  }

  /** Nothing changes in memory unless the file write succeeded. */
  set(name: string, value: string): ResultAsync<void, FsError> {
    const next = new Map(this.persisted).set(name, value);
    const body = JSON.stringify(Object.fromEntries(next), null, 2) + '\n';
    return this.fs
      .mkdirp(path.dirname(this.filePath))
      .andThen(() => this.fs.writeFileUtf8(this.filePath, body))
      .map(() => {
        this.persisted.set(name, value);
        this.env[name] = value;
      });
  }
}

/** An unparsable file reads as empty; the next `set` rewrites it. */
function parsePersisted(raw: string): Map<string, string> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return new Map();
  }
  const parsed = PersistedVariablesSchema.safeParse(json);
  return parsed.success ? new Map(Object.entries(parsed.data)) : new Map();
}
