import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { CacheReadPort } from '../../../ports/fs.port.js';
import type { ActiveReferenceSourcePort, ReferenceSourceError } from '../../../ports/reference-source.port.js';
import { VersionReferenceListSchema, type VersionReference } from '../../../domain/version-reference.js';

/**
 * Reads active references exported by the scene-graph host as a JSON array of
 * `{ "identifier": string, "version": string | number }`.
 */
export class JsonFileReferenceSource implements ActiveReferenceSourcePort {
  constructor(
    private readonly filePath: string,
    private readonly fs: CacheReadPort
  ) {}

  list(): ResultAsync<readonly VersionReference[], ReferenceSourceError> {
    return this.fs
      .readFileUtf8(this.filePath)
      .mapErr((e): ReferenceSourceError => ({ code: 'REFERENCES_UNREADABLE', message: e.message }))
      .andThen((raw) => {
        let json: unknown;
        try {
          json = JSON.parse(raw);
        } catch (e) {
          return errAsync<readonly VersionReference[], ReferenceSourceError>({
            code: 'REFERENCES_INVALID',
            message: `Invalid JSON in ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`,
          });
        }
        const parsed = VersionReferenceListSchema.safeParse(json);
        if (!parsed.success) {
          const first = parsed.error.errors[0];
          const where = first && first.path.length ? first.path.join('.') : '(root)';
          return errAsync<readonly VersionReference[], ReferenceSourceError>({
            code: 'REFERENCES_INVALID',
            message: `Invalid reference list in ${this.filePath} at ${where}: ${first?.message ?? 'unknown'}`,
          });
        }
        return okAsync<readonly VersionReference[], ReferenceSourceError>(parsed.data);
      });
  }
}

/**
 * Fixed list of references. With no list, nothing is in use.
 */
export class StaticReferenceSource implements ActiveReferenceSourcePort {
  constructor(private readonly references: readonly VersionReference[] = []) {}

  list(): ResultAsync<readonly VersionReference[], ReferenceSourceError> {
    return okAsync(this.references);
  }
}
