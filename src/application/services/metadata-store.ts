import * as path from 'path';
import { z } from 'zod';
import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { CacheReadPort } from '../../ports/fs.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ValidatedConfig } from '../../config/app-config.js';

export interface CacheMetadata {
  readonly comment: string;
  readonly protected: boolean;
}

export const DEFAULT_METADATA: CacheMetadata = { comment: '', protected: false };

/**
 * Sidecar schema. Each key degrades to its default on its own, so a file with a valid
 * `cache_protect` and a broken `comment` still reports the protection.
 */
const SidecarSchema = z.object({
  comment: z.string().optional().catch(undefined),
  cache_protect: z.union([z.literal(0), z.literal(1), z.boolean()]).optional().catch(undefined),
});

export function parseSidecar(raw: string): CacheMetadata | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = SidecarSchema.safeParse(json);
  if (!parsed.success) return null;
  const flag = parsed.data.cache_protect;
  return {
    comment: parsed.data.comment ?? '',
    protected: flag === 1 || flag === true,
  };
}

/**
 * Read model for the per-version sidecar file (`cacheinfo.json` by default).
 *
 * Metadata is advisory: a missing, unreadable or malformed sidecar yields the defaults and
 * is only logged at debug level.
 */
@injectable()
export class MetadataStore {
  private readonly logger: Logger;
  private readonly sidecarFileName: string;

  constructor(
    @inject(DI.Ports.FileSystem) private readonly fs: CacheReadPort,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.sidecarFileName = config.metadata.sidecarFileName;
    this.logger = loggerFactory.create('MetadataStore');
  }

  sidecarPath(dirPath: string): string {
    return path.join(dirPath, this.sidecarFileName);
  }

  async read(dirPath: string): Promise<CacheMetadata> {
    const sidecar = this.sidecarPath(dirPath);
    return this.fs.readFileUtf8(sidecar).match(
      (raw) => {
        const metadata = parseSidecar(raw);
        if (!metadata) {
          this.logger.debug({ sidecar }, 'Sidecar is not valid metadata; using defaults');
          return DEFAULT_METADATA;
        }
        return metadata;
      },
      (e) => {
        if (e.code !== 'FS_NOT_FOUND') {
          this.logger.debug({ sidecar, code: e.code }, 'Sidecar unreadable; using defaults');
        }
        return DEFAULT_METADATA;
      }
    );
  }

  async readComment(dirPath: string): Promise<string> {
    return (await this.read(dirPath)).comment;
  }

  async readProtection(dirPath: string): Promise<boolean> {
    return (await this.read(dirPath)).protected;
  }
}
