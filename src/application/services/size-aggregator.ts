import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { CacheReadPort } from '../../ports/fs.port.js';
import type { ValidatedConfig } from '../../config/app-config.js';

export { formatSize } from '../../domain/format.js';

/**
 * Total bytes of every file below a directory, at any depth.
 *
 * Entries that vanish or cannot be read mid-walk are skipped. A missing root counts as 0:
 * callers only ask about paths they have just listed.
 */
@injectable()
export class SizeAggregator {
  private readonly maxDepth: number;

  constructor(
    @inject(DI.Ports.FileSystem) private readonly fs: CacheReadPort,
    @inject(DI.Config.App) config: ValidatedConfig
  ) {
    this.maxDepth = config.scan.maxDepth;
  }

  async size(dirPath: string): Promise<number> {
    let total = 0;
    const pending: Array<{ dir: string; depth: number }> = [{ dir: dirPath, depth: 0 }];

    while (pending.length > 0) {
      const current = pending.pop();
      if (!current) break;

      const entries = await this.fs.readdir(current.dir).unwrapOr([]);
      for (const entry of entries) {
        const entryPath = path.join(current.dir, entry.name);
        if (entry.kind === 'directory') {
          // Symlinked directories are followed; the depth cap bounds a link cycle.
          if (current.depth + 1 < this.maxDepth) pending.push({ dir: entryPath, depth: current.depth + 1 });
          continue;
        }
        if (entry.kind !== 'file') continue;
        total += await this.fs.stat(entryPath).map((s) => s.sizeBytes).unwrapOr(0);
      }
    }

    return total;
  }
}
