import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { CacheTree } from '../../domain/cache-node.js';
import { walkLeaves } from '../../domain/cache-node.js';
import type { VersionReference } from '../../domain/version-reference.js';
import { parseVersionName, renderReferenceVersion } from '../../domain/version-name.js';

export interface MatchSummary {
  readonly leavesVisited: number;
  readonly matched: number;
}

/**
 * Marks the leaves that a live scene-graph consumer currently references.
 *
 * A leaf's logical pair is (parent directory name, parsed version of its own name).
 * Every pass starts from a clean slate, so a leaf that stopped being referenced is
 * cleared; setting the flag for several matching references is idempotent.
 */
@injectable()
export class ActiveVersionMatcher {
  private readonly prefix: string;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this.prefix = config.versions.prefix;
  }

  match(tree: CacheTree, references: readonly VersionReference[]): MatchSummary {
    const wanted = new Map<string, Set<string>>();
    for (const ref of references) {
      const version = renderReferenceVersion(ref.version);
      if (version === null) continue;
      const versions = wanted.get(ref.identifier) ?? new Set<string>();
      versions.add(version);
      wanted.set(ref.identifier, versions);
    }

    let leavesVisited = 0;
    let matched = 0;
    for (const { leaf, parent } of walkLeaves(tree.root)) {
      leavesVisited++;
      leaf.inUse = false;
      if (!parent) continue;

      const version = parseVersionName(leaf.name, this.prefix);
      if (version !== null && wanted.get(parent.name)?.has(version)) {
        leaf.inUse = true;
        matched++;
      }
    }

    return { leavesVisited, matched };
  }
}
