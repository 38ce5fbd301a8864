/**
 * Architecture tests for the layering:
 * - domain/** is pure: no Node I/O, no DI, no infra
 * - ports/** are interfaces only: no infra, no Node I/O
 * - application/** reaches effects through ports only: no infra, no Node fs
 * - nothing outside the composition roots resolves from the container
 */
import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const SRC_ROOT = fileURLToPath(new URL('../../src/', import.meta.url));

interface ForbiddenImportRule {
  readonly name: string;
  readonly pattern: RegExp;
}

const INFRA: ForbiddenImportRule = { name: 'infra imports', pattern: /from\s+['"](?:\.\.\/)+infra/ };
const NODE_FS: ForbiddenImportRule = { name: 'Node fs', pattern: /from\s+['"](?:node:)?fs(?:\/promises)?['"]/ };
const CONTAINER: ForbiddenImportRule = { name: 'DI container', pattern: /from\s+['"](?:\.\.\/)+di\/container/ };
const TSYRINGE: ForbiddenImportRule = { name: 'tsyringe', pattern: /from\s+['"]tsyringe['"]/ };

const FORBIDDEN_IMPORTS: Record<string, readonly ForbiddenImportRule[]> = {
  domain: [INFRA, NODE_FS, CONTAINER, TSYRINGE],
  ports: [INFRA, NODE_FS, CONTAINER],
  application: [INFRA, NODE_FS, CONTAINER],
  infra: [CONTAINER],
};

function tsFilesUnder(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) return tsFilesUnder(full);
    return entry.name.endsWith('.ts') ? [full] : [];
  });
}

describe('layer boundaries', () => {
  for (const [layer, rules] of Object.entries(FORBIDDEN_IMPORTS)) {
    it(`${layer}/** keeps its imports`, () => {
      const files = tsFilesUnder(path.join(SRC_ROOT, layer));
      expect(files.length).toBeGreaterThan(0);

      const violations: string[] = [];
      for (const file of files) {
        const source = fs.readFileSync(file, 'utf8');
        for (const rule of rules) {
          if (rule.pattern.test(source)) {
            violations.push(`${path.relative(SRC_ROOT, file)}: ${rule.name}`);
          }
        }
      }

      expect(violations).toEqual([]);
    });
  }
});
