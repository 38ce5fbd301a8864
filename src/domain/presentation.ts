import type { CacheNode, CacheNodeKind, CacheTree, NodeId } from './cache-node.js';
import { nodeIdOf } from './cache-node.js';
import { formatDate, formatSize } from './format.js';

/**
 * One display row of the cache tree, as handed to a presentation layer.
 */
export interface PresentationRow {
  readonly id: NodeId;
  readonly name: string;
  /** 0 for children of the cache root */
  readonly depth: number;
  readonly kind: CacheNodeKind;
  readonly comment: string;
  readonly formattedSize: string;
  readonly formattedDate: string;
  readonly inUse: boolean;
  readonly protected: boolean;
  /** Only unprotected leaves can be picked for deletion. */
  readonly selectable: boolean;
}

export function toPresentationRow(node: CacheNode, depth: number): PresentationRow {
  return {
    id: nodeIdOf(node),
    name: node.name,
    depth,
    kind: node.kind,
    comment: node.comment,
    formattedSize: formatSize(node.size),
    formattedDate: formatDate(node.modifiedTime),
    inUse: node.inUse,
    protected: node.protected,
    selectable: node.kind === 'leaf' && !node.protected,
  };
}

/**
 * Depth-first, pre-order rows for everything below the cache root.
 */
export function toPresentationRows(tree: CacheTree): PresentationRow[] {
  const rows: PresentationRow[] = [];
  const visit = (node: CacheNode, depth: number): void => {
    rows.push(toPresentationRow(node, depth));
    for (const child of node.children) visit(child, depth + 1);
  };
  for (const child of tree.root.children) visit(child, 0);
  return rows;
}
