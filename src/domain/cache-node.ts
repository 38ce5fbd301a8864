/**
 * In-memory model of the cache directory tree.
 *
 * The tree is the single source of truth: it is replaced wholesale on refresh and only ever
 * mutated by the matcher (`inUse`) and by a deletion (child removal, ancestor sizes).
 */

export type CacheNodeKind = 'branch' | 'leaf';

export interface CacheNode {
  readonly name: string;
  readonly kind: CacheNodeKind;
  /** Sorted by name. Owned by this node; empty for leaves. */
  readonly children: CacheNode[];
  /** Bytes of every file at or below this directory. Ancestors shrink when a leaf is deleted. */
  size: number;
  readonly modifiedTime: Date;
  /** Leaf only; branches always carry "". */
  readonly comment: string;
  /** Leaf only; branches always carry false. */
  readonly protected: boolean;
  /** Segments from the cache root. The implicit root has []. */
  readonly relativePath: readonly string[];
  inUse: boolean;
}

export interface CacheTree {
  readonly rootPath: string;
  readonly root: CacheNode;
  readonly scannedAt: Date;
}

/** Stable id used by the presentation layer: relative path segments joined with '/'. */
export type NodeId = string;

export function nodeIdOf(node: Pick<CacheNode, 'relativePath'>): NodeId {
  return node.relativePath.join('/');
}

export function splitNodeId(id: NodeId): readonly string[] {
  return id.split('/').filter((segment) => segment.length > 0);
}

/**
 * Find a node by its relative path segments, walking down from the root.
 */
export function findNodeByPath(root: CacheNode, segments: readonly string[]): CacheNode | undefined {
  let current: CacheNode | undefined = root;
  for (const segment of segments) {
    current = current.children.find((child) => child.name === segment);
    if (!current) return undefined;
  }
  return current;
}

export function findNode(root: CacheNode, id: NodeId): CacheNode | undefined {
  return findNodeByPath(root, splitNodeId(id));
}

/**
 * Parent of the node at `segments`; undefined for the root or a path not in the tree.
 */
export function findParent(root: CacheNode, segments: readonly string[]): CacheNode | undefined {
  if (segments.length === 0) return undefined;
  return findNodeByPath(root, segments.slice(0, -1));
}

export interface LeafVisit {
  readonly leaf: CacheNode;
  /** undefined for a leaf that sits directly under the root */
  readonly parent: CacheNode | undefined;
}

/**
 * Depth-first walk over every leaf below `root` (the root itself is never yielded).
 */
export function* walkLeaves(root: CacheNode): Generator<LeafVisit> {
  const stack: Array<{ node: CacheNode; parent: CacheNode | undefined }> = root.children
    .map((child) => ({ node: child, parent: root.relativePath.length === 0 ? undefined : root }))
    .reverse();

  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    if (top.node.kind === 'leaf') {
      yield { leaf: top.node, parent: top.parent };
      continue;
    }
    for (let i = top.node.children.length - 1; i >= 0; i--) {
      const child = top.node.children[i];
      if (child) stack.push({ node: child, parent: top.node });
    }
  }
}

export interface TreeCounts {
  readonly branches: number;
  readonly leaves: number;
}

/** Counts descendants of `root` (the root itself excluded). */
export function countNodes(root: CacheNode): TreeCounts {
  let branches = 0;
  let leaves = 0;
  const stack = [...root.children];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.kind === 'leaf') {
      leaves++;
    } else {
      branches++;
      stack.push(...node.children);
    }
  }
  return { branches, leaves };
}

/**
 * Remove `node` from its parent's children and subtract its size from every ancestor.
 * Returns false when the node is not (or no longer) attached to `root`.
 */
export function detachNode(root: CacheNode, node: CacheNode): boolean {
  const parent = findParent(root, node.relativePath);
  if (!parent) return false;
  const index = parent.children.indexOf(node);
  if (index < 0) return false;
  parent.children.splice(index, 1);

  let ancestor: CacheNode | undefined = root;
  const segments = node.relativePath.slice(0, -1);
  ancestor.size = Math.max(0, ancestor.size - node.size);
  for (const segment of segments) {
    ancestor = ancestor.children.find((child) => child.name === segment);
    if (!ancestor) break;
    ancestor.size = Math.max(0, ancestor.size - node.size);
  }
  return true;
}
