/**
 * Atom tree helpers
 */

import type { AtomNode, AtomTree } from '../types.js';

/**
 * Depth-first, document-order traversal
 */
export function* walk(tree: AtomTree): Generator<AtomNode> {
  const pending: AtomNode[] = [...tree.nodes].reverse();
  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) {
      break;
    }
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      pending.push(node.children[i]);
    }
  }
}

export function countAtoms(tree: AtomTree): number {
  let count = 0;
  for (const _node of walk(tree)) {
    count++;
  }
  return count;
}

export function maxDepth(tree: AtomTree): number {
  let depth = 0;
  for (const node of walk(tree)) {
    depth = Math.max(depth, node.depth);
  }
  return depth;
}

/** Mnemonic-and-nesting view of a tree, used to compare trees structurally */
export interface TreeShape {
  mnemonic: string;
  children: TreeShape[];
}

export function treeShape(tree: AtomTree): TreeShape[] {
  const shapeOf = (node: AtomNode): TreeShape => ({
    mnemonic: node.definition.mnemonic,
    children: node.children.map(shapeOf),
  });
  return tree.nodes.map(shapeOf);
}

/**
 * Rebuild a tree from a flat document-order list of (depth, node factory) entries
 *
 * Each entry's depth must be at most one more than the previous entry's.
 */
export function buildTree<T>(
  entries: readonly T[],
  depthOf: (entry: T) => number,
  makeNode: (entry: T, depth: number) => AtomNode
): AtomTree {
  const nodes: AtomNode[] = [];
  const stack: AtomNode[] = [];

  for (const entry of entries) {
    const depth = depthOf(entry);
    stack.length = Math.min(stack.length, depth);
    const node = makeNode(entry, stack.length);
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      nodes.push(node);
    }
    stack.push(node);
  }

  return { nodes };
}
