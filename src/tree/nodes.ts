import { SplayInvariantError } from "../errors.ts";
import { createNode } from "./allocate.ts";
import type { SplayNode } from "./types.ts";

/** Rotates `top` down to the left; its right child becomes the subtree root. */
export function rotateLeft<K, V>(top: SplayNode<K, V>): SplayNode<K, V> {
  const pivot = top.right;
  if (!pivot) {
    throw new SplayInvariantError("Left rotation needs a right child");
  }
  top.right = pivot.left;
  pivot.left = top;
  return pivot;
}

export function rotateRight<K, V>(top: SplayNode<K, V>): SplayNode<K, V> {
  const pivot = top.left;
  if (!pivot) {
    throw new SplayInvariantError("Right rotation needs a left child");
  }
  top.left = pivot.right;
  pivot.right = top;
  return pivot;
}

// Whole-subtree walks use explicit stacks: a splay tree may be a chain as
// tall as its size.

export function countNodes<K, V>(root: SplayNode<K, V> | null): number {
  let count = 0;
  const stack: SplayNode<K, V>[] = root ? [root] : [];
  for (let node = stack.pop(); node; node = stack.pop()) {
    count += 1;
    if (node.right) {
      stack.push(node.right);
    }
    if (node.left) {
      stack.push(node.left);
    }
  }
  return count;
}

/** Unlinks every node below `root`, children before parents. */
export function releaseSubtree<K, V>(root: SplayNode<K, V> | null): void {
  const stack: SplayNode<K, V>[] = root ? [root] : [];
  for (let node = stack.pop(); node; node = stack.pop()) {
    if (node.left) {
      stack.push(node.left);
    }
    if (node.right) {
      stack.push(node.right);
    }
    node.left = null;
    node.right = null;
  }
}

/**
 * Postorder deep copy. Keys and values are carried over by reference; only
 * the link structure is duplicated.
 */
export function copySubtree<K, V>(
  root: SplayNode<K, V> | null,
): SplayNode<K, V> | null {
  if (!root) {
    return null;
  }
  const copies = new Map<SplayNode<K, V>, SplayNode<K, V>>();
  const stack: Array<{ node: SplayNode<K, V>; expanded: boolean }> = [
    { node: root, expanded: false },
  ];
  try {
    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      const { node } = frame;
      if (!frame.expanded) {
        stack.push({ node, expanded: true });
        if (node.right) {
          stack.push({ node: node.right, expanded: false });
        }
        if (node.left) {
          stack.push({ node: node.left, expanded: false });
        }
        continue;
      }
      const copy = createNode(node.key, node.value);
      copy.left = node.left ? (copies.get(node.left) ?? null) : null;
      copy.right = node.right ? (copies.get(node.right) ?? null) : null;
      copies.set(node, copy);
    }
  } catch (err) {
    for (const copy of copies.values()) {
      copy.left = null;
      copy.right = null;
    }
    copies.clear();
    throw err;
  }
  return copies.get(root) ?? null;
}
