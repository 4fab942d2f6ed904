import type { SplayTree } from "./splayTree.ts";
import type { NodeView } from "./types.ts";

export interface Entry<K, V> {
  key: K;
  value: V;
}

// These walk the tree's read-only root view, so none of them splays.

export function* entries<K, V>(tree: SplayTree<K, V>): Generator<Entry<K, V>> {
  const stack: NodeView<K, V>[] = [];
  let node = tree.root;
  while (node || stack.length > 0) {
    while (node) {
      stack.push(node);
      node = node.left;
    }
    const top = stack.pop();
    if (!top) {
      return;
    }
    yield { key: top.key, value: top.value };
    node = top.right;
  }
}

/** Inclusive on both ends; yields nothing when `end` sorts before `start`. */
export function* range<K, V>(
  tree: SplayTree<K, V>,
  start: K,
  end: K,
): Generator<Entry<K, V>> {
  const { compare } = tree;
  if (compare(end, start) < 0) {
    return;
  }
  const stack: NodeView<K, V>[] = [];
  let node = tree.root;
  while (node || stack.length > 0) {
    while (node) {
      stack.push(node);
      // everything on the left is <= node.key, so skip it below the range
      node = compare(node.key, start) < 0 ? null : node.left;
    }
    const top = stack.pop();
    if (!top) {
      return;
    }
    if (compare(top.key, end) > 0) {
      return;
    }
    if (compare(top.key, start) >= 0) {
      yield { key: top.key, value: top.value };
    }
    node = top.right;
  }
}

export function* keys<K, V>(tree: SplayTree<K, V>): Generator<K> {
  for (const { key } of entries(tree)) {
    yield key;
  }
}

export function* values<K, V>(tree: SplayTree<K, V>): Generator<V> {
  for (const { value } of entries(tree)) {
    yield value;
  }
}
