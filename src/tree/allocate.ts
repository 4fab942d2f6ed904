import type { SplayNode } from "./types.ts";

/** The only place nodes are constructed; insert and copy both go through it. */
export function createNode<K, V>(key: K, value: V): SplayNode<K, V> {
  return { key, value, left: null, right: null };
}
