import { formatKey, type Comparator } from "../utils/compare.ts";
import { countNodes } from "./nodes.ts";
import type { HealthReport, SplayNode } from "./types.ts";

type Bound<K> = { key: K } | null;

function sizeViolation<K, V>(
  root: SplayNode<K, V> | null,
  size: number,
): string | null {
  if (root && size === 0) {
    return "Size counter is zero but tree has non-nil root.";
  }
  if (!root && size !== 0) {
    return `Size counter is ${size} but tree has nil root.`;
  }
  const reachable = countNodes(root);
  if (reachable !== size) {
    return `Size counter is ${size} but tree has ${reachable} reachable nodes.`;
  }
  return null;
}

// Bounds are inclusive: an equal key may sit on either side of its ancestor.
function orderingViolation<K, V>(
  root: SplayNode<K, V> | null,
  compare: Comparator<K>,
): string | null {
  const stack: Array<{ node: SplayNode<K, V>; lower: Bound<K>; upper: Bound<K> }> =
    root ? [{ node: root, lower: null, upper: null }] : [];
  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    const { node, lower, upper } = frame;
    if (
      (lower && compare(node.key, lower.key) < 0) ||
      (upper && compare(upper.key, node.key) < 0)
    ) {
      const min = lower ? formatKey(lower.key) : "-inf";
      const max = upper ? formatKey(upper.key) : "+inf";
      return (
        `Node with key ${formatKey(node.key)} violates the BST property; ` +
        `should be in range [${min}, ${max}].`
      );
    }
    if (node.right) {
      stack.push({ node: node.right, lower: { key: node.key }, upper });
    }
    if (node.left) {
      stack.push({ node: node.left, lower, upper: { key: node.key } });
    }
  }
  return null;
}

/**
 * Linear-time audit of a tree's size counter and key ordering. Reports the
 * first violation only; nothing is repaired.
 */
export function checkHealth<K, V>(
  root: SplayNode<K, V> | null,
  size: number,
  compare: Comparator<K>,
): HealthReport {
  if (!root && size === 0) {
    return { ok: true, message: "" };
  }
  const message = sizeViolation(root, size) ?? orderingViolation(root, compare);
  return message === null ? { ok: true, message: "" } : { ok: false, message };
}
