import { DEFAULT_DEPTH_ALERT } from "../constants.ts";
import type { DiagnosticsSink } from "../diagnostics.ts";
import { SplayAllocationError, SplayTreeStateError } from "../errors.ts";
import { defaultCompare, formatKey, type Comparator } from "../utils/compare.ts";
import { createNode } from "./allocate.ts";
import { checkHealth } from "./health.ts";
import { copySubtree, releaseSubtree } from "./nodes.ts";
import { insertAndSplay, searchAndSplay, splayMax, splayMin } from "./topdown.ts";
import type {
  HealthReport,
  NodeView,
  NodeVisitor,
  SplayMetrics,
  SplayNode,
  SplayResult,
  SplayStats,
} from "./types.ts";

export interface SplayTreeOptions<K> {
  compare?: Comparator<K>;
  diagnostics?: DiagnosticsSink;
  limits?: {
    /** Alert when a single splay walks deeper than this. */
    depth?: number;
  };
}

const NOT_FOUND = { found: false } as const;

/**
 * Ordered multimap kept as a top-down splay tree. Every keyed access,
 * including `find`, `min` and `max`, reshapes the tree so the touched node
 * ends up at the root. Duplicate keys are allowed; which of several equal
 * records a lookup lands on is unspecified.
 */
export class SplayTree<K, V> {
  readonly compare: Comparator<K>;
  #root: SplayNode<K, V> | null = null;
  #size = 0;
  #diagnostics?: DiagnosticsSink;
  #depthLimit: number;
  #stats: SplayStats = {
    splays: 0,
    comparisons: 0,
    rotations: 0,
    inserts: 0,
    erases: 0,
    maxDepth: 0,
  };

  constructor(options: SplayTreeOptions<K> = {}) {
    this.compare = options.compare ?? defaultCompare;
    this.#diagnostics = options.diagnostics;
    this.#depthLimit = options.limits?.depth ?? DEFAULT_DEPTH_ALERT;
  }

  static from<K, V>(
    entries: Iterable<readonly [K, V]>,
    options?: SplayTreeOptions<K>,
  ): SplayTree<K, V> {
    const tree = new SplayTree<K, V>(options);
    for (const [key, value] of entries) {
      tree.insert(key, value);
    }
    return tree;
  }

  get size(): number {
    return this.#size;
  }

  get root(): NodeView<K, V> | null {
    return this.#root;
  }

  isEmpty(): boolean {
    return this.#size === 0;
  }

  getStats(): SplayStats {
    return { ...this.#stats };
  }

  find(key: K): SplayResult<K, V> {
    const outcome = searchAndSplay(this.#root, key, this.compare);
    this.#root = outcome.root;
    this.#record("find", outcome);
    if (!outcome.found) {
      return NOT_FOUND;
    }
    return { found: true, key: outcome.root.key, value: outcome.root.value };
  }

  /** Adds a record even when the key is already present. */
  insert(key: K, value: V): void {
    let node: SplayNode<K, V>;
    try {
      node = createNode(key, value);
    } catch (err) {
      throw new SplayAllocationError(`Cannot allocate node for key ${formatKey(key)}`, {
        cause: err,
      });
    }
    const outcome = insertAndSplay(this.#root, node, this.compare);
    this.#root = outcome.root;
    this.#size += 1;
    this.#stats.inserts += 1;
    this.#record("insert", outcome);
  }

  /**
   * Replaces the value of one record with `key`. Returns false when the key is
   * absent; the tree is still splayed to the nearest probe.
   */
  update(key: K, value: V): boolean {
    const outcome = searchAndSplay(this.#root, key, this.compare);
    this.#root = outcome.root;
    if (outcome.found) {
      outcome.root.value = value;
    }
    this.#record("update", outcome);
    return outcome.found;
  }

  /** Removes one record with `key` and hands back what it held. */
  erase(key: K): SplayResult<K, V> {
    const outcome = searchAndSplay(this.#root, key, this.compare);
    this.#root = outcome.root;
    if (!outcome.found) {
      this.#record("erase", outcome);
      return NOT_FOUND;
    }
    const target = outcome.root;
    const metrics: SplayMetrics = {
      comparisons: outcome.comparisons,
      rotations: outcome.rotations,
      depth: outcome.depth,
    };
    if (target.right) {
      // the successor comes up with an empty left slot
      const successor = splayMin(target.right);
      successor.root.left = target.left;
      this.#root = successor.root;
      metrics.rotations += successor.rotations;
      metrics.depth = Math.max(metrics.depth, successor.depth);
    } else {
      this.#root = target.left;
    }
    target.left = null;
    target.right = null;
    this.#size -= 1;
    this.#stats.erases += 1;
    this.#record("erase", metrics);
    return { found: true, key: target.key, value: target.value };
  }

  min(): SplayResult<K, V> {
    if (!this.#root) {
      return NOT_FOUND;
    }
    const outcome = splayMin(this.#root);
    this.#root = outcome.root;
    this.#record("min", outcome);
    return { found: true, key: outcome.root.key, value: outcome.root.value };
  }

  max(): SplayResult<K, V> {
    if (!this.#root) {
      return NOT_FOUND;
    }
    const outcome = splayMax(this.#root);
    this.#root = outcome.root;
    this.#record("max", outcome);
    return { found: true, key: outcome.root.key, value: outcome.root.value };
  }

  healthCheck(): HealthReport {
    return checkHealth(this.#root, this.#size, this.compare);
  }

  /** Deep-copies every node into `target`, which must be empty. */
  copyTo(target: SplayTree<K, V>): void {
    this.#assertEmptyTarget(target, "copy");
    let root: SplayNode<K, V> | null;
    try {
      root = copySubtree(this.#root);
    } catch (err) {
      throw new SplayAllocationError("Cannot allocate nodes for tree copy", {
        cause: err,
      });
    }
    target.#root = root;
    target.#size = this.#size;
  }

  /** Hands the whole tree to `target`, which must be empty, and empties this one. */
  moveTo(target: SplayTree<K, V>): void {
    this.#assertEmptyTarget(target, "move");
    target.#root = this.#root;
    target.#size = this.#size;
    this.#root = null;
    this.#size = 0;
  }

  clear(): void {
    releaseSubtree(this.#root);
    this.#root = null;
    this.#size = 0;
  }

  /**
   * Depth-first, parent before children, left before right. Does not splay.
   */
  traverse(visitor: NodeVisitor<K, V>): void {
    const stack: Array<{ node: SplayNode<K, V>; depth: number }> = this.#root
      ? [{ node: this.#root, depth: 0 }]
      : [];
    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      const { node, depth } = frame;
      const keepGoing = visitor({
        key: node.key,
        value: node.value,
        left: node.left,
        right: node.right,
        depth,
      });
      if (keepGoing === false) {
        return;
      }
      if (node.right) {
        stack.push({ node: node.right, depth: depth + 1 });
      }
      if (node.left) {
        stack.push({ node: node.left, depth: depth + 1 });
      }
    }
  }

  /**
   * Plain-text node listing for debugging. Nodes are numbered in preorder for
   * this dump only.
   */
  dump(): string {
    const ids = this.#preorderIds();
    const label = (node: NodeView<K, V> | null): string =>
      node ? `#${ids.get(node) ?? "?"}` : "nil";
    const lines = [`Tree size: ${this.#size}`];
    let id = 0;
    this.traverse((node) => {
      id += 1;
      lines.push(
        `${" ".repeat(node.depth)}Node #${id} has key ${formatKey(node.key)}, ` +
          `left ${label(node.left)}, right ${label(node.right)}`,
      );
    });
    return lines.join("\n");
  }

  #preorderIds(): Map<NodeView<K, V>, number> {
    const ids = new Map<NodeView<K, V>, number>();
    const stack: SplayNode<K, V>[] = this.#root ? [this.#root] : [];
    for (let node = stack.pop(); node; node = stack.pop()) {
      ids.set(node, ids.size + 1);
      if (node.right) {
        stack.push(node.right);
      }
      if (node.left) {
        stack.push(node.left);
      }
    }
    return ids;
  }

  #assertEmptyTarget(target: SplayTree<K, V>, operation: string): void {
    if (target === this) {
      throw new SplayTreeStateError(`Cannot ${operation} a tree into itself`);
    }
    if (target.#root !== null || target.#size !== 0) {
      throw new SplayTreeStateError(
        `Cannot ${operation} into a tree holding ${target.#size} records`,
      );
    }
  }

  #record(reason: string, metrics: SplayMetrics): void {
    const stats = this.#stats;
    stats.splays += 1;
    stats.comparisons += metrics.comparisons;
    stats.rotations += metrics.rotations;
    stats.maxDepth = Math.max(stats.maxDepth, metrics.depth);
    if (!this.#diagnostics) {
      return;
    }
    const snapshot = {
      reason,
      size: this.#size,
      splay: {
        comparisons: metrics.comparisons,
        rotations: metrics.rotations,
        depth: metrics.depth,
      },
      stats: { ...stats },
      heapUsedBytes: process.memoryUsage().heapUsed,
    };
    this.#diagnostics.onSnapshot?.(snapshot);
    if (metrics.depth > this.#depthLimit) {
      this.#diagnostics.onAlert?.(
        `Splay depth ${metrics.depth} exceeds limit ${this.#depthLimit}`,
        snapshot,
      );
    }
  }
}
