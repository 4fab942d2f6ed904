import { Direction } from "../constants.ts";
import { SplayInvariantError } from "../errors.ts";
import type { Comparator } from "../utils/compare.ts";
import { rotateLeft, rotateRight } from "./nodes.ts";
import type { SearchOutcome, SplayMetrics, SplayNode } from "./types.ts";

/**
 * One of the two partial trees that collect nodes stripped off the search
 * path. The left remainder grows along right links (keys arrive in
 * non-decreasing order), the right remainder along left links.
 *
 * `#tip` is the node whose `growth` slot is next to fill; `null` means the
 * remainder is still empty and the next node becomes its root.
 */
export class RemainderTree<K, V> {
  root: SplayNode<K, V> | null = null;
  #tip: SplayNode<K, V> | null = null;

  constructor(readonly growth: Direction) {}

  get tip(): SplayNode<K, V> | null {
    return this.#tip;
  }

  append(node: SplayNode<K, V>): void {
    if (!this.#tip) {
      if (this.root) {
        throw new SplayInvariantError("Remainder tree lost its tip");
      }
      this.root = node;
    } else {
      if (this.#tip[this.growth]) {
        throw new SplayInvariantError("Remainder tip slot is already occupied");
      }
      this.#tip[this.growth] = node;
    }
    node[this.growth] = null;
    this.#tip = node;
  }

  /** Hangs `subtree` in the empty tip slot without moving the tip. */
  graft(subtree: SplayNode<K, V> | null): void {
    if (!this.#tip) {
      this.root = subtree;
      return;
    }
    this.#tip[this.growth] = subtree;
  }
}

interface HistoryEntry<K, V> {
  node: SplayNode<K, V>;
  direction: Direction;
}

/**
 * State for one top-down splay: two remainder trees plus a two-level history
 * of the ancestors the working root stepped down from since the last flush.
 */
export class TopDownSplay<K, V> {
  readonly left = new RemainderTree<K, V>(Direction.Right);
  readonly right = new RemainderTree<K, V>(Direction.Left);
  #first: HistoryEntry<K, V> | null = null;
  #second: HistoryEntry<K, V> | null = null;
  #rotations = 0;
  #depth = 0;

  get rotations(): number {
    return this.#rotations;
  }

  get depth(): number {
    return this.#depth;
  }

  get hasHistory(): boolean {
    return this.#first !== null;
  }

  /** Directions currently held in history, grandparent level first. */
  get history(): Direction[] {
    const directions: Direction[] = [];
    if (this.#first) {
      directions.push(this.#first.direction);
    }
    if (this.#second) {
      directions.push(this.#second.direction);
    }
    return directions;
  }

  stepTowardRight(ancestor: SplayNode<K, V>): SplayNode<K, V> | null {
    this.#record(ancestor, Direction.Right);
    return ancestor.right;
  }

  stepTowardLeft(ancestor: SplayNode<K, V>): SplayNode<K, V> | null {
    this.#record(ancestor, Direction.Left);
    return ancestor.left;
  }

  /** Takes back the most recent step and returns the node it left from. */
  undoStep(): SplayNode<K, V> {
    if (this.#second) {
      const { node } = this.#second;
      this.#second = null;
      this.#depth -= 1;
      return node;
    }
    if (this.#first) {
      const { node } = this.#first;
      this.#first = null;
      this.#depth -= 1;
      return node;
    }
    throw new SplayInvariantError("No step to undo");
  }

  /** Moves the history into the remainder trees and clears it. */
  flush(): void {
    const first = this.#first;
    const second = this.#second;
    if (!first) {
      throw new SplayInvariantError("Flush called with blank history");
    }
    if (!second) {
      // zig
      this.#appendToward(first);
    } else if (first.direction === second.direction) {
      // zig-zig: rotate the pair before setting it aside
      this.#rotations += 1;
      if (first.direction === Direction.Right) {
        this.left.append(rotateLeft(first.node));
      } else {
        this.right.append(rotateRight(first.node));
      }
    } else {
      // zig-zag: each ancestor goes to its own side
      this.#appendToward(first);
      this.#appendToward(second);
    }
    this.#first = null;
    this.#second = null;
  }

  /**
   * Closing move of every splay: `newRoot`'s subtrees go to the remainder tips
   * and the remainder trees become its subtrees.
   */
  finish(newRoot: SplayNode<K, V>): SplayNode<K, V> {
    if (this.#first) {
      throw new SplayInvariantError("Finish called with unflushed history");
    }
    this.left.graft(newRoot.left);
    newRoot.left = this.left.root;
    this.right.graft(newRoot.right);
    newRoot.right = this.right.root;
    return newRoot;
  }

  metrics(comparisons: number): SplayMetrics {
    return { comparisons, rotations: this.#rotations, depth: this.#depth };
  }

  #record(node: SplayNode<K, V>, direction: Direction): void {
    if (!this.#first) {
      this.#first = { node, direction };
    } else if (!this.#second) {
      this.#second = { node, direction };
    } else {
      throw new SplayInvariantError("History holds two levels already");
    }
    this.#depth += 1;
  }

  // An ancestor left through its right link is smaller than everything still
  // ahead, so it belongs to the left remainder (and vice versa).
  #appendToward(entry: HistoryEntry<K, V>): void {
    if (entry.direction === Direction.Right) {
      this.left.append(entry.node);
    } else {
      this.right.append(entry.node);
    }
  }
}

/**
 * Searches for `key` and splays in the same downward pass. The existing key is
 * always the comparator's first argument. When `key` is absent the last node
 * probed becomes the root.
 */
export function searchAndSplay<K, V>(
  root: SplayNode<K, V> | null,
  key: K,
  compare: Comparator<K>,
): SearchOutcome<K, V> {
  if (!root) {
    return { found: false, root: null, comparisons: 0, rotations: 0, depth: 0 };
  }
  const td = new TopDownSplay<K, V>();
  let current = root;
  let comparisons = 0;
  let found = false;

  // Each round steps down at most twice before flushing. It ends the search
  // when the key matches or when the next step would leave the tree.
  for (;;) {
    comparisons += 1;
    const firstOrder = compare(current.key, key);
    if (firstOrder === 0) {
      found = true;
      break;
    }
    const child =
      firstOrder < 0 ? td.stepTowardRight(current) : td.stepTowardLeft(current);
    if (!child) {
      current = td.undoStep();
      break;
    }
    current = child;

    comparisons += 1;
    const secondOrder = compare(current.key, key);
    if (secondOrder === 0) {
      found = true;
      break;
    }
    const grandchild =
      secondOrder < 0 ? td.stepTowardRight(current) : td.stepTowardLeft(current);
    if (!grandchild) {
      current = td.undoStep();
      break;
    }
    current = grandchild;
    td.flush();
  }

  // final zig
  if (td.hasHistory) {
    td.flush();
  }
  const newRoot = td.finish(current);
  const metrics = td.metrics(comparisons);
  return found
    ? { found: true, root: newRoot, ...metrics }
    : { found: false, root: newRoot, ...metrics };
}

/**
 * Partitions every node of `root` around `node.key` and makes `node` the new
 * root. Existing keys equal to the new one end up on its right.
 */
export function insertAndSplay<K, V>(
  root: SplayNode<K, V> | null,
  node: SplayNode<K, V>,
  compare: Comparator<K>,
): { root: SplayNode<K, V> } & SplayMetrics {
  node.left = null;
  node.right = null;
  const td = new TopDownSplay<K, V>();
  let comparisons = 0;
  let current = root;
  while (current) {
    comparisons += 1;
    current =
      compare(current.key, node.key) < 0
        ? td.stepTowardRight(current)
        : td.stepTowardLeft(current);
    if (current) {
      comparisons += 1;
      current =
        compare(current.key, node.key) < 0
          ? td.stepTowardRight(current)
          : td.stepTowardLeft(current);
    }
    td.flush();
  }
  return { root: td.finish(node), ...td.metrics(comparisons) };
}

function splayExtreme<K, V>(
  root: SplayNode<K, V>,
  direction: Direction,
): { root: SplayNode<K, V> } & SplayMetrics {
  const td = new TopDownSplay<K, V>();
  const step = (node: SplayNode<K, V>): SplayNode<K, V> | null =>
    direction === Direction.Left ? td.stepTowardLeft(node) : td.stepTowardRight(node);
  let current = root;
  for (let child = current[direction]; child; child = current[direction]) {
    step(current);
    current = child;
    const grandchild = current[direction];
    if (grandchild) {
      step(current);
      current = grandchild;
    }
    td.flush();
  }
  return { root: td.finish(current), ...td.metrics(0) };
}

/** Splays the leftmost node to the root without comparing keys. */
export function splayMin<K, V>(
  root: SplayNode<K, V>,
): { root: SplayNode<K, V> } & SplayMetrics {
  return splayExtreme(root, Direction.Left);
}

/** Splays the rightmost node to the root without comparing keys. */
export function splayMax<K, V>(
  root: SplayNode<K, V>,
): { root: SplayNode<K, V> } & SplayMetrics {
  return splayExtreme(root, Direction.Right);
}
