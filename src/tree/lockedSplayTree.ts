import { AsyncRWLock, type LockState } from "../utils/locks.ts";
import { SplayTree, type SplayTreeOptions } from "./splayTree.ts";
import type { HealthReport, NodeVisitor, SplayResult } from "./types.ts";

/**
 * Serializes access to one `SplayTree` for async callers. Lookups splay, so
 * they take the write lock like any mutation; only the walks that leave the
 * shape alone share the read lock.
 */
export class LockedSplayTree<K, V> {
  readonly tree: SplayTree<K, V>;
  #lock = new AsyncRWLock();

  constructor(tree: SplayTree<K, V> = new SplayTree<K, V>()) {
    this.tree = tree;
  }

  static create<K, V>(options?: SplayTreeOptions<K>): LockedSplayTree<K, V> {
    return new LockedSplayTree(new SplayTree<K, V>(options));
  }

  get lockState(): LockState {
    return this.#lock.state;
  }

  size(): Promise<number> {
    return this.#reading(() => this.tree.size);
  }

  find(key: K): Promise<SplayResult<K, V>> {
    return this.#writing(() => this.tree.find(key));
  }

  insert(key: K, value: V): Promise<void> {
    return this.#writing(() => this.tree.insert(key, value));
  }

  update(key: K, value: V): Promise<boolean> {
    return this.#writing(() => this.tree.update(key, value));
  }

  erase(key: K): Promise<SplayResult<K, V>> {
    return this.#writing(() => this.tree.erase(key));
  }

  min(): Promise<SplayResult<K, V>> {
    return this.#writing(() => this.tree.min());
  }

  max(): Promise<SplayResult<K, V>> {
    return this.#writing(() => this.tree.max());
  }

  clear(): Promise<void> {
    return this.#writing(() => this.tree.clear());
  }

  /** Runs `fn` with exclusive access, for sequences that must not interleave. */
  exclusive<T>(fn: (tree: SplayTree<K, V>) => Promise<T> | T): Promise<T> {
    return this.#writing(() => fn(this.tree));
  }

  healthCheck(): Promise<HealthReport> {
    return this.#reading(() => this.tree.healthCheck());
  }

  traverse(visitor: NodeVisitor<K, V>): Promise<void> {
    return this.#reading(() => this.tree.traverse(visitor));
  }

  dump(): Promise<string> {
    return this.#reading(() => this.tree.dump());
  }

  async #reading<T>(read: () => T): Promise<T> {
    const release = await this.#lock.acquireRead();
    try {
      return read();
    } finally {
      release();
    }
  }

  // the lock is held until an async section settles
  async #writing<T>(write: () => Promise<T> | T): Promise<T> {
    const release = await this.#lock.acquireWrite();
    try {
      return await write();
    } finally {
      release();
    }
  }
}
