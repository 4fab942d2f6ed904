export interface SplayNode<K, V> {
  key: K;
  value: V;
  left: SplayNode<K, V> | null;
  right: SplayNode<K, V> | null;
}

/** Read-only view of a node handed to traversal hooks and exporters. */
export interface NodeView<K, V> {
  readonly key: K;
  readonly value: V;
  readonly left: NodeView<K, V> | null;
  readonly right: NodeView<K, V> | null;
}

export type SplayResult<K, V> =
  | { found: true; key: K; value: V }
  | { found: false };

export interface SplayMetrics {
  comparisons: number;
  rotations: number;
  depth: number;
}

export type SearchOutcome<K, V> = SplayMetrics &
  (
    | { found: true; root: SplayNode<K, V> }
    | { found: false; root: SplayNode<K, V> | null }
  );

export interface SplayStats {
  splays: number;
  comparisons: number;
  rotations: number;
  inserts: number;
  erases: number;
  maxDepth: number;
}

export interface HealthReport {
  ok: boolean;
  message: string;
}

export interface VisitedNode<K, V> {
  key: K;
  value: V;
  left: NodeView<K, V> | null;
  right: NodeView<K, V> | null;
  depth: number;
}

/** Returning `false` stops the walk. */
export type NodeVisitor<K, V> = (node: VisitedNode<K, V>) => boolean | void;
