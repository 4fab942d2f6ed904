import { appendFile } from "fs/promises";
import type { SplayMetrics, SplayStats } from "./tree/types.ts";

export interface DiagnosticsSnapshot {
  reason: string;
  size: number;
  splay: SplayMetrics;
  stats: SplayStats;
  heapUsedBytes: number;
}

export interface DiagnosticsSink {
  onSnapshot?(snapshot: DiagnosticsSnapshot): void;
  onAlert?(message: string, snapshot: DiagnosticsSnapshot): void;
}

export class ConsoleDiagnosticsSink implements DiagnosticsSink {
  onSnapshot(snapshot: DiagnosticsSnapshot): void {
    console.debug("[SplayTree]", snapshot.reason, {
      size: snapshot.size,
      depth: snapshot.splay.depth,
      comparisons: snapshot.splay.comparisons,
      rotations: snapshot.splay.rotations,
    });
  }

  onAlert(message: string, snapshot: DiagnosticsSnapshot): void {
    console.warn("[SplayTree][ALERT]", message, {
      size: snapshot.size,
      depth: snapshot.splay.depth,
      maxDepth: snapshot.stats.maxDepth,
      heap: snapshot.heapUsedBytes,
    });
  }
}

/**
 * Appends snapshots and alerts as JSON lines. Writes are queued in order;
 * `flush()` waits for them and rethrows the first failed write.
 */
export class FileDiagnosticsSink implements DiagnosticsSink {
  #queue: Promise<void> = Promise.resolve();
  #failure: { error: unknown } | null = null;

  constructor(private readonly filePath: string) {}

  onSnapshot(snapshot: DiagnosticsSnapshot): void {
    this.#enqueue(JSON.stringify({ type: "snapshot", ...snapshot }) + "\n");
  }

  onAlert(message: string, snapshot: DiagnosticsSnapshot): void {
    this.#enqueue(JSON.stringify({ type: "alert", message, ...snapshot }) + "\n");
  }

  async flush(): Promise<void> {
    await this.#queue;
    const failure = this.#failure;
    this.#failure = null;
    if (failure) {
      throw failure.error;
    }
  }

  #enqueue(line: string): void {
    this.#queue = this.#queue
      .then(() => appendFile(this.filePath, line))
      .catch((error: unknown) => {
        this.#failure ??= { error };
      });
  }
}

/** Keeps every snapshot and alert in memory; handy for tests and tooling. */
export class MemoryDiagnosticsSink implements DiagnosticsSink {
  readonly snapshots: DiagnosticsSnapshot[] = [];
  readonly alerts: string[] = [];

  onSnapshot(snapshot: DiagnosticsSnapshot): void {
    this.snapshots.push(snapshot);
  }

  onAlert(message: string): void {
    this.alerts.push(message);
  }
}
