import { expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import {
  FileDiagnosticsSink,
  LockedSplayTree,
  MemoryDiagnosticsSink,
  SplayTree,
} from "../../index.ts";
import { AsyncRWLock } from "../../src/utils/locks.ts";

test("readers share the lock until a writer queues", async () => {
  const lock = new AsyncRWLock();
  const releaseFirst = await lock.acquireRead();
  const releaseSecond = await lock.acquireRead();
  expect(lock.state).toEqual({ readers: 2, writing: false, waiting: 0 });

  const order: string[] = [];
  const writer = lock.acquireWrite().then((release) => {
    order.push("writer");
    return release;
  });
  const lateReader = lock.acquireRead().then((release) => {
    order.push("reader");
    return release;
  });
  expect(lock.state).toEqual({ readers: 2, writing: false, waiting: 2 });

  releaseFirst();
  releaseSecond();
  const releaseWriter = await writer;
  expect(lock.state).toEqual({ readers: 0, writing: true, waiting: 1 });
  releaseWriter();
  const releaseLate = await lateReader;
  expect(order).toEqual(["writer", "reader"]);
  releaseLate();
  expect(lock.state).toEqual({ readers: 0, writing: false, waiting: 0 });
});

test("locked tree releases its lock when an exclusive section throws", async () => {
  const locked = LockedSplayTree.create<number, string>();
  await expect(
    locked.exclusive(async (tree) => {
      tree.insert(1, "one");
      await Promise.resolve();
      throw new Error("boom");
    }),
  ).rejects.toThrow("boom");
  expect(locked.lockState).toEqual({ readers: 0, writing: false, waiting: 0 });
  expect(await locked.size()).toBe(1);
  expect(await locked.find(1)).toEqual({ found: true, key: 1, value: "one" });
});

test("locked tree serializes concurrent callers", async () => {
  const locked = LockedSplayTree.create<number, string>();
  await Promise.all(
    Array.from({ length: 50 }, (_, i) => locked.insert(i, `value-${i}`)),
  );
  expect(await locked.size()).toBe(50);

  const [found, erased, updated] = await Promise.all([
    locked.find(10),
    locked.erase(20),
    locked.update(30, "thirty"),
  ]);
  expect(found).toEqual({ found: true, key: 10, value: "value-10" });
  expect(erased).toEqual({ found: true, key: 20, value: "value-20" });
  expect(updated).toBe(true);
  expect(await locked.min()).toEqual({ found: true, key: 0, value: "value-0" });
  expect(await locked.max()).toEqual({ found: true, key: 49, value: "value-49" });
  expect(await locked.healthCheck()).toEqual({ ok: true, message: "" });
  expect(locked.lockState).toEqual({ readers: 0, writing: false, waiting: 0 });
});

test("exclusive sections do not interleave with other writers", async () => {
  const locked = new LockedSplayTree(new SplayTree<number, number>());
  const moved = locked.exclusive(async (tree) => {
    tree.insert(1, 100);
    await new Promise((resolve) => setTimeout(resolve, 5));
    const result = tree.erase(1);
    tree.insert(2, result.found ? result.value : -1);
    return tree.size;
  });
  const inserted = locked.insert(1, 1);
  expect(await moved).toBe(1);
  await inserted;
  const keys: number[] = [];
  await locked.traverse(({ key }) => {
    keys.push(key);
  });
  expect(keys.sort()).toEqual([1, 2]);
  expect(await locked.find(2)).toEqual({ found: true, key: 2, value: 100 });
  await locked.clear();
  expect(await locked.dump()).toBe("Tree size: 0");
});

test("memory sink records every splay and alerts on deep walks", () => {
  const sink = new MemoryDiagnosticsSink();
  const tree = new SplayTree<number, string>({ diagnostics: sink, limits: { depth: 10 } });
  for (let i = 1; i <= 20; i += 1) {
    tree.insert(i, `v${i}`);
  }
  expect(sink.alerts).toEqual([]);
  tree.find(1);
  expect(sink.alerts).toEqual(["Splay depth 19 exceeds limit 10"]);
  expect(sink.snapshots).toHaveLength(21);
  const last = sink.snapshots[sink.snapshots.length - 1];
  expect(last?.reason).toBe("find");
  expect(last?.size).toBe(20);
  expect(last?.splay.depth).toBe(19);
  expect(last?.stats.inserts).toBe(20);
  expect(last?.stats.maxDepth).toBe(19);
});

test("file sink appends one JSON line per event", async () => {
  const dir = await mkdtemp(join(tmpdir(), "ts-splay-diag-"));
  const filePath = join(dir, "diagnostics.jsonl");
  try {
    const sink = new FileDiagnosticsSink(filePath);
    const tree = new SplayTree<number, string>({ diagnostics: sink, limits: { depth: 1 } });
    tree.insert(1, "one");
    tree.insert(2, "two");
    tree.insert(3, "three");
    tree.find(1);
    await sink.flush();

    const lines = (await readFile(filePath, "utf8")).trim().split("\n");
    const events: Array<{ type: string; reason: string; size: number; message?: string }> =
      lines.map((line) => JSON.parse(line));
    expect(events.map(({ type }) => type)).toEqual([
      "snapshot",
      "snapshot",
      "snapshot",
      "snapshot",
      "alert",
    ]);
    expect(events.map(({ size }) => size)).toEqual([1, 2, 3, 3, 3]);
    expect(events[4]?.message).toBe("Splay depth 2 exceeds limit 1");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("file sink surfaces write failures on flush", async () => {
  const dir = await mkdtemp(join(tmpdir(), "ts-splay-diag-"));
  try {
    const sink = new FileDiagnosticsSink(join(dir, "missing", "diagnostics.jsonl"));
    const tree = new SplayTree<number, string>({ diagnostics: sink });
    tree.insert(1, "one");
    await expect(sink.flush()).rejects.toThrow();
    await expect(sink.flush()).resolves.toBeUndefined();
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
