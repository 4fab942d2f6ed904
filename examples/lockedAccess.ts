import { LockedSplayTree, MemoryDiagnosticsSink } from "../index.ts";

async function main() {
  const diagnostics = new MemoryDiagnosticsSink();
  const tree = LockedSplayTree.create<number, string>({ diagnostics });

  // Concurrent writers are serialized by the tree's lock
  await Promise.all(
    Array.from({ length: 100 }, (_, i) => tree.insert(i, `worker-${i % 4}`)),
  );
  const lookups = await Promise.all([tree.find(10), tree.find(50), tree.find(500)]);
  console.log(lookups.map((result) => (result.found ? result.value : "(absent)")));

  const moved = await tree.exclusive((inner) => {
    const min = inner.min();
    if (min.found) {
      inner.erase(min.key);
    }
    return min;
  });
  console.log("removed minimum", moved);
  console.log("size", await tree.size(), "health", await tree.healthCheck());
  console.log("snapshots recorded", diagnostics.snapshots.length);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
