import { SplayTree } from "../index.ts";

function main() {
  const tree = new SplayTree<number, string>();

  // Insert a few keys; duplicates are kept as separate records
  tree.insert(1, "hello");
  tree.insert(2, "world");
  tree.insert(2, "again");

  // Update one record with key 2
  tree.update(2, "world!");

  const found = tree.find(1);
  console.log("key 1 =", found.found ? found.value : "(absent)");
  console.log("root after find =", tree.root?.key);

  // Erase removes one record at a time
  console.log("erase 2 ->", tree.erase(2));
  console.log("erase 2 ->", tree.erase(2));
  console.log("erase 2 ->", tree.erase(2));

  console.log("health:", tree.healthCheck());
  console.log(tree.dump());
}

main();
