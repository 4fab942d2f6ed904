import { SplayTree, range } from "../index.ts";

function main() {
  const tree = new SplayTree<number, string>();
  for (let i = 0; i < 20; i += 1) {
    tree.insert(i, `value-${i}`);
  }

  console.log("Range 5..15:");
  for (const { key, value } of range(tree, 5, 15)) {
    console.log(key, value);
  }

  const min = tree.min();
  const max = tree.max();
  if (min.found && max.found) {
    console.log(`min ${min.key}, max ${max.key}`);
  }
}

main();
