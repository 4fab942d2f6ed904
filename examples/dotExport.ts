import { buildLayout, writeDot } from "../index.ts";

async function main() {
  const tree = buildLayout("complete");
  await writeDot(tree, "./complete.dot");

  const result = tree.find(17);
  console.log("find 17:", result.found ? "present" : "absent", "root", tree.root?.key);
  await writeDot(tree, "./complete-17.dot");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
