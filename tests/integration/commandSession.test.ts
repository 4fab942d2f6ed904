import { expect, test } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { CommandSession, HELP_TEXT, renderDot } from "../../index.ts";
import { parseInteger } from "../../src/cli/interpreter.ts";

function createSession(dotDir?: string) {
  const output: string[] = [];
  const session = new CommandSession({ write: (text) => output.push(text), dotDir });
  return { session, output };
}

test("integer arguments must be plain decimal safe integers", () => {
  expect(parseInteger("42")).toBe(42);
  expect(parseInteger("-7")).toBe(-7);
  expect(parseInteger("+3")).toBe(3);
  expect(parseInteger("4.5")).toBeNull();
  expect(parseInteger("0x10")).toBeNull();
  expect(parseInteger("99999999999999999999")).toBeNull();
  expect(parseInteger(undefined)).toBeNull();
});

test("commands report presence, absence and warnings", async () => {
  const { session, output } = createSession();
  for (const line of ["in 5 five", "in 3 three", "in 8 eight"]) {
    expect(await session.execute(line)).toEqual({ status: "ok" });
  }
  await session.execute("fi 3");
  await session.execute("fi 4");
  await session.execute("up 4 four");
  await session.execute("up 5 FIVE");
  await session.execute("fi 5");
  await session.execute("er 9");
  await session.execute("er 8");
  await session.execute("min");
  await session.execute("max");
  await session.execute("launch");
  expect(output).toEqual([
    "present\nkey = 3, sat = three",
    "absent",
    "Warning: update failed",
    "present\nkey = 5, sat = FIVE",
    "Warning: erase failed",
    "present\nkey = 3, sat = three",
    "present\nkey = 5, sat = FIVE",
    "Warning: unrecognized command (enter 'help' for a list)",
  ]);
  expect(session.tree.size).toBe(2);
});

test("malformed arguments end the session with an error", async () => {
  const { session, output } = createSession();
  expect(await session.execute("in seven 7")).toEqual({
    status: "error",
    message: "cannot scan integer and string arguments for command in",
  });
  expect(await session.execute("up 7")).toEqual({
    status: "error",
    message: "cannot scan integer and string arguments for command up",
  });
  expect(await session.execute("er")).toEqual({
    status: "error",
    message: "cannot scan integer argument for command er",
  });
  expect(await session.execute("fi 1.5")).toEqual({
    status: "error",
    message: "cannot scan integer argument for command fi",
  });
  expect(output).toEqual([]);
});

test("blank lines are ignored and x exits", async () => {
  const { session, output } = createSession();
  expect(await session.execute("   ")).toEqual({ status: "ok" });
  expect(await session.execute("x")).toEqual({ status: "exit" });
  expect(output).toEqual([]);
});

test("help and prn print the command list and the tree", async () => {
  const { session, output } = createSession();
  await session.execute("help");
  await session.execute("in 2 a");
  await session.execute("in 1 b");
  await session.execute("in 3 c");
  await session.execute("prn");
  expect(output[0]).toBe(HELP_TEXT);
  expect(output[1]).toBe(
    [
      "Tree size: 3",
      "Node #1 has key 3, left #2, right nil",
      " Node #2 has key 2, left #3, right nil",
      "  Node #3 has key 1, left nil, right nil",
    ].join("\n"),
  );
});

test("dot writes numbered files into the configured directory", async () => {
  const dir = await mkdtemp(join(tmpdir(), "ts-splay-cli-"));
  try {
    const { session, output } = createSession(dir);
    await session.execute("in 10 ten");
    await session.execute("dot");
    const first = renderDot(session.tree);
    await session.execute("in 20 twenty");
    await session.execute("dot");
    expect(output).toEqual(["Writing to file tree1001.dot", "Writing to file tree1002.dot"]);
    expect((await readdir(dir)).sort()).toEqual(["tree1001.dot", "tree1002.dot"]);
    expect(await readFile(join(dir, "tree1001.dot"), "utf8")).toBe(first);
    expect(await readFile(join(dir, "tree1002.dot"), "utf8")).toBe(renderDot(session.tree));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
