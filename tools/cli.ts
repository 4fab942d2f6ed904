#!/usr/bin/env -S node --import tsx
import { createInterface } from "readline";
import { Command } from "commander";
import {
  CommandSession,
  ConsoleDiagnosticsSink,
  FileDiagnosticsSink,
  SplayTree,
  isDemoLayout,
  runDemo,
  type DiagnosticsSink,
} from "../index.ts";
import { parseInteger } from "../src/cli/interpreter.ts";

const program = new Command();
program
  .name("ts-splay")
  .description("Drive a splay tree from the command line")
  .option("-d, --dot-dir <path>", "directory for DOT output", ".")
  .option("--diagnostics <path>", "append splay diagnostics as JSON lines")
  .option("--verbose", "log splay diagnostics to the console");

const globalOptions = (): { dotDir: string; diagnostics?: string; verbose: boolean } => {
  const opts = program.opts<{ dotDir: string; diagnostics?: string; verbose?: boolean }>();
  return {
    dotDir: opts.dotDir,
    diagnostics: opts.diagnostics,
    verbose: opts.verbose ?? false,
  };
};

function parseKey(input: string): number {
  const value = parseInteger(input);
  if (value === null) {
    throw new Error(`Invalid key "${input}" - expected an integer`);
  }
  return value;
}

program
  .command("repl", { isDefault: true })
  .description("read line commands from stdin (enter 'help' for a list)")
  .action(async () => {
    const opts = globalOptions();
    const fileSink = opts.diagnostics ? new FileDiagnosticsSink(opts.diagnostics) : undefined;
    const diagnostics: DiagnosticsSink | undefined =
      fileSink ?? (opts.verbose ? new ConsoleDiagnosticsSink() : undefined);
    const session = new CommandSession({
      write: (text) => console.log(text),
      dotDir: opts.dotDir,
      tree: new SplayTree<number, string>({ diagnostics }),
    });
    const lines = createInterface({ input: process.stdin, terminal: false });
    console.log("Enter 'help' for a list of commands.");
    try {
      for await (const line of lines) {
        const outcome = await session.execute(line);
        if (outcome.status === "exit") {
          break;
        }
        if (outcome.status === "error") {
          console.error(`Error: ${outcome.message}`);
          if (outcome.detail) {
            console.error(outcome.detail);
          }
          process.exitCode = 1;
          break;
        }
      }
    } finally {
      lines.close();
      session.tree.clear();
      await fileSink?.flush();
    }
  });

program
  .command("demo")
  .argument("<layout>", "complete, ascending or descending")
  .argument("[keys...]", "keys to probe (defaults depend on the layout)")
  .option("--fresh", "probe every key against the freshly built layout")
  .option("--no-fresh", "let each probe reshape the tree for the next one")
  .description("build a demo layout and write DOT files for each probe")
  .action(async (layout: string, keyStrs: string[], cmdOpts: { fresh?: boolean }) => {
    const opts = globalOptions();
    if (!isDemoLayout(layout)) {
      throw new Error(`Unknown layout "${layout}"`);
    }
    const probes = await runDemo({
      layout,
      outDir: opts.dotDir,
      keys: keyStrs.length > 0 ? keyStrs.map(parseKey) : undefined,
      fresh: cmdOpts.fresh,
      log: (line) => console.log(line),
    });
    console.log(`wrote ${probes.length + 1} DOT files to ${opts.dotDir}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
