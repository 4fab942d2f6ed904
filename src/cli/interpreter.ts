import { join } from "path";
import { DEFAULT_DOT_FILE_NUMBER } from "../constants.ts";
import { writeDot } from "../export/dot.ts";
import { SplayTree } from "../tree/splayTree.ts";
import type { SplayResult } from "../tree/types.ts";

export const HELP_TEXT = [
  "Key:  N represents a decimal integer",
  "      S represents a nonempty string not containing whitespace",
  "",
  "in N S \tInsert record (N,S) into tree (as multiset).",
  "up N S \tUpdate record with key N, now associating it with S.",
  "er N   \tErase one record with key N from tree (if any).",
  "fi N   \tFind key N once, print its associated string.",
  "min    \tFind and print the minimum key in the tree.",
  "max    \tFind and print the maximum key in the tree.",
  "prn    \tPrint tree contents, in freeform human-readable format.",
  "dot    \tWrite tree contents to file in DOT format -- see graphviz(1).",
  "x      \tExit",
  "help   \tShow this list of commands",
].join("\n");

export type CommandOutcome =
  | { status: "ok" }
  | { status: "exit" }
  | { status: "error"; message: string; detail?: string };

export interface SessionOptions {
  write: (text: string) => void;
  dotDir?: string;
  tree?: SplayTree<number, string>;
}

const INTEGER = /^[+-]?\d+$/;

export function parseInteger(token: string | undefined): number | null {
  if (token === undefined || !INTEGER.test(token)) {
    return null;
  }
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

export function formatResult(result: SplayResult<number, string>): string {
  if (!result.found) {
    return "absent";
  }
  return `present\nkey = ${result.key}, sat = ${result.value}`;
}

/**
 * Line-command interpreter over a tree of integer keys and string values.
 * The tree is health-checked after every command; a failed check ends the
 * session with an error outcome.
 */
export class CommandSession {
  readonly tree: SplayTree<number, string>;
  #write: (text: string) => void;
  #dotDir: string;
  #dotNumber = DEFAULT_DOT_FILE_NUMBER;

  constructor(options: SessionOptions) {
    this.tree = options.tree ?? new SplayTree<number, string>();
    this.#write = options.write;
    this.#dotDir = options.dotDir ?? ".";
  }

  async execute(line: string): Promise<CommandOutcome> {
    const [command, ...args] = line.trim().split(/\s+/);
    if (!command) {
      return { status: "ok" };
    }
    const outcome = await this.#dispatch(command, args);
    if (outcome.status !== "ok") {
      return outcome;
    }
    const health = this.tree.healthCheck();
    if (!health.ok) {
      return { status: "error", message: "Health check failed", detail: health.message };
    }
    return outcome;
  }

  async #dispatch(command: string, args: string[]): Promise<CommandOutcome> {
    switch (command) {
      case "in":
      case "up": {
        const key = parseInteger(args[0]);
        const value = args[1];
        if (key === null || value === undefined) {
          return this.#fail(`cannot scan integer and string arguments for command ${command}`);
        }
        if (command === "in") {
          this.tree.insert(key, value);
        } else if (!this.tree.update(key, value)) {
          this.#write("Warning: update failed");
        }
        return { status: "ok" };
      }
      case "er":
      case "fi": {
        const key = parseInteger(args[0]);
        if (key === null) {
          return this.#fail(`cannot scan integer argument for command ${command}`);
        }
        if (command === "fi") {
          this.#write(formatResult(this.tree.find(key)));
        } else if (!this.tree.erase(key).found) {
          this.#write("Warning: erase failed");
        }
        return { status: "ok" };
      }
      case "min":
        this.#write(formatResult(this.tree.min()));
        return { status: "ok" };
      case "max":
        this.#write(formatResult(this.tree.max()));
        return { status: "ok" };
      case "prn":
        this.#write(this.tree.dump());
        return { status: "ok" };
      case "dot": {
        this.#dotNumber += 1;
        const fileName = `tree${this.#dotNumber}.dot`;
        this.#write(`Writing to file ${fileName}`);
        await writeDot(this.tree, join(this.#dotDir, fileName));
        return { status: "ok" };
      }
      case "help":
        this.#write(HELP_TEXT);
        return { status: "ok" };
      case "x":
        return { status: "exit" };
      default:
        this.#write("Warning: unrecognized command (enter 'help' for a list)");
        return { status: "ok" };
    }
  }

  #fail(message: string): CommandOutcome {
    return { status: "error", message };
  }
}
