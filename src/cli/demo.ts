import { join } from "path";
import { writeDot } from "../export/dot.ts";
import { SplayTree } from "../tree/splayTree.ts";

export type DemoLayout = "complete" | "ascending" | "descending";

export const DEMO_LAYOUTS: readonly DemoLayout[] = ["complete", "ascending", "descending"];

// Leaves first, then parents, then the root. Splaying on insert leaves a
// nearly complete tree over the even keys 2..30; only 26-28-30 form a chain.
export const COMPLETE_LAYOUT_KEYS: readonly number[] = [
  2, 6, 10, 14, 18, 22, 26, 30, 4, 12, 20, 28, 8, 24, 16,
];

export interface DemoProbe {
  key: number;
  found: boolean;
  rootKey: number | null;
  file: string;
}

export interface DemoOptions {
  layout: DemoLayout;
  outDir: string;
  keys?: number[];
  /** Probe every key against the freshly built layout instead of in sequence. */
  fresh?: boolean;
  log?: (line: string) => void;
}

export function isDemoLayout(name: string): name is DemoLayout {
  return DEMO_LAYOUTS.some((layout) => layout === name);
}

function layoutKeys(layout: DemoLayout): number[] {
  switch (layout) {
    case "complete":
      return [...COMPLETE_LAYOUT_KEYS];
    case "ascending":
      return Array.from({ length: 1000 }, (_, i) => i + 1);
    case "descending":
      return Array.from({ length: 15 }, (_, i) => 30 - 2 * i);
  }
}

function defaultProbes(layout: DemoLayout): number[] {
  if (layout === "ascending") {
    return [1, 2, 4, 8, 12, 24, 40, 56];
  }
  return Array.from({ length: 31 }, (_, i) => i + 1);
}

export function buildLayout(layout: DemoLayout): SplayTree<number, string> {
  return SplayTree.from(layoutKeys(layout).map((key) => [key, `v${key}`] as const));
}

/**
 * Builds a layout, writes its DOT rendering, then splays each probe key and
 * writes the reshaped tree after every probe.
 */
export async function runDemo(options: DemoOptions): Promise<DemoProbe[]> {
  const { layout, outDir } = options;
  const log = options.log ?? (() => {});
  const pristine = buildLayout(layout);
  const fresh = options.fresh ?? layout === "complete";
  await writeDot(pristine, join(outDir, `${layout}-initial.dot`));

  const probes: DemoProbe[] = [];
  let tree = pristine;
  for (const key of options.keys ?? defaultProbes(layout)) {
    if (fresh) {
      tree = new SplayTree<number, string>();
      pristine.copyTo(tree);
    }
    const result = tree.find(key);
    const health = tree.healthCheck();
    if (!health.ok) {
      throw new Error(`Health check failed after probing ${key}: ${health.message}`);
    }
    const file = join(outDir, `${layout}-probe-${key}.dot`);
    await writeDot(tree, file);
    const rootKey = tree.root ? tree.root.key : null;
    probes.push({ key, found: result.found, rootKey, file });
    log(`${key}\t${result.found ? "found" : "NOT FOUND"}\troot ${rootKey ?? "nil"}`);
  }
  return probes;
}
