import { writeFile } from "fs/promises";
import { DOT_BACKGROUND, DOT_NODE_SHAPE, DOT_PHANTOM_PREFIX } from "../constants.ts";
import type { SplayTree } from "../tree/splayTree.ts";
import type { NodeView } from "../tree/types.ts";

export interface DotOptions<K> {
  label?: (key: K) => string;
}

interface DotFrame<K, V> {
  node: NodeView<K, V>;
  parent: { id: number; node: NodeView<K, V> } | null;
}

function escapeLabel(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Renders the tree as a Graphviz digraph. Only-children get an invisible
 * sibling so the layout keeps left and right apart. Node ids are preorder
 * numbers, which keeps duplicate keys distinct.
 */
export function renderDot<K, V>(
  tree: SplayTree<K, V>,
  options: DotOptions<K> = {},
): string {
  const label = options.label ?? ((key: K) => String(key));
  const lines = ["digraph {", `  bgcolor=${DOT_BACKGROUND};`];
  let nextId = 0;
  let nextPhantom = 0;

  const nodeLine = (id: number, node: NodeView<K, V>): string =>
    `  n${id} [label="${escapeLabel(label(node.key))}";${DOT_NODE_SHAPE}];`;
  const phantomLines = (parentId: number): string[] => {
    nextPhantom += 1;
    const phantom = `${DOT_PHANTOM_PREFIX}${nextPhantom}`;
    return [`  ${phantom} [style=invis];`, `  n${parentId} -> ${phantom} [style=invis];`];
  };

  const stack: DotFrame<K, V>[] = tree.root ? [{ node: tree.root, parent: null }] : [];
  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    const { node, parent } = frame;
    nextId += 1;
    const id = nextId;
    if (parent && !parent.node.left) {
      lines.push(...phantomLines(parent.id));
    }
    lines.push(nodeLine(id, node));
    if (parent) {
      lines.push(`  n${parent.id} -> n${id};`);
      if (!parent.node.right) {
        lines.push(...phantomLines(parent.id));
      }
    }
    if (node.right) {
      stack.push({ node: node.right, parent: { id, node } });
    }
    if (node.left) {
      stack.push({ node: node.left, parent: { id, node } });
    }
  }
  lines.push("}");
  return lines.join("\n") + "\n";
}

export async function writeDot<K, V>(
  tree: SplayTree<K, V>,
  filePath: string,
  options?: DotOptions<K>,
): Promise<void> {
  await writeFile(filePath, renderDot(tree, options), "utf8");
}
