/**
 * Tree Diagram - renders extracted trees for visual inspection
 *
 * Two renderings of the same labelled edge list:
 * - Graphviz DOT text (`toDot`, persisted by `writeDiagram`) for an external layout engine.
 * - An indented box-drawing tree (`renderAsciiTree`) for the terminal.
 */
import fs from 'fs-extra';
import type { TreeEdge } from '../architecture/acm/acm.summary';

/** DOT rendering options. */
export interface DiagramOptions {
  /** Emit a `digraph` with `->` edges instead of an undirected `graph`. Default false. */
  directed?: boolean;
  /** Graph identifier. Default `acm`. */
  name?: string;
  /** Decimals used in edge labels. Default 4. */
  digits?: number;
}

const DEFAULT_DIGITS = 4;

function quote(label: string): string {
  return `"${label.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Labels in order of first appearance across the edge list. */
function nodesOf(edges: readonly TreeEdge[]): string[] {
  const seen = new Set<string>();
  for (const edge of edges) {
    seen.add(edge.from);
    seen.add(edge.to);
  }
  return [...seen];
}

/**
 * Render edges as a Graphviz document: nodes = labels, edges labelled with their weight.
 */
export function toDot(edges: readonly TreeEdge[], options: DiagramOptions = {}): string {
  const directed = options.directed ?? false;
  const digits = options.digits ?? DEFAULT_DIGITS;
  const connector = directed ? '->' : '--';
  const lines = [
    `${directed ? 'digraph' : 'graph'} ${options.name ?? 'acm'} {`,
    '  node [shape=ellipse, style=filled, fillcolor=orange];',
  ];
  for (const node of nodesOf(edges)) lines.push(`  ${quote(node)};`);
  for (const edge of edges) {
    lines.push(
      `  ${quote(edge.from)} ${connector} ${quote(edge.to)} [label="${edge.weight.toFixed(digits)}"];`
    );
  }
  lines.push('}');
  return `${lines.join('\n')}\n`;
}

/**
 * Draw the edges as an indented tree. Edges are treated as undirected; children
 * keep edge-list order. Components not reachable from `root` follow as extra trees
 * rooted at their first-appearing label.
 *
 * @param root Starting label. Default: `from` of the first edge.
 * @param digits Decimals of the weight shown beside each child.
 */
export function renderAsciiTree(
  edges: readonly TreeEdge[],
  root?: string,
  digits: number = DEFAULT_DIGITS
): string[] {
  const neighbours = new Map<string, { label: string; weight: number }[]>();
  const link = (a: string, b: string, weight: number) => {
    const list = neighbours.get(a);
    if (list) list.push({ label: b, weight });
    else neighbours.set(a, [{ label: b, weight }]);
  };
  for (const edge of edges) {
    link(edge.from, edge.to, edge.weight);
    link(edge.to, edge.from, edge.weight);
  }

  const lines: string[] = [];
  const visited = new Set<string>();
  const walk = (label: string, prefix: string) => {
    const children = (neighbours.get(label) ?? []).filter((c) => !visited.has(c.label));
    children.forEach((child) => visited.add(child.label));
    children.forEach((child, index) => {
      const last = index === children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${child.label} (${child.weight.toFixed(digits)})`);
      walk(child.label, `${prefix}${last ? '    ' : '│   '}`);
    });
  };

  const roots = nodesOf(edges);
  if (root !== undefined) roots.unshift(root);
  for (const start of roots) {
    if (visited.has(start)) continue;
    visited.add(start);
    lines.push(start);
    walk(start, '');
  }
  return lines;
}

/**
 * Persist the DOT rendering to `file`, creating parent directories as needed.
 */
export async function writeDiagram(
  file: string,
  edges: readonly TreeEdge[],
  options: DiagramOptions = {}
): Promise<void> {
  await fs.outputFile(file, toDot(edges, options), 'utf8');
}
