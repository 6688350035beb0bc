/**
 * Tree extraction helpers.
 *
 * Provides:
 *  - summarizeTree: spanning-tree adjacency + labels → ordered labelled edges.
 *  - treeDistance: hop count between two labels along the extracted edges.
 */

/** One edge of the extracted tree. */
export interface TreeEdge {
  from: string;
  to: string;
  weight: number;
}

/**
 * List every non-zero cell of `tree` as a labelled edge, in row-major order.
 *
 * @param tree Spanning-tree adjacency (N×N).
 * @param labels One label per dimension.
 */
export function summarizeTree(
  tree: ReadonlyArray<ArrayLike<number>>,
  labels: readonly string[]
): TreeEdge[] {
  const edges: TreeEdge[] = [];
  for (let i = 0; i < tree.length; i++) {
    for (let j = 0; j < tree[i].length; j++) {
      const weight = tree[i][j];
      if (weight !== 0) edges.push({ from: labels[i], to: labels[j], weight });
    }
  }
  return edges;
}

/**
 * Number of edges on the path between `a` and `b`, treating edges as undirected.
 *
 * @returns 0 when `a === b`, `Infinity` when no path exists.
 */
export function treeDistance(edges: readonly TreeEdge[], a: string, b: string): number {
  if (a === b) return 0;
  /** Undirected adjacency list keyed by label. */
  const neighbours = new Map<string, string[]>();
  const link = (x: string, y: string) => {
    const list = neighbours.get(x);
    if (list) list.push(y);
    else neighbours.set(x, [y]);
  };
  for (const edge of edges) {
    link(edge.from, edge.to);
    link(edge.to, edge.from);
  }
  // Breadth-first search; visited set guards against cycles in non-tree input.
  const depth = new Map<string, number>([[a, 0]]);
  const queue: string[] = [a];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const currentDepth = depth.get(current) ?? 0;
    for (const next of neighbours.get(current) ?? []) {
      if (depth.has(next)) continue;
      if (next === b) return currentDepth + 1;
      depth.set(next, currentDepth + 1);
      queue.push(next);
    }
  }
  return Infinity;
}
