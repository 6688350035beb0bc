/**
 * Minimum spanning tree strategies over a weighted adjacency matrix.
 *
 * A matrix cell `[i][j]` that is non-zero (and off the diagonal) is a candidate
 * undirected edge between `i` and `j`; zero means "no edge". When both `[i][j]`
 * and `[j][i]` are present the lighter one competes for the tree. Each selected
 * edge is written back at the cell it was read from, every other cell is zero.
 * Disconnected inputs yield a minimum spanning forest.
 *
 * @see {@link https://en.wikipedia.org/wiki/Minimum_spanning_tree}
 */

/** Any function satisfying the spanning-forest contract above. */
export type MstFunction = (matrix: ReadonlyArray<ArrayLike<number>>) => number[][];

/** Candidate edge read from cell `[row][col]`. */
interface MatrixEdge {
  row: number;
  col: number;
  weight: number;
}

function assertSquare(matrix: ReadonlyArray<ArrayLike<number>>): number {
  const n = matrix.length;
  for (let i = 0; i < n; i++) {
    if (matrix[i].length !== n) {
      throw new Error(
        `Adjacency matrix must be square (row ${i} has ${matrix[i].length} entries, expected ${n}).`
      );
    }
  }
  return n;
}

function emptyMatrix(n: number): number[][] {
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

export default class Mst {
  /**
   * Kruskal's algorithm.
   *
   * Every non-zero off-diagonal cell becomes an edge. Edges are ordered by weight
   * with a stable sort, so equal weights keep row-major order; union-find then
   * accepts each edge that joins two components.
   *
   * @see {@link https://en.wikipedia.org/wiki/Kruskal%27s_algorithm}
   */
  static kruskal(matrix: ReadonlyArray<ArrayLike<number>>): number[][] {
    const n = assertSquare(matrix);
    const edges: MatrixEdge[] = [];
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        const weight = matrix[row][col];
        if (row !== col && weight !== 0) edges.push({ row, col, weight });
      }
    }
    edges.sort((a, b) => a.weight - b.weight);

    const parent = Array.from({ length: n }, (_, i) => i);
    const find = (node: number): number => {
      let root = node;
      while (parent[root] !== root) {
        parent[root] = parent[parent[root]]; // path halving
        root = parent[root];
      }
      return root;
    };

    const tree = emptyMatrix(n);
    let accepted = 0;
    for (const edge of edges) {
      if (accepted === n - 1) break;
      const a = find(edge.row);
      const b = find(edge.col);
      if (a === b) continue;
      parent[a] = b;
      tree[edge.row][edge.col] = edge.weight;
      accepted++;
    }
    return tree;
  }

  /**
   * Prim's algorithm on the dense matrix, restarted from the lowest unvisited
   * node until every node is covered (forest for disconnected inputs).
   *
   * Between two nodes the lighter of `[i][j]` / `[j][i]` is the edge; ties prefer
   * the upper-triangle cell. Among equally light frontier nodes the lowest index wins.
   *
   * @see {@link https://en.wikipedia.org/wiki/Prim%27s_algorithm}
   */
  static prim(matrix: ReadonlyArray<ArrayLike<number>>): number[][] {
    const n = assertSquare(matrix);
    const edgeBetween = (a: number, b: number): MatrixEdge | undefined => {
      const low = Math.min(a, b);
      const high = Math.max(a, b);
      const upper = matrix[low][high];
      const lower = matrix[high][low];
      if (upper === 0 && lower === 0) return undefined;
      if (lower === 0 || (upper !== 0 && upper <= lower)) {
        return { row: low, col: high, weight: upper };
      }
      return { row: high, col: low, weight: lower };
    };

    const tree = emptyMatrix(n);
    const inTree = new Array<boolean>(n).fill(false);
    const bestWeight = new Array<number>(n).fill(Infinity);
    const bestEdge = new Array<MatrixEdge | undefined>(n).fill(undefined);
    const relax = (from: number) => {
      for (let to = 0; to < n; to++) {
        if (inTree[to]) continue;
        const edge = edgeBetween(from, to);
        if (edge && edge.weight < bestWeight[to]) {
          bestWeight[to] = edge.weight;
          bestEdge[to] = edge;
        }
      }
    };

    for (let root = 0; root < n; root++) {
      if (inTree[root]) continue;
      inTree[root] = true;
      relax(root);
      for (;;) {
        let next = -1;
        for (let node = 0; node < n; node++) {
          if (inTree[node] || bestEdge[node] === undefined) continue;
          if (next === -1 || bestWeight[node] < bestWeight[next]) next = node;
        }
        if (next === -1) break;
        const edge = bestEdge[next];
        if (edge) tree[edge.row][edge.col] = edge.weight;
        inTree[next] = true;
        relax(next);
      }
    }
    return tree;
  }
}
