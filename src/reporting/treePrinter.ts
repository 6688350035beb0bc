/**
 * Plain-text tree report.
 */
import type { TreeEdge } from '../architecture/acm/acm.summary';

/**
 * Format a run summary as lines:
 *
 *   Total number of runs: <runs>
 *   (blank)
 *   Connection: <from> --> \t<to>\t<weight>   (one per edge)
 */
export function formatTree(edges: readonly TreeEdge[], runs: number): string[] {
  const lines = [`Total number of runs: ${runs}`, ''];
  for (const edge of edges) {
    lines.push(`Connection: ${edge.from} --> \t${edge.to}\t${edge.weight}`);
  }
  return lines;
}

/** Write {@link formatTree} output to stdout. */
export function printTree(edges: readonly TreeEdge[], runs: number): void {
  for (const line of formatTree(edges, runs)) console.log(line);
}
