import { formatTree, printTree } from '../../src/reporting/treePrinter';
import type { TreeEdge } from '../../src/architecture/acm/acm.summary';

const edges: TreeEdge[] = [
  { from: 'R1', to: 'R1^2', weight: 0.25 },
  { from: 'R2>0.9', to: 'R1^2', weight: 0.0125 },
];

describe('formatTree', () => {
  it('starts with the run count and a blank line', () => {
    // Act
    const lines = formatTree(edges, 42);
    // Assert
    expect(lines.slice(0, 2)).toEqual(['Total number of runs: 42', '']);
  });
  it('writes one tab-separated connection line per edge', () => {
    // Act
    const lines = formatTree(edges, 42);
    // Assert
    expect(lines.slice(2)).toEqual([
      'Connection: R1 --> \tR1^2\t0.25',
      'Connection: R2>0.9 --> \tR1^2\t0.0125',
    ]);
  });
  it('still reports the run count without edges', () => {
    // Act & Assert
    expect(formatTree([], 3)).toEqual(['Total number of runs: 3', '']);
  });
});

describe('printTree', () => {
  it('logs every formatted line in order', () => {
    // Arrange
    const log = jest.spyOn(console, 'log');
    // Act
    printTree(edges, 7);
    // Assert
    expect(log.mock.calls.map(([line]) => line)).toEqual(formatTree(edges, 7));
    log.mockRestore();
  });
});
