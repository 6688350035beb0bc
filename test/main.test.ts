import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { run } from '../src/main';
import { config } from '../src/config';
import Mst from '../src/methods/mst';
import { toDot } from '../src/reporting/treeDiagram';

describe('run', () => {
  describe('Scenario: defaults with a fixed seed', () => {
    it('trains on the correlated fixture until convergence', async () => {
      // Act
      const report = await run({ seed: 'acm-0', print: false });
      // Assert
      expect([report.training.runs, report.training.converged]).toEqual([186, true]);
    });
    it('returns the labelled tree', async () => {
      // Act
      const report = await run({ seed: 'acm-0', print: false });
      // Assert
      expect(report.edges.map((e) => e.to)).toEqual(new Array<string>(9).fill('R1^2'));
    });
    it('reports the fixture labels', async () => {
      // Act
      const report = await run({ seed: 'acm-0', print: false });
      // Assert
      expect(report.labels[3]).toBe('R1^2');
    });
  });

  describe('Scenario: printed report', () => {
    it('starts with the run count', async () => {
      // Arrange
      const log = jest.spyOn(console, 'log');
      // Act
      await run({ seed: 'acm-0' });
      // Assert
      expect(log.mock.calls[0]).toEqual(['Total number of runs: 186']);
      log.mockRestore();
    });
    it('prints the text report, a blank line, then the ASCII tree', async () => {
      // Arrange
      const log = jest.spyOn(console, 'log');
      // Act
      await run({ seed: 'acm-0' });
      // Assert
      expect(log.mock.calls.slice(11, 14).map(([line]) => line)).toEqual([
        '',
        'R1',
        expect.stringMatching(/^└── R1\^2 \(/),
      ]);
      log.mockRestore();
    });
  });

  describe('Scenario: alternative fixture and strategy', () => {
    it('trains on the random fixture', async () => {
      // Act
      const report = await run({ fixture: 'random', seed: 'rand-0', print: false });
      // Assert
      expect(report.training.runs).toBe(80);
    });
    it('passes the spanning-tree strategy through', async () => {
      // Act
      const kruskal = await run({ seed: 'acm-0', print: false });
      const prim = await run({ seed: 'acm-0', print: false, mst: Mst.prim });
      // Assert
      expect(prim.edges).toEqual(kruskal.edges);
    });
  });

  describe('Scenario: verbose progress', () => {
    it('logs the output sum every progressInterval samples', async () => {
      // Arrange
      config.verbose = true;
      config.progressInterval = 50;
      const log = jest.spyOn(console, 'log');
      // Act
      await run({ seed: 'acm-0', print: false });
      // Assert
      expect(
        log.mock.calls.map(([line]) => String(line).replace(/: output sum .*$/, ''))
      ).toEqual(['[acm] run 50', '[acm] run 100', '[acm] run 150']);
      log.mockRestore();
    });
    it('stays silent when verbose is off', async () => {
      // Arrange
      const log = jest.spyOn(console, 'log');
      // Act
      await run({ seed: 'acm-0', print: false });
      // Assert
      expect(log).not.toHaveBeenCalled();
      log.mockRestore();
    });
  });

  describe('Scenario: diagram output', () => {
    let dir: string;
    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'acm-run-'));
    });
    afterEach(async () => {
      await fs.remove(dir);
    });

    it('writes the DOT rendering of the tree', async () => {
      // Arrange
      const file = path.join(dir, 'tree.dot');
      // Act
      const report = await run({ seed: 'acm-0', print: false, diagramFile: file });
      // Assert
      expect(await fs.readFile(file, 'utf8')).toBe(toDot(report.edges));
    });
  });

  it('rejects a correlated fixture below six dimensions', async () => {
    // Act & Assert
    await expect(run({ inputLength: 4, print: false })).rejects.toThrow(
      'For createCorrelatedSamples an input vector size of at least 6 is needed (got 4).'
    );
  });
});
