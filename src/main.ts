#!/usr/bin/env node
/**
 * Run entry point: correlated fixture → map training → tree report.
 *
 * Executed directly (`node dist/main.js`) it trains a 10-dimensional map with
 * contraction 2 on 1000 correlated samples and prints the resulting tree.
 */
import { config } from './config';
import AutoContractiveMap from './architecture/acm';
import {
  DEFAULT_CONTRACTION,
  DEFAULT_INPUT_LENGTH,
  DEFAULT_SAMPLE_COUNT,
} from './architecture/acm/acm.constants';
import type { TreeEdge } from './architecture/acm/acm.summary';
import type { TrainingResult } from './architecture/acm/acm.train';
import type { MstFunction } from './methods/mst';
import { createCorrelatedSamples, createRandomSamples } from './datasets/samples';
import { printTree } from './reporting/treePrinter';
import { renderAsciiTree, writeDiagram } from './reporting/treeDiagram';

/** Options of {@link run}; every field has a default. */
export interface RunOptions {
  inputLength?: number;
  contraction?: number;
  /** Which fixture feeds the map. Default `correlated`. */
  fixture?: 'correlated' | 'random';
  count?: number;
  seed?: string;
  mst?: MstFunction;
  /** Write a Graphviz diagram of the tree to this path. */
  diagramFile?: string;
  /** Print the text report and ASCII tree. Default true. */
  print?: boolean;
}

/** What a run produced. */
export interface RunReport {
  labels: string[];
  training: TrainingResult;
  edges: TreeEdge[];
}

/**
 * Build the fixture, train a fresh map, then report its spanning tree.
 */
export async function run(options: RunOptions = {}): Promise<RunReport> {
  const inputLength = options.inputLength ?? DEFAULT_INPUT_LENGTH;
  const contraction = options.contraction ?? DEFAULT_CONTRACTION;
  const sampleOptions = { count: options.count ?? DEFAULT_SAMPLE_COUNT, seed: options.seed };
  const set =
    options.fixture === 'random'
      ? createRandomSamples(inputLength, sampleOptions)
      : createCorrelatedSamples(inputLength, sampleOptions);

  const map = new AutoContractiveMap(inputLength, contraction, {
    labels: set.labels,
    mst: options.mst,
  });
  const interval = Math.max(1, Math.floor(config.progressInterval));
  const training = map.train(set.samples, {
    schedule: config.verbose
      ? {
          runs: interval,
          function: ({ run: step, outputSum }) =>
            console.log(`[acm] run ${step}: output sum ${outputSum}`),
        }
      : undefined,
  });
  const edges = map.summarize();

  if (options.print ?? true) {
    printTree(edges, map.runs);
    console.log('');
    for (const line of renderAsciiTree(edges)) console.log(line);
  }
  if (options.diagramFile) await writeDiagram(options.diagramFile, edges);
  return { labels: set.labels, training, edges };
}

if (require.main === module) {
  run().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
