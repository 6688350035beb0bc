import Mst, { type MstFunction } from '../methods/mst';
import { allocateArena, copyMatrix, resetArena, type WeightArena } from './weightArena';
import { INITIAL_WEIGHT } from './acm/acm.constants';
import { ConfigurationError, ModelStateError } from './acm/acm.errors';
import { outputSum as _outputSum, runOnceImpl } from './acm/acm.update';
import {
  resolveOptions,
  trainImpl,
  type TrainingOptions,
  type TrainingResult,
} from './acm/acm.train';
import { summarizeTree, type TreeEdge } from './acm/acm.summary';

/** Construction options. */
export interface AutoContractiveMapOptions {
  /** One label per dimension. Default: `x0 … x{N-1}`. */
  labels?: readonly string[];
  /** Spanning-tree strategy applied after training. Default: {@link Mst.kruskal}. */
  mst?: MstFunction;
}

/**
 * Auto-Contractive Map.
 *
 * An unsupervised two-layer map whose weights contract toward values reflecting
 * how strongly input components co-vary. After a training pass the hidden weight
 * matrix is reduced to a minimum spanning tree that summarizes the discovered
 * relationships.
 *
 * Lifecycle: `untrained` → `train()` → `trained`. Any failure inside an update
 * marks the map `failed`; only `reset()` leaves that state.
 *
 * @example
 * const map = new AutoContractiveMap(10, 2, { labels });
 * map.train(samples);
 * for (const edge of map.summarize()) console.log(edge.from, edge.to, edge.weight);
 */
export default class AutoContractiveMap {
  /** Input vector length N. */
  readonly inputLength: number;
  /** Contraction parameter C (> 1). */
  readonly contraction: number;
  private _labels: string[];
  private readonly _mst: MstFunction;
  private readonly _arena: WeightArena;
  private readonly _scaled: Float64Array;
  private _runs = 0;
  private _tree?: number[][];
  private _failed = false;

  constructor(inputLength: number, contraction: number, options: AutoContractiveMapOptions = {}) {
    if (!Number.isInteger(inputLength) || inputLength < 1) {
      throw new ConfigurationError(`Input length must be a positive integer (got ${inputLength})`);
    }
    if (!Number.isFinite(contraction) || contraction <= 1) {
      throw new ConfigurationError(`Contraction must be a finite number > 1 (got ${contraction})`);
    }
    this.inputLength = inputLength;
    this.contraction = contraction;
    this._labels = this.validateLabels(
      options.labels ?? Array.from({ length: inputLength }, (_, i) => `x${i}`)
    );
    this._mst = options.mst ?? Mst.kruskal;
    this._arena = allocateArena(inputLength, INITIAL_WEIGHT);
    this._scaled = new Float64Array(inputLength);
  }

  /** Dimension labels (copy). */
  get labels(): string[] {
    return this._labels.slice();
  }

  set labels(labels: readonly string[]) {
    this._labels = this.validateLabels(labels);
  }

  /** Samples processed by the most recent `train()` call. */
  get runs(): number {
    return this._runs;
  }

  /** True once an update failed; cleared by `reset()`. */
  get failed(): boolean {
    return this._failed;
  }

  /**
   * Apply a single raw sample (rescaled internally to [0, 1]).
   *
   * @throws {PreconditionError} Wrong length, non-finite or constant sample.
   * @throws {NumericOverflowError} A phase produced a non-finite value.
   * @throws {ModelStateError} The map failed earlier and was not reset.
   */
  runOnce(sample: ArrayLike<number>): void {
    this.assertUsable();
    try {
      runOnceImpl(
        { contraction: this.contraction, arena: this._arena, scaled: this._scaled },
        sample
      );
    } catch (error) {
      this._failed = true;
      throw error;
    }
  }

  /**
   * Train on `samples` in order, stopping early once the output sum vanishes,
   * then compute and store the spanning tree of the hidden weights.
   */
  train(samples: Iterable<ArrayLike<number>>, options: TrainingOptions = {}): TrainingResult {
    this.assertUsable();
    // Rejected options leave the previous tree and counter in place.
    resolveOptions(options);
    this._runs = 0;
    this._tree = undefined;
    const result = trainImpl(this, samples, () => this._runs++, options);
    this._tree = this._mst(this._arena.rows);
    return result;
  }

  /**
   * Labelled edges of the stored spanning tree, row-major.
   *
   * @throws {ModelStateError} Before training or after a failed update.
   */
  summarize(): TreeEdge[] {
    return summarizeTree(this.tree(), this._labels);
  }

  /** Spanning-tree adjacency computed by the last training call (copy). */
  getSpanningTree(): number[][] {
    return this.tree().map((row) => row.slice());
  }

  /** Sum of the current output activations. */
  outputSum(): number {
    return _outputSum(this._arena);
  }

  /** Input weights `v` (copy). */
  getInputWeights(): number[] {
    return Array.from(this._arena.v);
  }

  /** Hidden-to-output weights `w` (copy). */
  getWeights(): number[][] {
    return copyMatrix(this._arena);
  }

  /** Hidden activations of the last update (copy). */
  getHidden(): number[] {
    return Array.from(this._arena.hidden);
  }

  /** Output activations of the last update (copy). */
  getOutput(): number[] {
    return Array.from(this._arena.out);
  }

  /** Restore initial weights and clear runs, tree and failure flag. */
  reset(): void {
    resetArena(this._arena, INITIAL_WEIGHT);
    this._runs = 0;
    this._tree = undefined;
    this._failed = false;
  }

  private tree(): number[][] {
    this.assertUsable();
    if (!this._tree) {
      throw new ModelStateError('No spanning tree available; train the map first.');
    }
    return this._tree;
  }

  private assertUsable(): void {
    if (this._failed) {
      throw new ModelStateError('Map state is invalid after a failed update; call reset().');
    }
  }

  private validateLabels(labels: readonly string[]): string[] {
    if (labels.length !== this.inputLength) {
      throw new ConfigurationError(
        `Expected ${this.inputLength} labels, got ${labels.length}`
      );
    }
    return labels.slice();
  }
}
