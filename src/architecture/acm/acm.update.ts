/**
 * Single-sample update step of the auto-contractive map.
 *
 * Phases (each completes before the next reads its output):
 *  0. rescale the raw sample into [0, 1]
 *  1. hidden signal           h[i]  = x[i] * (1 - v[i]/C)
 *  2. input weight adaption   v[i] += (x[i] - h[i]) * (1 - v[i]/C)
 *  3. net accumulation        n[i]  = Σ_j h[j] * (1 - w[i][j]/C)
 *  4. output signal           o[i]  = h[i] * (1 - n[i]/C)
 *  5. hidden weight adaption  w[i][j] += (h[i] - o[i]) * (1 - w[i][j]/C) * h[j]
 *
 * Every product is evaluated left to right exactly as written; regrouping the
 * factors changes intermediate magnitudes and therefore the rounding.
 * Each phase validates the buffer it wrote before the next one starts.
 */
import { rescaleUnitInterval } from '../../methods/normalization';
import type { WeightArena } from '../weightArena';
import { NumericOverflowError, PreconditionError, type UpdatePhase } from './acm.errors';

/** Mutable numeric state the update step operates on. */
export interface UpdateState {
  readonly contraction: number;
  readonly arena: WeightArena;
  /** Scratch buffer receiving the rescaled sample. */
  readonly scaled: Float64Array;
}

/** Throw on the first non-finite entry of `buffer`. */
export function assertFinite(buffer: Float64Array, phase: UpdatePhase): void {
  for (let i = 0; i < buffer.length; i++) {
    if (!Number.isFinite(buffer[i])) throw new NumericOverflowError(phase, i, buffer[i]);
  }
}

/**
 * Apply one sample to the map state in place.
 *
 * @param state Arena and contraction of the map being trained.
 * @param sample Raw input vector of length N (any finite, non-constant range).
 * @throws {PreconditionError} When the sample length differs from N or it cannot be rescaled.
 * @throws {NumericOverflowError} When a phase writes a non-finite value.
 */
export function runOnceImpl(state: UpdateState, sample: ArrayLike<number>): void {
  const { contraction: C, arena, scaled } = state;
  const { size: n, v, w, hidden, out, net } = arena;
  if (sample.length !== n) {
    throw new PreconditionError(
      `Sample length ${sample.length} does not match input length ${n}`,
      sample
    );
  }

  rescaleUnitInterval(sample, scaled);

  for (let i = 0; i < n; i++) {
    hidden[i] = scaled[i] * (1 - v[i] / C);
  }
  assertFinite(hidden, 'hidden');

  for (let i = 0; i < n; i++) {
    v[i] += (scaled[i] - hidden[i]) * (1 - v[i] / C);
  }
  assertFinite(v, 'inputWeights');

  for (let i = 0; i < n; i++) {
    const rowOffset = i * n;
    net[i] = 0;
    for (let j = 0; j < n; j++) {
      net[i] += hidden[j] * (1 - w[rowOffset + j] / C);
    }
  }
  assertFinite(net, 'net');

  for (let i = 0; i < n; i++) {
    out[i] = hidden[i] * (1 - net[i] / C);
  }
  assertFinite(out, 'output');

  for (let i = 0; i < n; i++) {
    const rowOffset = i * n;
    const delta = hidden[i] - out[i];
    for (let j = 0; j < n; j++) {
      const k = rowOffset + j;
      w[k] += delta * (1 - w[k] / C) * hidden[j];
    }
  }
  assertFinite(w, 'weights');
}

/** Left-to-right sum of the current output activations. */
export function outputSum(arena: WeightArena): number {
  let sum = 0;
  for (let i = 0; i < arena.out.length; i++) sum += arena.out[i];
  return sum;
}
