/**
 * Training sample fixtures.
 *
 * Each fixture returns a {@link SampleSet}: ordered vectors plus one label per
 * dimension. Randomness comes from an injectable `rng`; pass `seed` instead to
 * get a reproducible seedrandom (ARC4) stream.
 */
import seedrandom from 'seedrandom';
import {
  DEFAULT_SAMPLE_COUNT,
  MIN_CORRELATED_LENGTH,
} from '../architecture/acm/acm.constants';
import { ConfigurationError } from '../architecture/acm/acm.errors';
import { onceWarn } from '../utils/warnings';

/** Ordered training vectors and their dimension labels. */
export interface SampleSet {
  inputLength: number;
  labels: string[];
  samples: number[][];
}

/** Options shared by every fixture. */
export interface SampleOptions {
  /** Number of vectors to generate. Default 1000. */
  count?: number;
  /** Seed for a reproducible stream (ignored when `rng` is given). */
  seed?: string;
  /** Uniform [0, 1) source. */
  rng?: () => number;
}

/** Labels of the ten leading correlated-fixture dimensions. */
const CORRELATED_LABELS = [
  'R1',
  '2xR1',
  'R1+0.1',
  'R1^2',
  '2*R1^2',
  '3xR1^2',
  'R2>0.9',
  'R3>0.9',
  'R4>0.9',
  'R5>0.9',
] as const;

/** Last index whose value is a narrow `[0.9, 1)` draw. */
const LAST_NARROW_INDEX = CORRELATED_LABELS.length - 1;

function resolveRng(options: SampleOptions): () => number {
  if (options.rng) return options.rng;
  return options.seed === undefined ? seedrandom() : seedrandom(options.seed);
}

function resolveCount(options: SampleOptions): number {
  const count = options.count ?? DEFAULT_SAMPLE_COUNT;
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigurationError(`Sample count must be a positive integer (got ${count})`);
  }
  return count;
}

function assertLength(inputLength: number, minimum: number, fixture: string): void {
  if (!Number.isInteger(inputLength) || inputLength < minimum) {
    throw new ConfigurationError(
      `For ${fixture} an input vector size of at least ${minimum} is needed (got ${inputLength}).`
    );
  }
}

/**
 * Uncorrelated fixture: every component drawn independently from U[0, 1).
 * Labels are `R0 … R{N-1}`.
 */
export function createRandomSamples(inputLength: number, options: SampleOptions = {}): SampleSet {
  assertLength(inputLength, 1, 'createRandomSamples');
  const count = resolveCount(options);
  const rng = resolveRng(options);
  const samples: number[][] = [];
  for (let s = 0; s < count; s++) {
    const vector: number[] = [];
    for (let j = 0; j < inputLength; j++) vector.push(rng());
    samples.push(vector);
  }
  const labels = Array.from({ length: inputLength }, (_, j) => `R${j}`);
  return { inputLength, labels, samples };
}

/**
 * Correlated fixture. Per sample, with `r = rng()`:
 *
 *   [r, 2r, r + 0.1, r², 2r², 3r², u6, u7, u8, u9, x10, …]
 *
 * where `u` = `rng() * 0.1 + 0.9` (only for indices that exist) and `x` = `rng()`
 * for indices beyond 9, drawn in that order. Dimensions beyond 9 carry the generic
 * labels `R<index>`.
 *
 * @throws {ConfigurationError} When `inputLength < 6`.
 */
export function createCorrelatedSamples(
  inputLength: number,
  options: SampleOptions = {}
): SampleSet {
  assertLength(inputLength, MIN_CORRELATED_LENGTH, 'createCorrelatedSamples');
  const count = resolveCount(options);
  const rng = resolveRng(options);
  if (inputLength > CORRELATED_LABELS.length) {
    onceWarn(
      'correlated-generic-labels',
      `createCorrelatedSamples: dimensions ${CORRELATED_LABELS.length}..${inputLength - 1} are uncorrelated uniform draws.`
    );
  }

  const samples: number[][] = [];
  for (let s = 0; s < count; s++) {
    const vector = new Array<number>(inputLength).fill(0);
    const r = rng();
    vector[0] = r;
    vector[1] = r * 2;
    vector[2] = r + 0.1;
    vector[3] = r * r;
    vector[4] = r * r * 2;
    vector[5] = r * r * 3;
    for (let j = MIN_CORRELATED_LENGTH; j < inputLength && j <= LAST_NARROW_INDEX; j++) {
      vector[j] = rng() * 0.1 + 0.9;
    }
    for (let j = LAST_NARROW_INDEX + 1; j < inputLength; j++) vector[j] = rng();
    samples.push(vector);
  }

  const labels: string[] = [];
  for (let j = 0; j < inputLength; j++) {
    labels.push(j < CORRELATED_LABELS.length ? CORRELATED_LABELS[j] : `R${j}`);
  }
  return { inputLength, labels, samples };
}
