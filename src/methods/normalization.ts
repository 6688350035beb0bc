/**
 * Input normalization used before every update step.
 *
 * The map's formulas assume each component lies in the closed unit interval, so
 * raw samples are linearly rescaled: the smallest entry maps to 0 and the largest
 * to 1. Constant vectors have no defined rescaling and are rejected.
 */
import { PreconditionError } from '../architecture/acm/acm.errors';

/**
 * Rescale `raw` into `[0, 1]` writing into `target`.
 *
 * Formula: `target[i] = (raw[i] - min) / (max - min)`.
 *
 * @param raw Sample of arbitrary finite range.
 * @param target Destination buffer (same length as `raw`); allocated when omitted.
 * @returns The destination buffer.
 * @throws {PreconditionError} On non-finite entries, a constant vector, or a result outside `[0, 1]`.
 */
export function rescaleUnitInterval(
  raw: ArrayLike<number>,
  target: Float64Array = new Float64Array(raw.length)
): Float64Array {
  if (target.length !== raw.length) {
    throw new PreconditionError(
      `Rescale target length ${target.length} does not match sample length ${raw.length}`,
      raw
    );
  }
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < raw.length; i++) {
    const value = raw[i];
    if (!Number.isFinite(value)) {
      throw new PreconditionError('Training sample holds non-finite data', raw);
    }
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (!(max > min)) {
    throw new PreconditionError(
      'Training sample is constant and cannot be rescaled',
      raw
    );
  }
  const range = max - min;
  for (let i = 0; i < raw.length; i++) target[i] = (raw[i] - min) / range;
  assertUnitInterval(target);
  return target;
}

/**
 * Assert every entry of `values` lies in `[0, 1]`.
 *
 * @throws {PreconditionError} Naming the full vector when a bound is violated.
 */
export function assertUnitInterval(values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    if (values[i] < 0) throw new PreconditionError('Training sample holds data <0', values);
    if (values[i] > 1) throw new PreconditionError('Training sample holds data >1', values);
  }
}
