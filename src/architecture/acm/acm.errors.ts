/**
 * Error taxonomy for the auto-contractive map.
 *
 * Every failure is fatal for the operation that raised it. Update-time failures
 * (precondition or numeric) additionally mark the model as failed so its weights
 * cannot be summarized until `reset()` is called.
 */

/** Update phases checked for finiteness after they write their buffer. */
export type UpdatePhase = 'hidden' | 'inputWeights' | 'net' | 'output' | 'weights';

/** Base class of all errors raised by this package. */
export class ContractiveMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid construction parameters, fixture settings or training options. */
export class ConfigurationError extends ContractiveMapError {}

/** A sample that cannot be fed to the update step. */
export class PreconditionError extends ContractiveMapError {
  /** Offending sample values (raw or rescaled, depending on the check). */
  readonly values: number[];

  constructor(message: string, values: ArrayLike<number>) {
    super(`${message}: [${Array.from(values).join(', ')}]`);
    this.values = Array.from(values);
  }
}

/** A non-finite value written by one of the update phases. */
export class NumericOverflowError extends ContractiveMapError {
  readonly phase: UpdatePhase;
  /** Flat buffer index (row-major `i * N + j` for the `weights` phase). */
  readonly index: number;
  readonly value: number;

  constructor(phase: UpdatePhase, index: number, value: number) {
    super(`Non-finite value ${value} in ${phase} at index ${index}`);
    this.phase = phase;
    this.index = index;
    this.value = value;
  }
}

/** Operation not allowed in the model's current lifecycle state. */
export class ModelStateError extends ContractiveMapError {}
