/**
 * Training loop for the auto-contractive map.
 *
 * Provides:
 *  - TrainingOptions / TrainingResult shapes.
 *  - trainImpl: ordered, single pass over the samples with early stopping on a
 *    vanishing output sum, per-sample metrics hook and periodic schedule hook.
 *
 * Notes:
 *  - Samples are consumed strictly in order and at most once per call; the loop is
 *    a stateful recurrence, so there is no batching or shuffling.
 *  - Hook exceptions propagate to the caller.
 */
import { config } from '../../config';
import { CONVERGENCE_THRESHOLD } from './acm.constants';
import { ConfigurationError } from './acm.errors';

/** Per-sample progress snapshot passed to hooks. */
export interface RunMetrics {
  /** Samples processed so far in this training call (1-based). */
  run: number;
  /** Sum of the output activations after this sample. */
  outputSum: number;
}

/** Periodic hook executed every `runs` samples. */
export interface ScheduleConfig {
  runs: number;
  function: (info: RunMetrics) => void;
}

/** Training options (all optional). */
export interface TrainingOptions {
  /** Stop once the output sum lies in `[0, threshold)`. Default 1e-6. */
  threshold?: number;
  /** Upper bound on samples consumed. Default: no bound. */
  maxRuns?: number;
  /** Telemetry after every sample. */
  metricsHook?: (m: RunMetrics) => void;
  /** Periodic callback. */
  schedule?: ScheduleConfig;
}

/** Outcome of one training call. */
export interface TrainingResult {
  /** Number of samples processed (the run counter). */
  runs: number;
  /** True when the early-stopping condition fired. */
  converged: boolean;
  /** Output sum after the last processed sample. */
  outputSum: number;
  /** Wall-clock duration in milliseconds. */
  time: number;
}

/** Operations the loop needs from the model. */
export interface TrainingTarget {
  runOnce(sample: ArrayLike<number>): void;
  outputSum(): number;
}

/** Validated, defaulted view of {@link TrainingOptions}. */
export interface ResolvedOptions {
  threshold: number;
  maxRuns: number;
}

/**
 * Validate and default {@link TrainingOptions}.
 *
 * @throws {ConfigurationError} On a non-positive threshold, maxRuns or schedule interval.
 */
export function resolveOptions(options: TrainingOptions): ResolvedOptions {
  const threshold = options.threshold ?? CONVERGENCE_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new ConfigurationError(`threshold must be a finite number > 0 (got ${threshold})`);
  }
  const maxRuns = options.maxRuns ?? Infinity;
  if (maxRuns !== Infinity && (!Number.isInteger(maxRuns) || maxRuns < 1)) {
    throw new ConfigurationError(`maxRuns must be a positive integer (got ${maxRuns})`);
  }
  if (options.schedule && (!Number.isInteger(options.schedule.runs) || options.schedule.runs < 1)) {
    throw new ConfigurationError(
      `schedule.runs must be a positive integer (got ${options.schedule.runs})`
    );
  }
  return { threshold, maxRuns };
}

/**
 * Run the ordered training pass.
 *
 * The caller resets its run counter before invoking and increments it through
 * `onRun`, so the counter stays accurate when an update throws mid-sequence.
 *
 * @param target Model receiving the samples.
 * @param samples Ordered training vectors; iterated lazily and never revisited. An
 *   empty sequence ends training with zero runs.
 * @param onRun Invoked once per successfully processed sample.
 * @param options See {@link TrainingOptions}.
 */
export function trainImpl(
  target: TrainingTarget,
  samples: Iterable<ArrayLike<number>>,
  onRun: () => void,
  options: TrainingOptions = {}
): TrainingResult {
  const { threshold, maxRuns } = resolveOptions(options);
  const start = Date.now();
  let runs = 0;
  let converged = false;
  let lastSum = target.outputSum();

  for (const sample of samples) {
    if (runs >= maxRuns) break;
    target.runOnce(sample);
    runs++;
    onRun();
    lastSum = target.outputSum();
    const info: RunMetrics = { run: runs, outputSum: lastSum };
    if (options.metricsHook) options.metricsHook(info);
    if (options.schedule && runs % options.schedule.runs === 0) {
      options.schedule.function(info);
    }
    // Requested precision reached; past this point the outputs only oscillate.
    if (lastSum >= 0 && lastSum < threshold) {
      converged = true;
      break;
    }
  }

  if (!converged && config.warnings) {
    console.warn(
      `Training ended after ${runs} samples without convergence (output sum ${lastSum}).`
    );
  }
  return { runs, converged, outputSum: lastSum, time: Date.now() - start };
}
