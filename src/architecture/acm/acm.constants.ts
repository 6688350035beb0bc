/**
 * Shared numerical constants for the auto-contractive map.
 *
 * Kept in a single dependency-free module so the model, the fixtures and the
 * run entry point agree on defaults.
 */

/** Starting value of every input weight `v[i]` and hidden weight `w[i][j]`. */
export const INITIAL_WEIGHT = 0.01;

/** Training stops once the output sum falls inside `[0, CONVERGENCE_THRESHOLD)`. */
export const CONVERGENCE_THRESHOLD = 1e-6;

/** Default input vector length used by the run entry point. */
export const DEFAULT_INPUT_LENGTH = 10;

/** Default contraction parameter used by the run entry point. */
export const DEFAULT_CONTRACTION = 2;

/** Number of vectors generated by the sample fixtures when no count is given. */
export const DEFAULT_SAMPLE_COUNT = 1000;

/** Smallest input length accepted by the correlated fixture. */
export const MIN_CORRELATED_LENGTH = 6;

// Add new constants above; keep file import-free.
