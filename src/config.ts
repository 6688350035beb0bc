/**
 * Global contractive-map configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'contractive-map';
 *   config.warnings = true;  // emit runtime guidance
 *   config.verbose = true;   // progress lines from run()
 *
 * Adjust BEFORE training so that the loop and the fixtures read the intended values.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object: no setters, no proxies.
 * - Every flag is off by default so library calls stay silent unless a caller opts in.
 */
export interface ContractiveMapConfig {
  /**
   * Emit guidance to stderr via `console.warn` (non-converged training, generic fixture labels).
   * Default: false
   */
  warnings: boolean;

  /**
   * Print progress lines while `run()` trains.
   * Default: false
   */
  verbose: boolean;

  /**
   * Number of processed samples between two progress lines when `verbose` is on.
   * Values below 1 are treated as 1.
   * Default: 100
   */
  progressInterval: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: ContractiveMapConfig = {
  warnings: false, // emit runtime guidance
  verbose: false, // progress output from run()
  progressInterval: 100, // samples per progress line
};
