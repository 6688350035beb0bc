import { config } from '../config';

// One-time warning utility
const seen = new Set<string>();

/**
 * Emit `message` once per `key` for the lifetime of the process, and only while
 * `config.warnings` is enabled.
 */
export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget previously emitted keys (tests). */
export function resetWarnings(): void {
  seen.clear();
}
