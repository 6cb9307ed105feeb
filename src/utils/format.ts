/**
 * Human-readable sizes and durations for skip messages and the report.
 */

const KB = 1024;
const MB = 1024 * 1024;

/**
 * Format a byte count as bytes, KB or MB (two decimals above 1 KB).
 */
export function formatSize(size: number): string {
  if (size < KB) {
    return `${size} bytes`;
  }
  if (size < MB) {
    return `${(size / KB).toFixed(2)} KB`;
  }
  return `${(size / MB).toFixed(2)} MB`;
}

/**
 * Format a duration given in milliseconds using the largest unit that keeps
 * the value at or above one: s, ms, µs, ns.
 */
export function formatDuration(ms: number): string {
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  if (ms >= 1) {
    return `${ms.toFixed(2)}ms`;
  }
  if (ms >= 0.001) {
    return `${(ms * 1000).toFixed(2)}µs`;
  }
  return `${(ms * 1_000_000).toFixed(2)}ns`;
}
