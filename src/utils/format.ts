/**
 * Formatting utilities for terminal display.
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;

/**
 * Format an elapsed time for a per-file result line.
 *
 * Below one second the value is shown in whole milliseconds; above that it is
 * rounded to whole seconds and split into `h`, `m` and `s` parts.
 *
 * @example
 * formatDuration(42.4)      // '42ms'
 * formatDuration(61_499)    // '1m1s'
 * formatDuration(3_723_000) // '1h2m3s'
 */
export function formatDuration(ms: number): string {
  const rounded = Math.round(ms);

  if (rounded < SECOND) {
    return `${rounded}ms`;
  }

  const totalSeconds = Math.round(rounded / SECOND);

  if (totalSeconds >= HOUR / SECOND) {
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    return `${hours}h${minutes}m${seconds}s`;
  }

  if (totalSeconds >= MINUTE / SECOND) {
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    return `${minutes}m${seconds}s`;
  }

  return `${totalSeconds}s`;
}
