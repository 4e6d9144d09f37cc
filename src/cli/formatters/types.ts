/**
 * Formatter type definitions.
 */
import type { ChecksumOutcome } from '../../core/checksum/types.js';
import type { ChecksumUtilsError } from '../../utils/errors.js';

/**
 * The two checksum commands.
 */
export type CommandKind = 'check' | 'create';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Append elapsed time to per-file lines */
  showTiming: boolean;
}

/**
 * Interface for summary formatters.
 */
export interface IFormatter<O extends ChecksumOutcome> {
  /**
   * Format the summary of one group's results.
   */
  formatSummary(results: readonly O[]): string[];

  /**
   * Format the run-wide traversal errors.
   */
  formatErrors(errors: readonly ChecksumUtilsError[]): string[];
}
