/**
 * Mutable state of one command run.
 */
import type { ChecksumOutcome } from '../checksum/types.js';
import type { ChecksumUtilsError } from '../../utils/errors.js';

/**
 * Results of the group being processed plus every traversal error so far.
 *
 * Owned by the run loop, which only appends; the interrupt handler reads the
 * same instance to flush partial results.
 */
export class RunState<O extends ChecksumOutcome> {
  private currentLabel: string | null = null;
  private currentResults: O[] = [];
  private readonly runErrors: ChecksumUtilsError[] = [];

  /**
   * Start a new group. The previous group's results are discarded.
   */
  beginGroup(label: string): void {
    this.currentLabel = label;
    this.currentResults = [];
  }

  record(outcome: O): void {
    this.currentResults.push(outcome);
  }

  recordError(error: ChecksumUtilsError): void {
    this.runErrors.push(error);
  }

  recordErrors(errors: readonly ChecksumUtilsError[]): void {
    this.runErrors.push(...errors);
  }

  get label(): string | null {
    return this.currentLabel;
  }

  get results(): readonly O[] {
    return this.currentResults;
  }

  get errors(): readonly ChecksumUtilsError[] {
    return this.runErrors;
  }
}
