/**
 * Human-readable terminal output.
 */
import chalk from 'chalk';
import { formatDuration } from '../../utils/format.js';
import { summarizeCreation, summarizeVerification } from '../../core/results/summary.js';
import type {
  ChecksumOutcome,
  CreationOutcome,
  CreationStatus,
  VerificationOutcome,
  VerificationStatus,
} from '../../core/checksum/types.js';
import type { ChecksumUtilsError } from '../../utils/errors.js';
import type { FormatOptions, IFormatter } from './types.js';

export const VERIFICATION_ICONS: Record<VerificationStatus, string> = {
  Match: '✅',
  NotMatch: '⚠️',
  NotFound: '👻',
  Locked: '🔒',
  CheckingFailed: '❌',
};

export const CREATION_ICONS: Record<CreationStatus, string> = {
  Created: '✨',
  Existing: '📄',
  LockedCreation: '🔒',
  Failed: '❌',
};

/** Statuses reported without timing: nothing was hashed. */
const UNTIMED_STATUSES: ReadonlySet<string> = new Set(['NotFound', 'Existing']);

type Color = 'red' | 'yellow' | 'green' | 'dim' | 'bold';

const STATUS_ICONS: Record<VerificationStatus | CreationStatus, string> = {
  ...VERIFICATION_ICONS,
  ...CREATION_ICONS,
};

export function statusIcon(status: VerificationStatus | CreationStatus): string {
  return STATUS_ICONS[status];
}

/**
 * Shared line building for both commands.
 */
export abstract class HumanFormatterBase<O extends ChecksumOutcome> implements IFormatter<O> {
  protected options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      showTiming: options.showTiming ?? true,
    };
  }

  abstract formatSummary(results: readonly O[]): string[];

  formatHeader(version: string): string[] {
    return [this.colorize(`Checksum-Utils ${version}`, 'bold')];
  }

  formatGroupHeader(label: string): string[] {
    return ['', `Processing ${label}`];
  }

  filePrefix(filePath: string): string {
    return `- ${filePath} `;
  }

  /**
   * The text written after a file's prefix once it is done, e.g. `✅ (12ms)`.
   */
  formatFileStatus(outcome: O, elapsedMs: number): string {
    const icon = statusIcon(outcome.status);
    if (!this.options.showTiming || UNTIMED_STATUSES.has(outcome.status)) {
      return icon;
    }
    return `${icon} ${this.colorize(`(${formatDuration(elapsedMs)})`, 'dim')}`;
  }

  formatErrors(errors: readonly ChecksumUtilsError[]): string[] {
    if (errors.length === 0) return [];
    return ['', this.colorize('Errors:', 'red'), ...errors.map((error) => `- ${error.message}`)];
  }

  protected formatProcessed(count: number): string[] {
    return count > 0 ? [`Results: ${count} files processed`] : [];
  }

  protected formatBucket(
    icon: string,
    count: number,
    description: string,
    entries: readonly ChecksumOutcome[] = [],
    withErrors = false
  ): string[] {
    if (count === 0) return [];
    const lines = [`${icon} : ${count} ${description}`];
    for (const entry of entries) {
      lines.push(withErrors && entry.error ? `- ${entry.path} | Error: ${entry.error.message}` : `- ${entry.path}`);
    }
    return lines;
  }

  protected colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}

/**
 * Output for `check`.
 */
export class HumanVerificationFormatter extends HumanFormatterBase<VerificationOutcome> {
  formatSummary(results: readonly VerificationOutcome[]): string[] {
    const summary = summarizeVerification(results);
    return [
      ...this.formatProcessed(summary.total),
      ...this.formatBucket(VERIFICATION_ICONS.Match, summary.matched, 'checksum files match'),
      ...this.formatBucket(VERIFICATION_ICONS.NotMatch, summary.notMatched.length, 'checksum files not match', summary.notMatched),
      ...this.formatBucket(VERIFICATION_ICONS.NotFound, summary.notFound.length, 'files without a checksum file', summary.notFound),
      ...this.formatBucket(VERIFICATION_ICONS.Locked, summary.locked.length, 'files could not be read due to permissions', summary.locked),
      ...this.formatBucket(VERIFICATION_ICONS.CheckingFailed, summary.failed.length, 'checksum files failed to check', summary.failed, true),
    ];
  }
}

/**
 * Output for `create`.
 */
export class HumanCreationFormatter extends HumanFormatterBase<CreationOutcome> {
  formatSummary(results: readonly CreationOutcome[]): string[] {
    const summary = summarizeCreation(results);
    return [
      ...this.formatProcessed(summary.total),
      ...this.formatBucket(CREATION_ICONS.Created, summary.created, 'checksum files created'),
      ...this.formatBucket(CREATION_ICONS.Existing, summary.existing, 'files already had a checksum file'),
      ...this.formatBucket(CREATION_ICONS.LockedCreation, summary.locked.length, 'files could not be read due to permissions', summary.locked),
      ...this.formatBucket(CREATION_ICONS.Failed, summary.failed.length, 'checksum files failed to create', summary.failed, true),
    ];
  }
}
