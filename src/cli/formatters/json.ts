/**
 * JSON output for machine consumption.
 */
import { summarizeCreation, summarizeVerification } from '../../core/results/summary.js';
import type { ChecksumOutcome, CreationOutcome, VerificationOutcome } from '../../core/checksum/types.js';
import type { InputSource } from '../../core/traversal/types.js';
import type { ChecksumUtilsError } from '../../utils/errors.js';
import type { CommandKind } from './types.js';

export interface JsonOutcome {
  path: string;
  status: string;
  error?: string;
}

export interface JsonGroupReport {
  label: string;
  source?: InputSource;
  results: JsonOutcome[];
  summary: Record<string, number>;
}

export interface JsonReport {
  command: CommandKind;
  version: string;
  interrupted: boolean;
  groups: JsonGroupReport[];
  errors: Record<string, unknown>[];
}

/**
 * Builds the JSON report of a run.
 */
export class JsonFormatter {
  constructor(private readonly command: CommandKind) {}

  formatGroup(label: string, results: readonly ChecksumOutcome[], source?: InputSource): JsonGroupReport {
    return {
      label,
      ...(source ? { source } : {}),
      results: results.map((result) => this.transformOutcome(result)),
      summary: this.command === 'check'
        ? this.verificationCounts(results.filter(isVerificationOutcome))
        : this.creationCounts(results.filter(isCreationOutcome)),
    };
  }

  formatReport(
    version: string,
    groups: JsonGroupReport[],
    errors: readonly ChecksumUtilsError[],
    interrupted = false
  ): string {
    const report: JsonReport = {
      command: this.command,
      version,
      interrupted,
      groups,
      errors: errors.map((error) => error.toJSON()),
    };
    return JSON.stringify(report, null, 2);
  }

  private transformOutcome(outcome: ChecksumOutcome): JsonOutcome {
    return outcome.error
      ? { path: outcome.path, status: outcome.status, error: outcome.error.message }
      : { path: outcome.path, status: outcome.status };
  }

  private verificationCounts(results: VerificationOutcome[]): Record<string, number> {
    const summary = summarizeVerification(results);
    return {
      total: summary.total,
      match: summary.matched,
      notMatch: summary.notMatched.length,
      notFound: summary.notFound.length,
      locked: summary.locked.length,
      checkingFailed: summary.failed.length,
    };
  }

  private creationCounts(results: CreationOutcome[]): Record<string, number> {
    const summary = summarizeCreation(results);
    return {
      total: summary.total,
      created: summary.created,
      existing: summary.existing,
      locked: summary.locked.length,
      failed: summary.failed.length,
    };
  }
}

const VERIFICATION_STATUSES: ReadonlySet<string> = new Set(['Match', 'NotMatch', 'NotFound', 'Locked', 'CheckingFailed']);

function isVerificationOutcome(outcome: ChecksumOutcome): outcome is VerificationOutcome {
  return VERIFICATION_STATUSES.has(outcome.status);
}

function isCreationOutcome(outcome: ChecksumOutcome): outcome is CreationOutcome {
  return !isVerificationOutcome(outcome);
}
