/**
 * Summary buckets computed from a result set.
 */
import type { CreationOutcome, VerificationOutcome } from '../checksum/types.js';

export interface VerificationSummary {
  total: number;
  matched: number;
  notMatched: VerificationOutcome[];
  notFound: VerificationOutcome[];
  locked: VerificationOutcome[];
  failed: VerificationOutcome[];
}

export interface CreationSummary {
  total: number;
  created: number;
  existing: number;
  locked: CreationOutcome[];
  failed: CreationOutcome[];
}

export function summarizeVerification(results: readonly VerificationOutcome[]): VerificationSummary {
  const summary: VerificationSummary = {
    total: results.length,
    matched: 0,
    notMatched: [],
    notFound: [],
    locked: [],
    failed: [],
  };

  for (const result of results) {
    switch (result.status) {
      case 'Match':
        summary.matched++;
        break;
      case 'NotMatch':
        summary.notMatched.push(result);
        break;
      case 'NotFound':
        summary.notFound.push(result);
        break;
      case 'Locked':
        summary.locked.push(result);
        break;
      case 'CheckingFailed':
        summary.failed.push(result);
        break;
    }
  }

  return summary;
}

export function summarizeCreation(results: readonly CreationOutcome[]): CreationSummary {
  const summary: CreationSummary = {
    total: results.length,
    created: 0,
    existing: 0,
    locked: [],
    failed: [],
  };

  for (const result of results) {
    switch (result.status) {
      case 'Created':
        summary.created++;
        break;
      case 'Existing':
        summary.existing++;
        break;
      case 'LockedCreation':
        summary.locked.push(result);
        break;
      case 'Failed':
        summary.failed.push(result);
        break;
    }
  }

  return summary;
}
