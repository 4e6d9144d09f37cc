/**
 * Outcome types produced by the checksum classifiers.
 */

/**
 * Status of verifying one file against its sidecar.
 */
export type VerificationStatus = 'Match' | 'NotMatch' | 'NotFound' | 'Locked' | 'CheckingFailed';

/**
 * Status of creating the sidecar for one file.
 */
export type CreationStatus = 'Created' | 'Existing' | 'LockedCreation' | 'Failed';

/**
 * Outcome of a classifier that completed without a failure.
 * Expected absences (`NotFound`, `Existing`) land here: they are reportable
 * states, not errors.
 */
export interface CleanOutcome<S extends string> {
  readonly path: string;
  readonly status: S;
  readonly error?: undefined;
}

/**
 * Outcome of a classifier that hit a permission or I/O failure.
 */
export interface FailedOutcome<S extends string> {
  readonly path: string;
  readonly status: S;
  /** The underlying error, verbatim */
  readonly error: Error;
}

export type VerificationOutcome =
  | CleanOutcome<'Match' | 'NotMatch' | 'NotFound'>
  | FailedOutcome<'Locked' | 'CheckingFailed'>;

export type CreationOutcome =
  | CleanOutcome<'Created' | 'Existing'>
  | FailedOutcome<'LockedCreation' | 'Failed'>;

/**
 * Any per-file outcome.
 */
export type ChecksumOutcome = VerificationOutcome | CreationOutcome;

/**
 * A per-file classifier: verification or creation.
 */
export type Classifier<O extends ChecksumOutcome> = (filePath: string) => Promise<O>;
