/**
 * Types for turning raw command inputs into candidate files.
 */
import type { TraversalError } from '../../utils/errors.js';

/**
 * Where a group of inputs came from.
 */
export type InputSource = 'path' | 'glob' | 'stdin';

/**
 * One top-level input: a literal path, the matches of one glob pattern,
 * or the list of paths piped on stdin. Each group gets its own result set.
 */
export interface InputGroup {
  /** Shown in the "Processing" header */
  label: string;
  source: InputSource;
  paths: string[];
}

export interface ExpandedInputs {
  groups: InputGroup[];
  errors: TraversalError[];
}

/**
 * Candidates are absolute paths to regular, non-sidecar files.
 */
export interface CandidateList {
  candidates: string[];
  errors: TraversalError[];
}

export interface WalkOptions {
  /** gitignore-style patterns relative to the walked directory */
  exclude?: string[];
  followSymlinks?: boolean;
}

export interface ExpandOptions extends WalkOptions {
  /** Paths read from stdin, already filtered */
  stdinPaths?: string[];
  /** Base directory for relative glob patterns */
  cwd?: string;
}
