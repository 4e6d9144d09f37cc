/**
 * Expansion of raw inputs (paths, globs, stdin lists) into candidates.
 */
import * as path from 'node:path';
import { isSidecarPath } from '../checksum/sidecar.js';
import { getStats, globEntries, isGlobPattern } from '../../utils/file-system.js';
import {
  ErrorCodes,
  TraversalError,
  errorMessage,
  isNotFoundError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { walkDirectory } from './walker.js';
import type { CandidateList, ExpandOptions, ExpandedInputs, InputGroup, WalkOptions } from './types.js';

export const STDIN_LABEL = '(stdin)';

/**
 * Group raw inputs for processing.
 *
 * Relative paths resolve against `options.cwd`. A literal path is its own
 * group. A glob pattern becomes one group holding its matches, minus sidecar
 * files; a pattern with no matches is an error and the remaining inputs are
 * still expanded. Paths piped on stdin form a final group.
 */
export async function expandInputs(
  rawInputs: string[],
  options: ExpandOptions = {}
): Promise<ExpandedInputs> {
  const groups: InputGroup[] = [];
  const errors: TraversalError[] = [];
  const cwd = options.cwd ?? process.cwd();

  for (const input of rawInputs) {
    if (!isGlobPattern(input)) {
      groups.push({ label: input, source: 'path', paths: [path.resolve(cwd, input)] });
      continue;
    }

    let matches: string[];
    try {
      matches = await globEntries(input, { cwd });
    } catch (error) {
      errors.push(new TraversalError(ErrorCodes.WALK_FAILED, errorMessage(error), { pattern: input }));
      continue;
    }

    const paths = matches.filter((match) => !isSidecarPath(match));
    if (paths.length === 0) {
      errors.push(
        new TraversalError(ErrorCodes.NO_MATCHES, `no matches for "${input}"`, { pattern: input })
      );
      continue;
    }
    logger.debug(`Pattern ${input} matched ${paths.length} path(s)`);
    groups.push({ label: input, source: 'glob', paths });
  }

  if (options.stdinPaths && options.stdinPaths.length > 0) {
    groups.push({ label: STDIN_LABEL, source: 'stdin', paths: options.stdinPaths.map((p) => path.resolve(cwd, p)) });
  }

  return { groups, errors };
}

/**
 * Resolve one path into candidates.
 *
 * Directories are walked; a sidecar named directly is reported as an error;
 * a path that cannot be stat'ed is reported and skipped.
 */
export async function collectCandidates(
  inputPath: string,
  options: WalkOptions = {}
): Promise<CandidateList> {
  const absolutePath = path.resolve(inputPath);

  let isDirectory: boolean;
  try {
    isDirectory = (await getStats(absolutePath)).isDirectory();
  } catch (error) {
    const code = isNotFoundError(error) ? ErrorCodes.PATH_NOT_FOUND : ErrorCodes.PATH_UNREADABLE;
    return {
      candidates: [],
      errors: [new TraversalError(code, errorMessage(error), { path: absolutePath })],
    };
  }

  if (isDirectory) {
    return walkDirectory(absolutePath, options);
  }

  if (isSidecarPath(absolutePath)) {
    return {
      candidates: [],
      errors: [
        new TraversalError(
          ErrorCodes.IS_CHECKSUM_FILE,
          `${absolutePath} is a checksum file.`,
          { path: absolutePath }
        ),
      ],
    };
  }

  return { candidates: [absolutePath], errors: [] };
}

/**
 * Collect the candidates of every path in a group, in order.
 */
export async function collectGroupCandidates(
  group: InputGroup,
  options: WalkOptions = {}
): Promise<CandidateList> {
  const candidates: string[] = [];
  const errors: TraversalError[] = [];
  for (const groupPath of group.paths) {
    const collected = await collectCandidates(groupPath, options);
    candidates.push(...collected.candidates);
    errors.push(...collected.errors);
  }
  return { candidates, errors };
}

/**
 * Flatten raw inputs into one ordered candidate list plus every error met
 * along the way.
 */
export async function expand(
  rawInputs: string[],
  options: ExpandOptions = {}
): Promise<CandidateList> {
  const expanded = await expandInputs(rawInputs, options);
  const candidates: string[] = [];
  const errors: TraversalError[] = [...expanded.errors];

  for (const group of expanded.groups) {
    const collected = await collectGroupCandidates(group, options);
    candidates.push(...collected.candidates);
    errors.push(...collected.errors);
  }

  return { candidates, errors };
}
