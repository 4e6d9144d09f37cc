/**
 * Recursive directory walk producing candidate files.
 */
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import { isSidecarPath } from '../checksum/sidecar.js';
import { getStats, readDirSorted, realPath } from '../../utils/file-system.js';
import { createPathMatcher } from '../../utils/path-matcher.js';
import { ErrorCodes, TraversalError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { CandidateList, WalkOptions } from './types.js';

const log = logger.child('walk');

type EntryKind = 'file' | 'directory' | 'skip';

/**
 * Walk a directory depth-first, in name order within each directory.
 *
 * Every regular file that is not a sidecar becomes a candidate. A directory
 * that cannot be listed is recorded as an error and its siblings are still
 * walked. Symlinked directories are only entered with `followSymlinks`, and
 * each real directory is entered at most once.
 */
export async function walkDirectory(root: string, options: WalkOptions = {}): Promise<CandidateList> {
  const rootPath = path.resolve(root);
  const matcher = createPathMatcher(options.exclude);
  const candidates: string[] = [];
  const errors: TraversalError[] = [];
  const visited = new Set<string>();

  async function classifyEntry(entry: Dirent, fullPath: string): Promise<EntryKind> {
    if (entry.isDirectory()) return 'directory';
    if (entry.isFile()) return 'file';
    if (!entry.isSymbolicLink()) return 'skip';

    try {
      const stats = await getStats(fullPath);
      if (stats.isDirectory()) {
        return options.followSymlinks ? 'directory' : 'skip';
      }
      return stats.isFile() ? 'file' : 'skip';
    } catch {
      // Dangling link: hand it to the classifier, which reports the failure.
      return 'file';
    }
  }

  async function scanDir(currentPath: string): Promise<void> {
    let entries: Dirent[];
    try {
      const real = await realPath(currentPath);
      if (visited.has(real)) {
        log.debug(`Skipping already visited directory ${currentPath}`);
        return;
      }
      visited.add(real);
      entries = await readDirSorted(currentPath);
    } catch (error) {
      errors.push(
        new TraversalError(ErrorCodes.WALK_FAILED, errorMessage(error), { path: currentPath })
      );
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);
      const kind = await classifyEntry(entry, fullPath);

      if (kind === 'skip') {
        log.debug(`Skipping ${fullPath}`);
        continue;
      }
      if (matcher.excludes(path.relative(rootPath, fullPath), kind === 'directory')) {
        log.debug(`Excluded ${fullPath}`);
        continue;
      }

      if (kind === 'directory') {
        await scanDir(fullPath);
      } else if (!isSidecarPath(fullPath)) {
        candidates.push(fullPath);
      }
    }
  }

  await scanDir(rootPath);
  return { candidates, errors };
}
