/**
 * File system operations - reading, statting, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Find filesystem entries matching a glob pattern.
 * Directories are returned too, so callers can walk them.
 */
export async function globEntries(
  pattern: string,
  options: {
    cwd?: string;
    ignore?: string[];
  } = {}
): Promise<string[]> {
  const matches = await fg(pattern, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || [],
    absolute: true,
    onlyFiles: false,
    dot: true,
  });
  return matches.map((match) => path.normalize(match)).sort();
}

/**
 * Whether an argument should be expanded as a glob rather than used literally.
 */
export function isGlobPattern(arg: string): boolean {
  return fg.isDynamicPattern(arg);
}

/**
 * List a directory's entries sorted by name.
 */
export async function readDirSorted(dirPath: string): Promise<fs.Dirent[]> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Get file stats (follows symlinks).
 */
export async function getStats(filePath: string): Promise<fs.Stats> {
  return fs.promises.stat(filePath);
}

/**
 * Get the real path of a file (resolving symlinks).
 */
export async function realPath(filePath: string): Promise<string> {
  return fs.promises.realpath(filePath);
}
