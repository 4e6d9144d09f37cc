/**
 * Exclusion matcher for directory walks (gitignore syntax).
 */

import ignore, { type Ignore } from 'ignore';

/**
 * Decides whether a walked entry is excluded.
 */
export interface PathMatcher {
  /**
   * Check if an entry is excluded.
   * @param relativePath - Path relative to the walked root, using `/` separators
   * @param isDirectory - Directories are matched with a trailing slash so `dir/` rules apply
   */
  excludes(relativePath: string, isDirectory: boolean): boolean;
}

/**
 * Create a PathMatcher for the configured exclusion patterns.
 * With no patterns nothing is excluded.
 */
export function createPathMatcher(exclude: string[] = []): PathMatcher {
  const filter: Ignore | null = exclude.length > 0 ? ignore().add(exclude) : null;

  return {
    excludes(relativePath: string, isDirectory: boolean): boolean {
      if (!filter || relativePath === '') return false;
      const normalizedPath = relativePath.replace(/\\/g, '/');
      return filter.ignores(isDirectory ? `${normalizedPath}/` : normalizedPath);
    },
  };
}
