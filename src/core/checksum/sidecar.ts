/**
 * Sidecar files: `<file>.sha512` next to the file they describe.
 */
import * as fs from 'node:fs/promises';
import { isErrnoException, isNotFoundError } from '../../utils/errors.js';

export const SIDECAR_EXTENSION = '.sha512';

export function sidecarPath(dataPath: string): string {
  return dataPath + SIDECAR_EXTENSION;
}

/**
 * True when the path names a sidecar file itself.
 */
export function isSidecarPath(filePath: string): boolean {
  return filePath.endsWith(SIDECAR_EXTENSION);
}

/**
 * Check whether the sidecar for a data file exists.
 * Resolves false only when the sidecar is absent; any other stat failure
 * (permissions, I/O) rejects.
 */
export async function sidecarExists(dataPath: string): Promise<boolean> {
  try {
    await fs.stat(sidecarPath(dataPath));
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Read the raw sidecar text. Callers trim and compare case-insensitively.
 */
export async function readSidecar(dataPath: string): Promise<string> {
  return fs.readFile(sidecarPath(dataPath), 'utf-8');
}

/**
 * Write the sidecar unless one already exists.
 *
 * The file is created exclusively, so an existing sidecar is never replaced.
 * Resolves true when written, false when a sidecar was already present.
 * The content is exactly `hexDigest`, with no trailing newline.
 */
export async function writeSidecarIfAbsent(dataPath: string, hexDigest: string): Promise<boolean> {
  try {
    await fs.writeFile(sidecarPath(dataPath), hexDigest, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}
