/**
 * Creation of missing sidecar files.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { hashAndClose } from './io.js';
import { sidecarExists, writeSidecarIfAbsent } from './sidecar.js';
import { isPermissionError, toError } from '../../utils/errors.js';
import type { CreationOutcome } from './types.js';

/**
 * Create the `.sha512` sidecar for one data file if it has none.
 *
 * An existing sidecar short-circuits to `Existing` before the data file is
 * opened; it is neither re-verified nor touched. The sidecar is written in one
 * call after the whole file has been hashed, so an interrupted run never
 * leaves a partial sidecar behind.
 */
export async function createChecksumFile(filePath: string): Promise<CreationOutcome> {
  const absolutePath = path.resolve(filePath);
  const failed = (error: unknown): CreationOutcome =>
    ({ path: absolutePath, status: 'Failed', error: toError(error) });

  try {
    if (await sidecarExists(absolutePath)) {
      return { path: absolutePath, status: 'Existing' };
    }
  } catch (error) {
    return failed(error);
  }

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(absolutePath, 'r');
  } catch (error) {
    if (isPermissionError(error)) {
      return { path: absolutePath, status: 'LockedCreation', error: toError(error) };
    }
    return failed(error);
  }

  const hashed = await hashAndClose(handle);
  if (!hashed.ok) {
    return failed(hashed.error);
  }

  try {
    const written = await writeSidecarIfAbsent(absolutePath, hashed.hexDigest);
    // Another writer may have created the sidecar while this file was hashed.
    return { path: absolutePath, status: written ? 'Created' : 'Existing' };
  } catch (error) {
    return failed(error);
  }
}
