/**
 * Verification of a data file against its sidecar.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { digestsEqual } from './digest.js';
import { closeFile, hashAndClose } from './io.js';
import { readSidecar, sidecarExists } from './sidecar.js';
import { isPermissionError, toError } from '../../utils/errors.js';
import type { VerificationOutcome } from './types.js';

/**
 * Verify one data file against its `.sha512` sidecar.
 *
 * The data file is opened before the sidecar is looked up, so an unreadable
 * file reports `Locked` even when it has no sidecar. Never rejects: every
 * failure becomes a `Locked` or `CheckingFailed` outcome carrying the error,
 * and the data file is closed on every path.
 */
export async function verifyChecksumFile(filePath: string): Promise<VerificationOutcome> {
  const absolutePath = path.resolve(filePath);
  const failed = (error: unknown): VerificationOutcome =>
    ({ path: absolutePath, status: 'CheckingFailed', error: toError(error) });

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(absolutePath, 'r');
  } catch (error) {
    if (isPermissionError(error)) {
      return { path: absolutePath, status: 'Locked', error: toError(error) };
    }
    return failed(error);
  }

  let hasSidecar: boolean;
  try {
    hasSidecar = await sidecarExists(absolutePath);
  } catch (error) {
    await closeFile(handle);
    return failed(error);
  }

  if (!hasSidecar) {
    const closeError = await closeFile(handle);
    return closeError ? failed(closeError) : { path: absolutePath, status: 'NotFound' };
  }

  const hashed = await hashAndClose(handle);
  if (!hashed.ok) {
    return failed(hashed.error);
  }

  let sidecarText: string;
  try {
    sidecarText = await readSidecar(absolutePath);
  } catch (error) {
    return failed(error);
  }

  return digestsEqual(hashed.hexDigest, sidecarText)
    ? { path: absolutePath, status: 'Match' }
    : { path: absolutePath, status: 'NotMatch' };
}
