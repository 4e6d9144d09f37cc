/**
 * File handle helpers shared by the classifiers.
 */
import type { FileHandle } from 'node:fs/promises';
import { digestFile, toHex } from './digest.js';
import { toError } from '../../utils/errors.js';

export type HashResult =
  | { readonly ok: true; readonly hexDigest: string }
  | { readonly ok: false; readonly error: Error };

/**
 * Close a handle, resolving to the close error if there was one.
 */
export async function closeFile(handle: FileHandle): Promise<Error | undefined> {
  try {
    await handle.close();
    return undefined;
  } catch (error) {
    return toError(error);
  }
}

/**
 * Hash the whole file behind `handle`, then close it.
 * A read error takes precedence over a close error that follows it.
 */
export async function hashAndClose(handle: FileHandle): Promise<HashResult> {
  let result: HashResult;
  try {
    result = { ok: true, hexDigest: toHex(await digestFile(handle)) };
  } catch (error) {
    result = { ok: false, error: toError(error) };
  }

  const closeError = await closeFile(handle);
  if (closeError && result.ok) {
    return { ok: false, error: closeError };
  }
  return result;
}
