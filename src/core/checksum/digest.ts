/**
 * SHA-512 digest of byte streams.
 */
import { createHash } from 'node:crypto';
import type { FileHandle } from 'node:fs/promises';

export const DIGEST_ALGORITHM = 'sha512';

/** Digest size in bytes. */
export const DIGEST_LENGTH = 64;

/**
 * Compute the digest of everything a byte source yields.
 * Chunks are hashed as they arrive; the source is never buffered whole.
 * Errors raised by the source propagate to the caller.
 */
export async function digest(source: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const hash = createHash(DIGEST_ALGORITHM);
  for await (const chunk of source) {
    hash.update(chunk);
  }
  return hash.digest();
}

/**
 * Digest the full content of an open file, leaving the handle open.
 */
export async function digestFile(handle: FileHandle): Promise<Buffer> {
  return digest(handle.createReadStream({ start: 0, autoClose: false }));
}

/**
 * Lowercase hex encoding of a digest.
 */
export function toHex(value: Uint8Array): string {
  return Buffer.from(value).toString('hex');
}

/**
 * Compare a computed hex digest with sidecar text.
 * The sidecar side is trimmed; the comparison ignores letter case.
 */
export function digestsEqual(hexDigest: string, sidecarText: string): boolean {
  return hexDigest.toLowerCase() === sidecarText.trim().toLowerCase();
}
