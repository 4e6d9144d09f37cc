export { digest, digestFile, digestsEqual, toHex, DIGEST_ALGORITHM, DIGEST_LENGTH } from './digest.js';
export {
  SIDECAR_EXTENSION,
  sidecarPath,
  isSidecarPath,
  sidecarExists,
  readSidecar,
  writeSidecarIfAbsent,
} from './sidecar.js';
export { closeFile, hashAndClose } from './io.js';
export type { HashResult } from './io.js';
export { verifyChecksumFile } from './verifier.js';
export { createChecksumFile } from './creator.js';
export type {
  VerificationStatus,
  CreationStatus,
  VerificationOutcome,
  CreationOutcome,
  ChecksumOutcome,
  Classifier,
} from './types.js';
