/**
 * checksum-utils - SHA-512 sidecar checksums for files on disk.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Digests, sidecars and classifiers
export * from './core/checksum/index.js';

// Traversal
export * from './core/traversal/index.js';

// Progress
export * from './core/progress/index.js';

// Results and interruption
export * from './core/results/index.js';

// Run loop
export { runChecksums } from './core/runner.js';
export type { RunPresenter, RunOptions } from './core/runner.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export * from './cli/formatters/index.js';
