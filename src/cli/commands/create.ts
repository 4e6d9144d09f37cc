/**
 * The `create` command: write missing sidecars.
 */
import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { VERSION } from '../version.js';
import {
  addChecksumOptions,
  applyLogLevel,
  defaultEnvironment,
  runChecksumCommand,
  type ChecksumCommandOptions,
} from './run-helpers.js';

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  return addChecksumOptions(
    new Command('create')
      .description('Create missing checksum files.')
      .addHelpText('after', `
Writes <file>.sha512 for every file that has none. Existing checksum files
are left untouched and are not re-verified.

Examples:
  checksum-utils create .
  checksum-utils create ~/documents/budget.pdf
  checksum-utils create "photos/**/*.jpg"`)
  ).action(async (paths: string[], options: ChecksumCommandOptions) => {
    applyLogLevel(options);
    try {
      await runChecksumCommand('create', paths, options, defaultEnvironment(VERSION));
    } catch (error) {
      logger.error(errorMessage(error));
      process.exit(1);
    }
  });
}
