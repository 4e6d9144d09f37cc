/**
 * The `check` command: verify files against their sidecars.
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
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return addChecksumOptions(
    new Command('check')
      .description('Check files checksum.')
      .addHelpText('after', `
Compares every file with the digest stored in its .sha512 checksum file.

Examples:
  checksum-utils check .
  checksum-utils check ./work ~/documents
  checksum-utils check "/mnt/external-disk/*.pdf"
  find /mnt/backup -name "*.tar" | checksum-utils check`)
  ).action(async (paths: string[], options: ChecksumCommandOptions) => {
    applyLogLevel(options);
    try {
      await runChecksumCommand('check', paths, options, defaultEnvironment(VERSION));
    } catch (error) {
      logger.error(errorMessage(error));
      process.exit(1);
    }
  });
}
