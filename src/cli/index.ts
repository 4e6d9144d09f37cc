/**
 * CLI program assembly.
 */
import { Command } from 'commander';
import { createCheckCommand } from './commands/check.js';
import { createCreateCommand } from './commands/create.js';
import { VERSION } from './version.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('checksum-utils')
    .description('Multiplatform checksum utils for NAS admins.')
    .version(VERSION);
  [createCheckCommand, createCreateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
