/**
 * Shared plumbing for the `check` and `create` commands.
 */
import type { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { createChecksumFile } from '../../core/checksum/creator.js';
import { verifyChecksumFile } from '../../core/checksum/verifier.js';
import type { ChecksumOutcome, Classifier } from '../../core/checksum/types.js';
import type { ProgressOutput } from '../../core/progress/spinner.js';
import { RunState } from '../../core/results/run-state.js';
import { registerInterruptHandler, type SignalSource } from '../../core/results/interrupt.js';
import { runChecksums } from '../../core/runner.js';
import { expandInputs } from '../../core/traversal/expander.js';
import { readPathsFromStdin, type PathListSource } from '../../core/traversal/stdin.js';
import type { InputGroup } from '../../core/traversal/types.js';
import {
  ErrorCodes,
  SystemError,
  TraversalError,
  errorMessage,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { HumanCreationFormatter, HumanVerificationFormatter, type HumanFormatterBase } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import { HumanPresenter, JsonPresenter, type CommandPresenter } from '../formatters/presenters.js';
import type { CommandKind } from '../formatters/types.js';

/**
 * Options shared by both commands, as parsed by commander.
 */
export interface ChecksumCommandOptions {
  config?: string;
  json?: boolean;
  /** false with --no-progress */
  progress?: boolean;
  /** false with --no-stdin */
  stdin?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface CommandEnvironment {
  cwd: string;
  stdin: PathListSource;
  stdout: ProgressOutput;
  version: string;
  signals?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Arguments and options common to `check` and `create`.
 */
export function addChecksumOptions(command: Command): Command {
  return command
    .argument('[paths...]', 'Files, directories or glob patterns (reads a path list from stdin when piped)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output a JSON report')
    .option('--no-progress', 'Disable the progress bar')
    .option('--no-stdin', 'Never read paths from stdin')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors in logs');
}

export function defaultEnvironment(version: string): CommandEnvironment {
  return {
    cwd: process.cwd(),
    stdin: process.stdin,
    stdout: process.stdout,
    version,
  };
}

export function applyLogLevel(options: ChecksumCommandOptions): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  } else if (options.json) {
    logger.setLevel('warn');
  }
}

/**
 * Paths piped on stdin, unless stdin is a terminal or reading was disabled.
 */
async function gatherStdinPaths(
  options: ChecksumCommandOptions,
  env: CommandEnvironment,
  errors: TraversalError[]
): Promise<string[]> {
  if (options.stdin === false || env.stdin.isTTY) {
    return [];
  }
  try {
    return await readPathsFromStdin(env.stdin);
  } catch (error) {
    errors.push(
      new TraversalError(ErrorCodes.STDIN_READ_FAILED, `Failed to read paths from stdin: ${errorMessage(error)}`)
    );
    return [];
  }
}

function createPresenter<O extends ChecksumOutcome>(
  humanFormatter: HumanFormatterBase<O>,
  kind: CommandKind,
  options: ChecksumCommandOptions,
  env: CommandEnvironment
): CommandPresenter<O> {
  return options.json
    ? new JsonPresenter<O>(new JsonFormatter(kind), env.stdout, env.version)
    : new HumanPresenter<O>(humanFormatter, env.stdout, env.version);
}

async function execute<O extends ChecksumOutcome>(
  classify: Classifier<O>,
  presenter: CommandPresenter<O>,
  groups: InputGroup[],
  initialErrors: TraversalError[],
  config: Config,
  options: ChecksumCommandOptions,
  env: CommandEnvironment
): Promise<RunState<O>> {
  const state = new RunState<O>();
  state.recordErrors(initialErrors);

  presenter.start();
  const unregister = registerInterruptHandler(() => presenter.flush(state), {
    source: env.signals,
    exit: env.exit,
  });

  try {
    await runChecksums(classify, groups, state, {
      presenter,
      output: env.stdout,
      progress: {
        enabled: config.progress.enabled && options.progress !== false && !options.json,
        intervalMs: config.progress.interval_ms,
        width: config.progress.width,
      },
      walk: {
        exclude: config.walk.exclude,
        followSymlinks: config.walk.follow_symlinks,
      },
    });
  } finally {
    unregister();
  }

  presenter.finish(state);
  return state;
}

/**
 * Run `check` or `create` over raw path/glob arguments and stdin.
 *
 * Per-file failures and traversal errors are reported, not thrown. Rejects
 * only for command-level problems: bad configuration or no input at all.
 */
export async function runChecksumCommand(
  kind: CommandKind,
  paths: string[],
  options: ChecksumCommandOptions,
  env: CommandEnvironment
): Promise<RunState<ChecksumOutcome>> {
  const config = await loadConfig(env.cwd, options.config);

  const errors: TraversalError[] = [];
  const stdinPaths = await gatherStdinPaths(options, env, errors);

  if (paths.length === 0 && stdinPaths.length === 0 && errors.length === 0) {
    throw new SystemError(
      ErrorCodes.NO_INPUT,
      'No paths given. Pass files, directories or glob patterns, or pipe a list of paths on stdin.'
    );
  }

  const expanded = await expandInputs(paths, { cwd: env.cwd, stdinPaths });
  errors.push(...expanded.errors);
  logger.debug(`Expanded ${paths.length} argument(s) into ${expanded.groups.length} group(s)`);

  const formatOptions = {
    colors: env.stdout.isTTY === true,
    showTiming: config.output.show_timing,
  };

  if (kind === 'check') {
    return execute(
      verifyChecksumFile,
      createPresenter(new HumanVerificationFormatter(formatOptions), kind, options, env),
      expanded.groups,
      errors,
      config,
      options,
      env
    );
  }
  return execute(
    createChecksumFile,
    createPresenter(new HumanCreationFormatter(formatOptions), kind, options, env),
    expanded.groups,
    errors,
    config,
    options,
    env
  );
}
