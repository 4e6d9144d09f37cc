/**
 * The sequential run loop shared by `check` and `create`.
 */
import { collectGroupCandidates } from './traversal/expander.js';
import { ProgressSpinner } from './progress/spinner.js';
import type { ProgressOptions, ProgressOutput } from './progress/spinner.js';
import type { RunState } from './results/run-state.js';
import type { ChecksumOutcome, Classifier } from './checksum/types.js';
import type { InputGroup, WalkOptions } from './traversal/types.js';

/**
 * Receives run events for display. Holds no outcome state of its own.
 */
export interface RunPresenter<O extends ChecksumOutcome> {
  groupStarted(group: InputGroup): void;
  /** Text shown before the progress bar and the final status of a file */
  filePrefix(filePath: string): string;
  fileFinished(outcome: O, elapsedMs: number, spinner: ProgressSpinner): void;
  groupFinished(group: InputGroup, results: readonly O[]): void;
}

export interface RunOptions<O extends ChecksumOutcome> {
  presenter: RunPresenter<O>;
  /** Stream the progress bar is drawn on */
  output: ProgressOutput;
  progress?: ProgressOptions;
  walk?: WalkOptions;
  now?: () => number;
}

/**
 * Classify every candidate of every group, one file at a time.
 *
 * Each group starts a fresh result set in `state`. Traversal errors are
 * appended to `state.errors`; a group that yields no candidates and only
 * errors is not announced. Classifiers report failures as outcomes, so one
 * bad file never stops the run.
 */
export async function runChecksums<O extends ChecksumOutcome>(
  classify: Classifier<O>,
  groups: readonly InputGroup[],
  state: RunState<O>,
  options: RunOptions<O>
): Promise<void> {
  const { presenter, output } = options;
  const now = options.now ?? (() => performance.now());

  for (const group of groups) {
    state.beginGroup(group.label);

    const { candidates, errors } = await collectGroupCandidates(group, options.walk);
    state.recordErrors(errors);
    if (candidates.length === 0 && errors.length > 0) {
      continue;
    }

    presenter.groupStarted(group);

    for (const candidate of candidates) {
      const spinner = ProgressSpinner.start(presenter.filePrefix(candidate), output, options.progress);
      const startedAt = now();
      let outcome: O;
      try {
        outcome = await classify(candidate);
      } finally {
        spinner.stop();
      }
      const elapsedMs = now() - startedAt;

      state.record(outcome);
      presenter.fileFinished(outcome, elapsedMs, spinner);
    }

    presenter.groupFinished(group, state.results);
  }
}
