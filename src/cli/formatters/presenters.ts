/**
 * Presenters: connect run events to formatters and an output stream.
 */
import type { ChecksumOutcome } from '../../core/checksum/types.js';
import type { ProgressOutput, ProgressSpinner } from '../../core/progress/spinner.js';
import type { RunState } from '../../core/results/run-state.js';
import type { RunPresenter } from '../../core/runner.js';
import type { InputGroup } from '../../core/traversal/types.js';
import type { HumanFormatterBase } from './human.js';
import type { JsonFormatter, JsonGroupReport } from './json.js';

/**
 * A presenter that also owns the start and end of a command's output.
 */
export interface CommandPresenter<O extends ChecksumOutcome> extends RunPresenter<O> {
  start(): void;
  /** Called once the run completes */
  finish(state: RunState<O>): void;
  /** Called from the interrupt handler with whatever has accumulated */
  flush(state: RunState<O>): void;
}

function writeLines(out: ProgressOutput, lines: string[]): void {
  for (const line of lines) {
    out.write(`${line}\n`);
  }
}

/**
 * Streams progress, per-file lines and summaries as the run goes.
 */
export class HumanPresenter<O extends ChecksumOutcome> implements CommandPresenter<O> {
  constructor(
    private readonly formatter: HumanFormatterBase<O>,
    private readonly out: ProgressOutput,
    private readonly version: string
  ) {}

  start(): void {
    writeLines(this.out, this.formatter.formatHeader(this.version));
  }

  groupStarted(group: InputGroup): void {
    writeLines(this.out, this.formatter.formatGroupHeader(group.label));
  }

  filePrefix(filePath: string): string {
    return this.formatter.filePrefix(filePath);
  }

  fileFinished(outcome: O, elapsedMs: number, spinner: ProgressSpinner): void {
    if (spinner.enabled) {
      spinner.clearLine();
    } else {
      this.out.write(this.formatter.filePrefix(outcome.path));
    }
    this.out.write(`${this.formatter.formatFileStatus(outcome, elapsedMs)}\n`);
  }

  groupFinished(_group: InputGroup, results: readonly O[]): void {
    writeLines(this.out, this.formatter.formatSummary(results));
  }

  finish(state: RunState<O>): void {
    writeLines(this.out, this.formatter.formatErrors(state.errors));
  }

  flush(state: RunState<O>): void {
    writeLines(this.out, [
      '',
      ...this.formatter.formatSummary(state.results),
      ...this.formatter.formatErrors(state.errors),
    ]);
  }
}

/**
 * Collects group reports silently and writes one JSON document at the end.
 */
export class JsonPresenter<O extends ChecksumOutcome> implements CommandPresenter<O> {
  private readonly groups: JsonGroupReport[] = [];
  private openGroup: InputGroup | null = null;

  constructor(
    private readonly formatter: JsonFormatter,
    private readonly out: ProgressOutput,
    private readonly version: string
  ) {}

  start(): void {}

  groupStarted(group: InputGroup): void {
    this.openGroup = group;
  }

  filePrefix(filePath: string): string {
    return filePath;
  }

  fileFinished(): void {}

  groupFinished(group: InputGroup, results: readonly O[]): void {
    this.groups.push(this.formatter.formatGroup(group.label, results, group.source));
    this.openGroup = null;
  }

  finish(state: RunState<O>): void {
    this.out.write(`${this.formatter.formatReport(this.version, this.groups, state.errors)}\n`);
  }

  flush(state: RunState<O>): void {
    const groups = [...this.groups];
    if (this.openGroup) {
      groups.push(this.formatter.formatGroup(this.openGroup.label, state.results, this.openGroup.source));
    }
    this.out.write(`${this.formatter.formatReport(this.version, groups, state.errors, true)}\n`);
  }
}
