/**
 * Per-file progress bar for interactive terminals.
 */

/**
 * The part of a terminal stream the spinner writes to.
 */
export interface ProgressOutput {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  enabled?: boolean;
  intervalMs?: number;
  /** Number of bar cells */
  width?: number;
}

export const DEFAULT_PROGRESS_INTERVAL_MS = 120;
export const DEFAULT_PROGRESS_WIDTH = 10;

/**
 * Build one animation frame, e.g. `[==>       ]`.
 * Positions at or past the width render the full bar.
 */
export function buildProgressFrame(position: number, width: number = DEFAULT_PROGRESS_WIDTH): string {
  if (position >= width) {
    return progressDoneBar(width);
  }
  return `[${'='.repeat(position)}>${' '.repeat(width - position - 1)}]`;
}

export function progressDoneBar(width: number = DEFAULT_PROGRESS_WIDTH): string {
  return `[${'='.repeat(width)}]`;
}

/**
 * Animated bar shown after a file's prefix while it is processed.
 *
 * Inert unless the output is a TTY and progress is enabled. The first frame
 * is drawn on start; `stop()` cancels the timer before returning, so no frame
 * can be written after it.
 */
export class ProgressSpinner {
  private timer: ReturnType<typeof setInterval> | null = null;
  private position = 0;

  private constructor(
    private readonly prefix: string,
    private readonly output: ProgressOutput,
    private readonly width: number,
    readonly enabled: boolean
  ) {}

  static start(prefix: string, output: ProgressOutput, options: ProgressOptions = {}): ProgressSpinner {
    const enabled = (options.enabled ?? true) && output.isTTY === true;
    const spinner = new ProgressSpinner(
      prefix,
      output,
      options.width ?? DEFAULT_PROGRESS_WIDTH,
      enabled
    );
    if (enabled) {
      spinner.tick();
      spinner.timer = setInterval(() => spinner.tick(), options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS);
    }
    return spinner;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Blank the bar and leave the cursor right after the prefix, ready for the
   * final status to be written.
   */
  clearLine(): void {
    if (!this.enabled) return;
    this.output.write(`\r${this.prefix}${' '.repeat(this.width + 2)}\r${this.prefix}`);
  }

  private tick(): void {
    this.output.write(`\r${this.prefix}${buildProgressFrame(this.position, this.width)}`);
    this.position = (this.position + 1) % (this.width + 1);
  }
}
