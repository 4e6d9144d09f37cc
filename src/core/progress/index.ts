export {
  ProgressSpinner,
  buildProgressFrame,
  progressDoneBar,
  DEFAULT_PROGRESS_INTERVAL_MS,
  DEFAULT_PROGRESS_WIDTH,
} from './spinner.js';
export type { ProgressOutput, ProgressOptions } from './spinner.js';
