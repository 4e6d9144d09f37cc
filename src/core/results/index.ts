export { RunState } from './run-state.js';
export { summarizeVerification, summarizeCreation } from './summary.js';
export type { VerificationSummary, CreationSummary } from './summary.js';
export { registerInterruptHandler, INTERRUPT_EXIT_CODE } from './interrupt.js';
export type { SignalSource, InterruptOptions } from './interrupt.js';
