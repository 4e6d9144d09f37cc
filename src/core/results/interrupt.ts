/**
 * Flush-and-exit on termination signals.
 */

/**
 * Anything signals can be subscribed on; `process` in production.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface InterruptOptions {
  signals?: NodeJS.Signals[];
  source?: SignalSource;
  exit?: (code: number) => void;
}

export const INTERRUPT_EXIT_CODE = 1;

/**
 * Install a shutdown hook that calls `flush` and exits with status 1 on the
 * first SIGINT or SIGTERM.
 *
 * `flush` should print from the same RunState the run loop appends to.
 * Returns a function that removes the hook once the run has completed.
 */
export function registerInterruptHandler(
  flush: () => void,
  options: InterruptOptions = {}
): () => void {
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let fired = false;

  const unregister = (): void => {
    for (const signal of signals) {
      source.removeListener(signal, onSignal);
    }
  };

  function onSignal(): void {
    if (fired) return;
    fired = true;
    unregister();
    try {
      flush();
    } finally {
      exit(INTERRUPT_EXIT_CODE);
    }
  }

  for (const signal of signals) {
    source.on(signal, onSignal);
  }

  return unregister;
}
