/**
 * Termination Signal Scope
 *
 * Turns SIGINT/SIGTERM into an AbortSignal for the lifetime of a run, so
 * the orchestrator can finish its cleanup before the process exits.
 */

/**
 * Handle returned by bindTerminationSignals()
 */
export interface SignalScope {
  /** Aborts on the first termination signal */
  signal: AbortSignal;
  /** The first signal received, if any */
  received: () => NodeJS.Signals | null;
  /** Remove the handlers and restore default signal behavior */
  dispose: () => void;
}

/**
 * Minimal view of `process` used for signal registration. Overridable in tests.
 */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Bind termination signals to an AbortController.
 *
 * The handlers stay installed until dispose(), so repeated signals while
 * cleanup is running do not kill the process with the default action.
 */
export function bindTerminationSignals(
  signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
  target: SignalTarget = process
): SignalScope {
  const controller = new AbortController();
  let first: NodeJS.Signals | null = null;

  const handler = (received: NodeJS.Signals): void => {
    if (first === null) {
      first = received;
      controller.abort(received);
    }
  };

  for (const name of signals) {
    target.on(name, handler);
  }

  return {
    signal: controller.signal,
    received: () => first,
    dispose: () => {
      for (const name of signals) {
        target.off(name, handler);
      }
    },
  };
}
