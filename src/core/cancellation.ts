/**
 * Cancellation helpers shared by the run phases.
 */

import { InterruptedError } from './errors.js';

const SIGNAL_NAMES: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'];

/**
 * Build the InterruptedError for an aborted signal.
 *
 * bindTerminationSignals() aborts with the signal name as reason.
 */
export function interruptionOf(signal: AbortSignal): InterruptedError {
  const reason: unknown = signal.reason;
  const name = SIGNAL_NAMES.find((s) => s === reason) ?? null;
  return new InterruptedError(name);
}

/**
 * Throw an InterruptedError if the run was cancelled.
 */
export function throwIfInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw interruptionOf(signal);
  }
}

/**
 * Derive a signal that aborts when `parent` aborts or after `ms`.
 *
 * Call dispose() once the guarded operation settles.
 */
export function deadlineSignal(
  parent: AbortSignal | undefined,
  ms: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const timer = setTimeout(() => controller.abort('deadline'), Math.max(0, ms));

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}
