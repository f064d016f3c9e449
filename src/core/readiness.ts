/**
 * Readiness Polling
 *
 * Waits for a freshly booted instance to get an address and accept SSH,
 * bounded by a deadline computed from the configured timeout.
 */

import type { RunContext } from './types.js';
import { BootTimeoutError, VmtrialError } from './errors.js';
import { deadlineSignal, throwIfInterrupted } from './cancellation.js';

/**
 * Default delay between readiness attempts.
 */
export const DEFAULT_POLL_INTERVAL_MS = 2000;

/**
 * Poll until the instance accepts an SSH no-op.
 *
 * Each attempt resolves the address through the image store and, once one
 * is assigned, probes it over the transport. Every attempt is cut off at
 * the deadline, and the sleep between attempts never extends past it, so
 * the wait ends within one polling interval of the timeout.
 *
 * @returns The reachable address
 * @throws BootTimeoutError when the deadline passes
 * @throws InterruptedError when the run is cancelled
 */
export async function waitForReady(ctx: RunContext): Promise<string> {
  const { deps, clock, instanceName } = ctx;
  const interval = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const started = clock.now();
  const deadline = started + deps.timeoutMs;
  let lastAddress: string | null = null;

  for (;;) {
    throwIfInterrupted(deps.signal);

    if (clock.now() >= deadline) {
      throw new BootTimeoutError(instanceName, deps.timeoutMs, lastAddress);
    }

    if (ctx.vm && !ctx.vm.isRunning()) {
      throw new VmtrialError(
        `VM process for '${instanceName}' exited before SSH became available`,
        'OPERATION_FAILED',
        'Run with --verbose and try `tart run` on the instance manually.'
      );
    }

    const attempt = deadlineSignal(deps.signal, deadline - clock.now());
    try {
      const address = await deps.imageStore.resolveAddress(instanceName, attempt.signal);
      if (address) {
        lastAddress = address;
        if (await deps.transport.probe(address, attempt.signal)) {
          ctx.address = address;
          return address;
        }
      }
    } finally {
      attempt.dispose();
    }

    throwIfInterrupted(deps.signal);

    const elapsed = Math.round((clock.now() - started) / 1000);
    deps.observer?.onDebug?.(`Waiting... (${elapsed}s elapsed, IP: ${lastAddress ?? 'unknown'})`);

    const remaining = deadline - clock.now();
    if (remaining > 0) {
      await clock.sleep(Math.min(interval, remaining), deps.signal);
    }
  }
}
