/**
 * Run Orchestrator for vmtrial
 *
 * Drives one ephemeral-instance test run: preflight, clone, start, wait for
 * SSH, stage files, execute, and clean up. Cleanup runs exactly once on
 * every exit path, including cancellation.
 */

import { stat } from 'node:fs/promises';

import type {
  Phase,
  RunContext,
  RunDependencies,
  RunResult,
  TestInvocation,
} from './types.js';
import {
  CloneError,
  ConfigError,
  RemoteExecutionError,
  TransferError,
  isVmtrialError,
} from './errors.js';
import { interruptionOf, throwIfInterrupted } from './cancellation.js';
import { assertValidInstanceName, generateInstanceName } from './naming.js';
import { assertBaseImageExists } from './preflight.js';
import { waitForReady } from './readiness.js';
import { stagePaths } from './staging.js';
import {
  buildEnvPrefix,
  buildInlineCommand,
  buildScriptCommand,
  guestHomePath,
} from './remote-command.js';
import { systemClock } from '../lib/clock.js';

/**
 * Default grace period before the VM process is killed.
 */
export const DEFAULT_STOP_GRACE_MS = 30000;

/**
 * Run a test target inside a fresh clone of `baseImage`.
 *
 * A non-zero remote status is returned in the result, not thrown; use
 * assertPassed() for the exception form.
 *
 * @throws ConfigError for an invalid invocation (nothing is created)
 * @throws ImageNotFoundError when the base image is absent (nothing is created)
 * @throws CloneError, BootTimeoutError, TransferError, InterruptedError
 */
export async function runTest(
  baseImage: string,
  invocation: TestInvocation,
  deps: RunDependencies
): Promise<RunResult> {
  assertValidInvocation(baseImage, invocation, deps);

  const clock = deps.clock ?? systemClock;
  const startedAt = clock.now();

  try {
    await inPhase(deps, 'preflight', baseImage, () =>
      assertBaseImageExists(deps.imageStore, baseImage, deps.signal)
    );
    throwIfInterrupted(deps.signal);
  } catch (error) {
    rethrow(error, deps.signal);
  }

  const ctx: RunContext = {
    baseImage,
    instanceName: invocation.instanceName ?? (deps.generateName ?? generateInstanceName)(baseImage),
    invocation,
    deps,
    clock,
    cloned: false,
    vm: null,
    address: null,
    cleanedUp: false,
  };

  try {
    await clonePhase(ctx);
    startPhase(ctx);
    const address = await inPhase(
      deps,
      'wait',
      `${deps.user}@${ctx.instanceName}`,
      () => waitForReady(ctx),
      (reached) => `${deps.user}@${reached}`
    );
    await copyPhase(ctx, address);
    const exitStatus = await executePhase(ctx, address);

    return {
      exitStatus,
      passed: exitStatus === 0,
      instanceName: ctx.instanceName,
      retained: invocation.retain === true,
      address,
      durationMs: Math.round(clock.now() - startedAt),
    };
  } catch (error) {
    rethrow(error, deps.signal);
  } finally {
    await cleanup(ctx);
  }
}

/**
 * Convert a failed result into a RemoteExecutionError.
 *
 * @throws RemoteExecutionError carrying the remote status
 */
export function assertPassed(result: RunResult): void {
  if (!result.passed) {
    throw new RemoteExecutionError(result.exitStatus);
  }
}

/**
 * Stop the VM and delete the instance.
 *
 * Idempotent: only the first call does anything. Each step is isolated;
 * failures are reported as warnings and never replace the run's outcome.
 */
export async function cleanup(ctx: RunContext): Promise<void> {
  if (ctx.cleanedUp) {
    return;
  }
  ctx.cleanedUp = true;

  if (!ctx.cloned) {
    return;
  }

  const { deps, instanceName } = ctx;
  const observer = deps.observer;
  observer?.onPhase?.({ phase: 'cleanup', status: 'starting', detail: instanceName });

  let failures = 0;

  if (ctx.vm) {
    if (ctx.vm.isRunning()) {
      try {
        await ctx.vm.stop(deps.stopGraceMs ?? DEFAULT_STOP_GRACE_MS);
      } catch (error) {
        failures++;
        observer?.onWarning?.(`Failed to stop VM process: ${messageOf(error)}`);
      }
    } else {
      // The process already exited; make sure the store agrees
      try {
        await deps.imageStore.stop(instanceName);
      } catch (error) {
        observer?.onDebug?.(`tart stop ${instanceName}: ${messageOf(error)}`);
      }
    }
  }

  if (ctx.invocation.retain) {
    observer?.onWarning?.(
      `Keeping VM '${instanceName}' (use 'tart delete ${instanceName}' to remove)`
    );
  } else {
    try {
      await deps.imageStore.delete(instanceName);
    } catch (error) {
      failures++;
      observer?.onWarning?.(`Failed to delete '${instanceName}': ${messageOf(error)}`);
    }
  }

  observer?.onPhase?.(
    failures === 0
      ? { phase: 'cleanup', status: 'completed', detail: instanceName }
      : {
          phase: 'cleanup',
          status: 'failed',
          detail: instanceName,
          error: `${failures} cleanup step${failures === 1 ? '' : 's'} failed`,
        }
  );
}

// =============================================================================
// Phases
// =============================================================================

async function clonePhase(ctx: RunContext): Promise<void> {
  const { deps, baseImage, instanceName } = ctx;

  await inPhase(deps, 'clone', `${baseImage} → ${instanceName}`, async () => {
    try {
      await deps.imageStore.clone(baseImage, instanceName, deps.signal);
    } catch (error) {
      if (deps.signal?.aborted && ctx.invocation.instanceName === undefined) {
        await removeInterruptedClone(ctx);
      }
      throwIfInterrupted(deps.signal);
      throw new CloneError(
        `Failed to clone '${baseImage}' to '${instanceName}': ${messageOf(error)}`,
        baseImage,
        instanceName
      );
    }
    ctx.cloned = true;
  });
}

/**
 * An interrupted `tart clone` may already have registered the instance.
 * Only generated names are removed; a caller-supplied name may predate the run.
 */
async function removeInterruptedClone(ctx: RunContext): Promise<void> {
  const { deps, instanceName } = ctx;
  try {
    const images = await deps.imageStore.list();
    if (images.some((entry) => entry.name === instanceName)) {
      await deps.imageStore.delete(instanceName);
    }
  } catch (error) {
    deps.observer?.onWarning?.(
      `Failed to remove interrupted clone '${instanceName}': ${messageOf(error)}`
    );
  }
}

function startPhase(ctx: RunContext): void {
  const { deps, instanceName } = ctx;
  const observer = deps.observer;

  observer?.onPhase?.({ phase: 'start', status: 'starting', detail: instanceName });
  ctx.vm = deps.imageStore.start(instanceName);
  observer?.onPhase?.({
    phase: 'start',
    status: 'completed',
    detail: ctx.vm.pid !== undefined ? `PID ${ctx.vm.pid}` : instanceName,
  });
}

async function copyPhase(ctx: RunContext, address: string): Promise<void> {
  const paths = ctx.invocation.copyPaths ?? [];
  if (paths.length === 0) {
    return;
  }

  await inPhase(ctx.deps, 'copy', `${paths.length} path${paths.length === 1 ? '' : 's'}`, () =>
    stagePaths(ctx, address, paths, (localPath, remotePath) => {
      ctx.deps.observer?.onDebug?.(`Copying ${localPath} → ${remotePath}`);
    })
  );
}

async function executePhase(ctx: RunContext, address: string): Promise<number> {
  const { deps, invocation } = ctx;
  const args = invocation.args ?? [];
  const env = invocation.env ?? [];
  const isLocalFile = deps.isLocalFile ?? defaultIsLocalFile;

  return inPhase(deps, 'execute', invocation.target, async () => {
    let command: string;

    if (await isLocalFile(invocation.target)) {
      const remotePath = guestHomePath(invocation.target);
      try {
        await deps.transport.copy(address, invocation.target, remotePath, { signal: deps.signal });
      } catch (error) {
        if (error instanceof TransferError) throw error;
        throw new TransferError(
          `Failed to copy ${invocation.target}: ${messageOf(error)}`,
          invocation.target
        );
      }
      command = buildScriptCommand(invocation.target, args, env);
    } else {
      command = buildInlineCommand(invocation.target, args, env);
    }

    const status = await deps.transport.exec(address, command, {
      stdout: deps.stdout,
      stderr: deps.stderr,
      signal: deps.signal,
    });
    throwIfInterrupted(deps.signal);
    return status;
  }, (status) => `exit status ${status}`);
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Run `fn` between starting/completed (or failed) progress events.
 */
async function inPhase<T>(
  deps: RunDependencies,
  phase: Phase,
  detail: string,
  fn: () => Promise<T>,
  completedDetail?: (value: T) => string
): Promise<T> {
  const onPhase = deps.observer?.onPhase;
  onPhase?.({ phase, status: 'starting', detail });
  try {
    const value = await fn();
    onPhase?.({ phase, status: 'completed', detail: completedDetail ? completedDetail(value) : detail });
    return value;
  } catch (error) {
    onPhase?.({ phase, status: 'failed', detail, error: messageOf(error) });
    throw error;
  }
}

/**
 * Reject invalid inputs before anything touches the image store.
 */
function assertValidInvocation(
  baseImage: string,
  invocation: TestInvocation,
  deps: RunDependencies
): void {
  if (baseImage.trim() === '') {
    throw new ConfigError('Base image name must not be empty', 'INVALID_ARGUMENT');
  }
  if (invocation.target.trim() === '') {
    throw new ConfigError('Test target must not be empty', 'INVALID_ARGUMENT');
  }
  if (!Number.isFinite(deps.timeoutMs) || deps.timeoutMs <= 0) {
    throw new ConfigError(`Timeout must be positive, got ${deps.timeoutMs}ms`, 'INVALID_ARGUMENT');
  }
  if (invocation.instanceName !== undefined) {
    assertValidInstanceName(invocation.instanceName);
  }
  // Parses every assignment; throws on the first malformed one
  buildEnvPrefix(invocation.env ?? []);
}

async function defaultIsLocalFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Rethrow a phase error. A phase that failed because its child was killed
 * by the interruption reports the interruption, not its own symptom.
 */
function rethrow(error: unknown, signal: AbortSignal | undefined): never {
  if (signal?.aborted && !(isVmtrialError(error) && error.code === 'INTERRUPTED')) {
    throw interruptionOf(signal);
  }
  throw error;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
