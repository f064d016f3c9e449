/**
 * Child Process Runner
 *
 * Spawns an external tool, collects or forwards its output, and enforces
 * a timeout and an abort signal. Shared by the tart executor and the SSH
 * transport.
 */

import { spawn } from 'node:child_process';
import type { Writable } from 'node:stream';

import { renderCommandLine } from './shell.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Grace period between SIGTERM and SIGKILL when a child is cut off.
 */
export const DEFAULT_KILL_GRACE_MS = 5000;

/**
 * Options for running a child process
 */
export interface RunProcessOptions {
  /** Kill the child after this many milliseconds (default: no limit) */
  timeout?: number;
  /** Kill the child when this signal aborts */
  signal?: AbortSignal;
  /** Wait this long after SIGTERM before sending SIGKILL (default: 5000) */
  killGraceMs?: number;
  /** Forward child stdout here as it arrives */
  stdout?: Writable;
  /** Forward child stderr here as it arrives */
  stderr?: Writable;
  /** Keep stdout/stderr in the result (default: true) */
  capture?: boolean;
  /** Print the command to stderr before spawning */
  verbose?: boolean;
  /** Marker printed before the command in verbose mode */
  verbosePrefix?: string;
}

/**
 * Outcome of a finished child process
 */
export interface ProcessResult {
  /** Exit status, null when terminated by a signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** The timeout fired and the child was killed */
  timedOut: boolean;
  /** The abort signal fired and the child was killed */
  aborted: boolean;
}

/**
 * Error thrown when the executable cannot be spawned at all
 */
export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly errno?: string
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

/**
 * Run a command to completion.
 *
 * Non-zero exit codes resolve normally; callers decide what they mean.
 * Only a failure to spawn rejects.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  const { timeout, signal, capture = true, killGraceMs = DEFAULT_KILL_GRACE_MS } = options;

  if (options.verbose) {
    const line = renderCommandLine(command, args);
    process.stderr.write(formatCommand(line, options.verbosePrefix ?? '$ ', supportsAnsi()));
  }

  if (signal?.aborted) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      timedOut: false,
      aborted: true,
    });
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      if (killTimer) return;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        child.kill('SIGKILL');
        // A grandchild may still hold the pipes open; 'close' must not wait for it
        child.stdout.destroy();
        child.stderr.destroy();
      }, killGraceMs);
    };

    const timeoutId =
      timeout !== undefined && timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, timeout)
        : undefined;

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const settle = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout.on('data', (data: Buffer) => {
      if (capture) stdout += data.toString();
      options.stdout?.write(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      if (capture) stderr += data.toString();
      options.stderr?.write(data);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      settle();
      reject(new SpawnError(`Failed to spawn ${command}: ${error.message}`, command, error.code));
    });

    child.on('close', (code: number | null, killSignal: NodeJS.Signals | null) => {
      settle();
      resolve({ exitCode: code, signal: killSignal, stdout, stderr, timedOut, aborted });
    });
  });
}
