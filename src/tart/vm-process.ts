/**
 * Background VM Process
 *
 * `tart run` blocks for the lifetime of the VM. It is spawned as a child
 * and stopped by signalling that child.
 */

import { spawn, type ChildProcess } from 'node:child_process';

import type { VMProcess } from '../core/types.js';
import { renderCommandLine } from '../lib/shell.js';
import { formatCommand, supportsAnsi } from '../lib/verbose.js';

/**
 * How long to wait for the child to disappear after SIGKILL.
 */
export const KILL_WAIT_MS = 5000;

/**
 * Options for spawning a VM process
 */
export interface SpawnVMOptions {
  /** Print the command to stderr before spawning */
  verbose?: boolean;
}

/**
 * A `tart run` child process.
 */
export class TartVMProcess implements VMProcess {
  private exited = false;
  private readonly exitPromise: Promise<void>;

  constructor(private readonly child: ChildProcess) {
    this.exitPromise = new Promise<void>((resolve) => {
      const done = (): void => {
        this.exited = true;
        resolve();
      };
      child.once('exit', done);
      // A spawn failure emits 'error' without 'exit'
      child.once('error', done);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isRunning(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  /**
   * Send SIGTERM and wait for exit, escalating to SIGKILL after `graceMs`.
   *
   * Resolves only once the child is gone.
   *
   * @throws Error if the child outlives SIGKILL by KILL_WAIT_MS
   */
  async stop(graceMs: number = 30000): Promise<void> {
    if (!this.isRunning()) {
      return;
    }

    this.child.kill('SIGTERM');
    if (await this.waitForExit(graceMs)) {
      return;
    }

    this.child.kill('SIGKILL');
    if (!(await this.waitForExit(KILL_WAIT_MS))) {
      throw new Error(`VM process ${this.pid ?? '?'} did not exit after SIGKILL`);
    }
  }

  private async waitForExit(ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([this.exitPromise.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Spawn `tart <args>` in the background.
 */
export function spawnVMProcess(
  tartPath: string,
  args: readonly string[],
  options: SpawnVMOptions = {}
): TartVMProcess {
  if (options.verbose) {
    process.stderr.write(
      formatCommand(renderCommandLine(tartPath, args), '[tart] ', supportsAnsi())
    );
  }

  const child = spawn(tartPath, [...args], { stdio: 'ignore' });
  return new TartVMProcess(child);
}
