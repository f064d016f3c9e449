/**
 * SSH Transport
 *
 * RemoteTransport implementation that shells out to OpenSSH.
 */

import { constants } from 'node:os';

import type { RemoteExecOptions, RemoteTransport } from '../core/types.js';
import { TransferError } from '../core/errors.js';
import { runProcess } from '../lib/process.js';
import { buildScpArgs, buildSshArgs, type SshConnectionOptions } from './commands.js';

/**
 * Options for constructing an SshTransport
 */
export interface SshTransportOptions extends SshConnectionOptions {
  /** Path to ssh (default: 'ssh') */
  sshPath?: string;
  /** Path to scp (default: 'scp') */
  scpPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * ssh exits 255 when it could not connect or authenticate.
 */
export const SSH_CONNECTION_FAILURE = 255;

export class SshTransport implements RemoteTransport {
  private readonly sshPath: string;
  private readonly scpPath: string;

  constructor(private readonly options: SshTransportOptions) {
    this.sshPath = options.sshPath ?? 'ssh';
    this.scpPath = options.scpPath ?? 'scp';
  }

  async probe(address: string, signal?: AbortSignal): Promise<boolean> {
    const result = await runProcess(this.sshPath, buildSshArgs(address, 'exit 0', this.options), {
      // Hard stop slightly beyond ssh's own ConnectTimeout
      timeout: (this.options.connectTimeout + 5) * 1000,
      signal,
      verbose: this.options.verbose,
      verbosePrefix: '[ssh] ',
    });
    return result.exitCode === 0;
  }

  async copy(
    address: string,
    localPath: string,
    remotePath: string,
    options: { recursive?: boolean; signal?: AbortSignal } = {}
  ): Promise<void> {
    const args = buildScpArgs(address, localPath, remotePath, {
      ...this.options,
      recursive: options.recursive,
    });
    const result = await runProcess(this.scpPath, args, {
      signal: options.signal,
      verbose: this.options.verbose,
      verbosePrefix: '[ssh] ',
    });

    if (result.aborted) {
      throw new TransferError(`Copy of ${localPath} was interrupted`, localPath, result.stderr);
    }
    if (result.exitCode !== 0) {
      const reason = result.stderr.trim().split('\n')[0] ?? '';
      throw new TransferError(
        `Failed to copy ${localPath} to ${remotePath}` + (reason ? `: ${reason}` : ''),
        localPath,
        result.stderr
      );
    }
  }

  async exec(address: string, command: string, options: RemoteExecOptions = {}): Promise<number> {
    const result = await runProcess(this.sshPath, buildSshArgs(address, command, this.options), {
      signal: options.signal,
      stdout: options.stdout ?? process.stdout,
      stderr: options.stderr ?? process.stderr,
      capture: false,
      verbose: this.options.verbose,
      verbosePrefix: '[ssh] ',
    });

    if (result.exitCode !== null) {
      return result.exitCode;
    }
    // Killed by a signal: report the shell convention 128 + n
    return result.signal ? 128 + constants.signals[result.signal] : SSH_CONNECTION_FAILURE;
  }
}
