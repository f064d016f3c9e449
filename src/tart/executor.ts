/**
 * tart Executor
 *
 * Spawns the tart CLI for image-store operations and parses its output.
 */

import { runProcess, SpawnError, type ProcessResult } from '../lib/process.js';

/**
 * Error codes for tart operations
 */
export type TartErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'INVALID_RESPONSE'
  | 'EXECUTION_FAILED'
  | 'TART_NOT_AVAILABLE';

/**
 * Error thrown when a tart operation fails
 */
export class TartError extends Error {
  constructor(
    message: string,
    public readonly code: TartErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly args: readonly string[]
  ) {
    super(message);
    this.name = 'TartError';
  }
}

/**
 * Options for executing tart commands
 */
export interface ExecuteOptions {
  /** Timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Abort the command when this signal fires */
  signal?: AbortSignal;
}

/**
 * Options for constructing a TartExecutor
 */
export interface TartExecutorOptions {
  /** Path to the tart executable (default: 'tart') */
  tartPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Executes tart subcommands and returns their output.
 */
export class TartExecutor {
  readonly tartPath: string;
  readonly verbose: boolean;

  constructor(options?: TartExecutorOptions) {
    this.tartPath = options?.tartPath ?? 'tart';
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run a tart subcommand and return its trimmed stdout.
   *
   * @throws TartError if tart cannot be spawned, times out, or exits non-zero
   */
  async execute(args: readonly string[], options: ExecuteOptions = {}): Promise<string> {
    const { timeout = 60000, signal } = options;

    let result: ProcessResult;
    try {
      result = await runProcess(this.tartPath, args, {
        timeout,
        signal,
        verbose: this.verbose,
        verbosePrefix: '[tart] ',
      });
    } catch (error) {
      if (error instanceof SpawnError) {
        throw new TartError(
          `Failed to spawn tart: ${error.message}`,
          'TART_NOT_AVAILABLE',
          null,
          '',
          args
        );
      }
      throw error;
    }

    if (result.timedOut) {
      throw new TartError(
        `tart ${args[0] ?? ''} timed out after ${timeout}ms`,
        'EXECUTION_FAILED',
        null,
        result.stderr,
        args
      );
    }

    if (result.aborted) {
      throw new TartError(
        `tart ${args[0] ?? ''} was interrupted`,
        'EXECUTION_FAILED',
        null,
        result.stderr,
        args
      );
    }

    if (result.exitCode !== 0) {
      throw new TartError(
        this.formatErrorMessage(result.stderr, result.exitCode),
        this.classifyError(result.stderr),
        result.exitCode,
        result.stderr,
        args
      );
    }

    return result.stdout.trim();
  }

  /**
   * Run a tart subcommand whose stdout is JSON.
   *
   * @throws TartError with INVALID_RESPONSE if stdout is not JSON
   */
  async executeJson<T>(args: readonly string[], options: ExecuteOptions = {}): Promise<T> {
    const output = await this.execute(args, options);

    try {
      return JSON.parse(output === '' ? 'null' : output) as T;
    } catch {
      throw new TartError(
        `Invalid JSON response from tart: ${output.slice(0, 200)}`,
        'INVALID_RESPONSE',
        0,
        '',
        args
      );
    }
  }

  /**
   * Run a tart subcommand whose output is irrelevant.
   */
  async executeVoid(args: readonly string[], options: ExecuteOptions = {}): Promise<void> {
    await this.execute(args, options);
  }

  /**
   * Classify the error based on stderr content.
   */
  private classifyError(stderr: string): TartErrorCode {
    const lowerStderr = stderr.toLowerCase();

    if (
      lowerStderr.includes('does not exist') ||
      lowerStderr.includes('not found') ||
      lowerStderr.includes('no such')
    ) {
      return 'NOT_FOUND';
    }

    if (lowerStderr.includes('already exists')) {
      return 'ALREADY_EXISTS';
    }

    return 'EXECUTION_FAILED';
  }

  /**
   * Strip ANSI escape codes and carriage returns.
   */
  private stripAnsiCodes(str: string): string {
    // eslint-disable-next-line no-control-regex
    return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
  }

  /**
   * Format a user-friendly error message from stderr.
   */
  private formatErrorMessage(stderr: string, exitCode: number | null): string {
    const meaningful = this.stripAnsiCodes(stderr)
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean)
      .slice(0, 3);

    if (meaningful.length > 0) {
      return meaningful.join(' | ');
    }

    return `tart exited with code ${exitCode}`;
  }
}
