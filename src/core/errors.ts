/**
 * Error Types for vmtrial
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all vmtrial errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_ARGUMENT'
  | 'TART_NOT_AVAILABLE'
  | 'IMAGE_NOT_FOUND'
  | 'CLONE_FAILED'
  | 'BOOT_TIMEOUT'
  | 'TRANSFER_FAILED'
  | 'REMOTE_EXECUTION_FAILED'
  | 'INTERRUPTED'
  | 'TART_ERROR'
  | 'OPERATION_FAILED';

/**
 * Exit code for every failure of the harness itself.
 *
 * Remote commands keep their own status (1-255) so callers can tell
 * "the test failed" from "the harness failed". 125 follows the convention
 * of container runners that reserve it for their own errors.
 */
export const HARNESS_FAILURE_EXIT_CODE = 125;

/**
 * Mapping of error codes to exit codes.
 *
 * REMOTE_EXECUTION_FAILED and INTERRUPTED are overridden per instance.
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: HARNESS_FAILURE_EXIT_CODE,
  CONFIG_INVALID_YAML: HARNESS_FAILURE_EXIT_CODE,
  CONFIG_VALIDATION_FAILED: HARNESS_FAILURE_EXIT_CODE,
  INVALID_ARGUMENT: HARNESS_FAILURE_EXIT_CODE,
  TART_NOT_AVAILABLE: HARNESS_FAILURE_EXIT_CODE,
  IMAGE_NOT_FOUND: HARNESS_FAILURE_EXIT_CODE,
  CLONE_FAILED: HARNESS_FAILURE_EXIT_CODE,
  BOOT_TIMEOUT: HARNESS_FAILURE_EXIT_CODE,
  TRANSFER_FAILED: HARNESS_FAILURE_EXIT_CODE,
  REMOTE_EXECUTION_FAILED: 1,
  INTERRUPTED: 130,
  TART_ERROR: HARNESS_FAILURE_EXIT_CODE,
  OPERATION_FAILED: HARNESS_FAILURE_EXIT_CODE,
};

/**
 * Base error class for all vmtrial errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class VmtrialError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'VmtrialError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, VmtrialError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration and argument issues.
 */
export class ConfigError extends VmtrialError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED' | 'INVALID_ARGUMENT',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for preflight check failures other than a missing image.
 */
export class PreflightError extends VmtrialError {
  constructor(
    message: string,
    suggestion?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message, 'TART_NOT_AVAILABLE', suggestion);
    this.name = 'PreflightError';
    Object.setPrototypeOf(this, PreflightError.prototype);
  }
}

/**
 * The base image is not registered in the image store.
 */
export class ImageNotFoundError extends VmtrialError {
  constructor(
    public readonly image: string,
    public readonly available: string[]
  ) {
    super(
      `Base image '${image}' not found`,
      'IMAGE_NOT_FOUND',
      available.length > 0
        ? `Available images: ${available.join(', ')}`
        : 'No images are registered. Create a base image first.'
    );
    this.name = 'ImageNotFoundError';
    Object.setPrototypeOf(this, ImageNotFoundError.prototype);
  }
}

/**
 * Cloning the base image into a test instance failed.
 */
export class CloneError extends VmtrialError {
  constructor(
    message: string,
    public readonly image: string,
    public readonly instanceName: string
  ) {
    super(message, 'CLONE_FAILED', `Check that '${instanceName}' is not already in use: tart list`);
    this.name = 'CloneError';
    Object.setPrototypeOf(this, CloneError.prototype);
  }
}

/**
 * No SSH endpoint became reachable within the configured timeout.
 */
export class BootTimeoutError extends VmtrialError {
  constructor(
    public readonly instanceName: string,
    public readonly timeoutMs: number,
    public readonly lastAddress: string | null
  ) {
    super(
      `Timeout waiting for SSH on '${instanceName}' after ${Math.round(timeoutMs / 1000)}s` +
        (lastAddress ? ` (last address: ${lastAddress})` : ' (no address assigned)'),
      'BOOT_TIMEOUT',
      'Increase --timeout or check that the base image enables sshd for the remote user.'
    );
    this.name = 'BootTimeoutError';
    Object.setPrototypeOf(this, BootTimeoutError.prototype);
  }
}

/**
 * Copying a local path into the guest failed.
 */
export class TransferError extends VmtrialError {
  constructor(
    message: string,
    public readonly localPath: string,
    public readonly stderr: string = ''
  ) {
    super(message, 'TRANSFER_FAILED');
    this.name = 'TransferError';
    Object.setPrototypeOf(this, TransferError.prototype);
  }
}

/**
 * The remote command finished with a non-zero status.
 *
 * This is a reported test failure, not a harness defect: the process exits
 * with the remote status itself.
 */
export class RemoteExecutionError extends VmtrialError {
  constructor(public readonly remoteStatus: number) {
    super(`Tests failed with exit code ${remoteStatus}`, 'REMOTE_EXECUTION_FAILED');
    this.name = 'RemoteExecutionError';
    Object.setPrototypeOf(this, RemoteExecutionError.prototype);
  }

  override get exitCode(): number {
    return this.remoteStatus;
  }
}

/**
 * The run was cancelled by an external signal.
 */
export class InterruptedError extends VmtrialError {
  constructor(public readonly signal: NodeJS.Signals | null = null) {
    super(signal ? `Interrupted by ${signal}` : 'Interrupted', 'INTERRUPTED');
    this.name = 'InterruptedError';
    Object.setPrototypeOf(this, InterruptedError.prototype);
  }

  override get exitCode(): number {
    return this.signal === 'SIGTERM' ? 143 : 130;
  }
}

/**
 * Wraps a tart failure outside a named phase.
 */
export class TartOperationError extends VmtrialError {
  constructor(
    message: string,
    public readonly tartExitCode: number | null,
    public readonly stderr: string
  ) {
    super(message, 'TART_ERROR');
    this.name = 'TartOperationError';
    Object.setPrototypeOf(this, TartOperationError.prototype);
  }
}

/**
 * Check if an error is a VmtrialError.
 */
export function isVmtrialError(error: unknown): error is VmtrialError {
  return error instanceof VmtrialError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isVmtrialError(error)) {
    return error.exitCode;
  }
  // Anything unexpected is a harness failure
  return HARNESS_FAILURE_EXIT_CODE;
}
