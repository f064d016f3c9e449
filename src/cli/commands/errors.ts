/**
 * Shared error reporting for command handlers.
 */

import { TartError } from '../../tart/executor.js';
import {
  ConfigError,
  TartOperationError,
  getExitCode,
  isVmtrialError,
} from '../../core/errors.js';
import type { OutputFormatter } from '../output.js';

/**
 * Report an error and exit with its code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  const reported =
    error instanceof TartError
      ? new TartOperationError(error.message, error.exitCode, error.stderr)
      : error;

  if (reported instanceof ConfigError && reported.validationErrors?.length) {
    output.error(reported.message, reported);
    output.validationError(reported.validationErrors);
  } else if (isVmtrialError(reported)) {
    output.error(reported.message, reported);
  } else if (reported instanceof Error) {
    output.error(reported.message);
  } else {
    output.error(String(reported));
  }

  output.flush();
  process.exit(getExitCode(reported));
}
