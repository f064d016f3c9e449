/**
 * Remote Command Builder
 *
 * Turns a test target, its arguments and environment assignments into the
 * single command line handed to the remote shell.
 */

import { basename, resolve } from 'node:path';

import { ConfigError } from './errors.js';
import { shellQuote } from '../lib/shell.js';

const ENV_ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=([\s\S]*)$/;

/**
 * A parsed NAME=VALUE assignment
 */
export interface EnvAssignment {
  name: string;
  value: string;
}

/**
 * Parse a NAME=VALUE assignment.
 *
 * @throws ConfigError if the name is not a valid shell identifier
 */
export function parseEnvAssignment(assignment: string): EnvAssignment {
  const match = ENV_ASSIGNMENT.exec(assignment);
  const name = match?.[1];
  if (!match || !name) {
    throw new ConfigError(
      `Invalid environment assignment '${assignment}'`,
      'INVALID_ARGUMENT',
      'Use NAME=VALUE, where NAME is a shell identifier.'
    );
  }
  return { name, value: match[2] ?? '' };
}

/**
 * Build the `export NAME=value; ` prefix for a list of assignments.
 */
export function buildEnvPrefix(env: readonly string[]): string {
  return env
    .map(parseEnvAssignment)
    .map(({ name, value }) => `export ${name}=${shellQuote(value)}; `)
    .join('');
}

/**
 * Quote arguments for appending to a remote command.
 */
export function buildArgsSuffix(args: readonly string[]): string {
  return args.length === 0 ? '' : ` ${args.map(shellQuote).join(' ')}`;
}

/**
 * Home-relative guest path for a local file or directory, as a copy
 * destination. The base name is taken from the resolved path, so `.`
 * stages the current directory under its own name.
 */
export function guestHomePath(localPath: string): string {
  return `~/${basename(resolve(localPath))}`;
}

/**
 * The same guest path, quoted for use inside a shell command.
 */
function guestHomeCommandPath(localPath: string): string {
  return `~/${shellQuote(basename(resolve(localPath)))}`;
}

/**
 * Command that makes an uploaded script executable and runs it.
 */
export function buildScriptCommand(
  localScriptPath: string,
  args: readonly string[],
  env: readonly string[]
): string {
  const remote = guestHomeCommandPath(localScriptPath);
  return `${buildEnvPrefix(env)}chmod +x ${remote} && ${remote}${buildArgsSuffix(args)}`;
}

/**
 * Command that runs an inline shell snippet as given.
 */
export function buildInlineCommand(
  command: string,
  args: readonly string[],
  env: readonly string[]
): string {
  return `${buildEnvPrefix(env)}${command}${buildArgsSuffix(args)}`;
}
