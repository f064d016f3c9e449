/**
 * Path Utilities
 *
 * Provides path expansion for executable and staging paths from
 * configuration files.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * Expand a path, resolving ~ and $VAR, and anchoring relative paths that
 * contain a separator at `basePath`.
 *
 * Bare names such as `tart` are left alone so they are looked up on PATH.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @param env - Environment used for $VAR expansion
 */
export function expandPath(
  inputPath: string,
  basePath: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => env[varName] ?? ''
  );

  if (!expanded.includes('/')) {
    return expanded;
  }

  // Make relative paths absolute relative to the config file directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}
