/**
 * Configuration Loader
 *
 * Finds and reads the optional YAML configuration file.
 */

import { access, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * File looked up in the working directory when --config is not given.
 */
export const DEFAULT_CONFIG_FILE = 'vmtrial.yaml';

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found: ${filePath}`,
        'CONFIG_NOT_FOUND',
        'Check the --config path.',
        filePath
      );
    }
    throw new ConfigError(
      `Failed to read configuration file: ${filePath}` +
        (code === 'EACCES' ? ' (permission denied)' : ''),
      'CONFIG_NOT_FOUND',
      undefined,
      filePath
    );
  }

  try {
    return yaml.load(content, { filename: filePath });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigError(
      `Invalid YAML syntax in ${filePath}: ${reason}`,
      'CONFIG_INVALID_YAML',
      undefined,
      filePath
    );
  }
}

/**
 * Locate the configuration file to use.
 *
 * @param explicitPath - Value of --config, if given
 * @param cwd - Directory searched for the default file
 * @returns Absolute path, or null when no file applies
 */
export async function findConfigFile(
  explicitPath: string | undefined,
  cwd: string = process.cwd()
): Promise<string | null> {
  if (explicitPath !== undefined) {
    // An explicit path must exist; loadYamlFile reports it otherwise
    return resolve(cwd, explicitPath);
  }

  const candidate = join(cwd, DEFAULT_CONFIG_FILE);
  try {
    await access(candidate);
    return candidate;
  } catch {
    return null;
  }
}
