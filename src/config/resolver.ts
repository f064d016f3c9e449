/**
 * Configuration Resolver
 *
 * Merges built-in defaults, the YAML file, environment variables and
 * command-line flags into the settings for one run.
 */

import { dirname } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { expandPath } from '../lib/paths.js';
import { findConfigFile, loadYamlFile } from './loader.js';
import { validateConfig } from './validator.js';
import type { ResolvedSettings, SettingsOverrides, VmtrialConfig } from './types.js';

/**
 * Default values when not specified anywhere
 */
export const DEFAULTS = {
  user: 'admin',
  timeout: 120,
  port: 22,
  pollInterval: 2,
  connectTimeout: 5,
  tartPath: 'tart',
  sshPath: 'ssh',
  scpPath: 'scp',
};

/**
 * Environment variables consumed, by setting
 */
export const ENV_VARS = {
  user: 'VM_USER',
  timeout: 'SSH_TIMEOUT',
  port: 'VM_SSH_PORT',
} as const;

/**
 * Parse an integer setting from a string source.
 *
 * @param source - Where the value came from, for the error message
 * @throws ConfigError if the value is not an integer within range
 */
export function parseIntegerSetting(
  value: string,
  source: string,
  min: number,
  max: number
): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(
      `${source} must be an integer between ${min} and ${max}, got '${value}'`,
      'INVALID_ARGUMENT'
    );
  }
  return parsed;
}

/**
 * Pick the first defined, non-empty string.
 */
function firstString(...values: Array<string | undefined>): string | undefined {
  return values.find((v) => v !== undefined && v !== '');
}

/**
 * Resolve settings from an already validated configuration.
 *
 * @param config - Validated file configuration (empty object when none)
 * @param configPath - Absolute path of the file, or null
 * @param overrides - Flag values
 * @param env - Process environment
 */
export function resolveSettings(
  config: VmtrialConfig,
  configPath: string | null,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedSettings {
  const defaults = config.defaults ?? {};
  const basePath = configPath ? dirname(configPath) : process.cwd();

  const user =
    firstString(overrides.user, env[ENV_VARS.user], defaults.user) ?? DEFAULTS.user;

  const timeoutRaw = firstString(overrides.timeout, env[ENV_VARS.timeout]);
  const timeout =
    timeoutRaw !== undefined
      ? parseIntegerSetting(
          timeoutRaw,
          overrides.timeout !== undefined ? '--timeout' : ENV_VARS.timeout,
          1,
          3600
        )
      : defaults.timeout ?? DEFAULTS.timeout;

  const portRaw = firstString(overrides.port, env[ENV_VARS.port]);
  const port =
    portRaw !== undefined
      ? parseIntegerSetting(
          portRaw,
          overrides.port !== undefined ? '--port' : ENV_VARS.port,
          1,
          65535
        )
      : defaults.port ?? DEFAULTS.port;

  return {
    user,
    timeout,
    port,
    pollInterval: defaults.poll_interval ?? DEFAULTS.pollInterval,
    connectTimeout: defaults.connect_timeout ?? DEFAULTS.connectTimeout,
    tartPath: expandPath(config.tart?.path ?? DEFAULTS.tartPath, basePath, env),
    sshPath: expandPath(config.ssh?.path ?? DEFAULTS.sshPath, basePath, env),
    scpPath: expandPath(config.ssh?.scp_path ?? DEFAULTS.scpPath, basePath, env),
    sshOptions: config.ssh?.options ?? [],
    configPath,
  };
}

/**
 * Find, load, validate and resolve the configuration for a command.
 *
 * @param explicitPath - Value of --config, if given
 * @throws ConfigError if the file is missing, unparsable or invalid
 */
export async function loadSettings(
  explicitPath: string | undefined,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<ResolvedSettings> {
  const configPath = await findConfigFile(explicitPath, cwd);
  if (configPath === null) {
    return resolveSettings({}, null, overrides, env);
  }

  const raw = await loadYamlFile(configPath);
  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration file: ${configPath}`,
      'CONFIG_VALIDATION_FAILED',
      'Run `vmtrial validate <file>` for details.',
      configPath,
      result.errors
    );
  }

  return resolveSettings(result.config, configPath, overrides, env);
}
