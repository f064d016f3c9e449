/**
 * Configuration Types for vmtrial
 *
 * These types represent the YAML configuration structure and the resolved
 * settings with defaults, environment and flags applied.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from vmtrial.yaml
 */
export interface VmtrialConfig {
  defaults?: DefaultsConfig;
  tart?: TartConfig;
  ssh?: SshConfig;
}

/**
 * Run defaults, overridable by environment and flags
 */
export interface DefaultsConfig {
  /** Remote user. Default: admin */
  user?: string;
  /** SSH readiness timeout in seconds. Default: 120 */
  timeout?: number;
  /** SSH port. Default: 22 */
  port?: number;
  /** Seconds between readiness attempts. Default: 2 */
  poll_interval?: number;
  /** Per-attempt SSH connect timeout in seconds. Default: 5 */
  connect_timeout?: number;
}

/**
 * tart CLI location
 */
export interface TartConfig {
  /** Path to the tart executable. Default: tart */
  path?: string;
}

/**
 * OpenSSH client settings
 */
export interface SshConfig {
  /** Path to ssh. Default: ssh */
  path?: string;
  /** Path to scp. Default: scp */
  scp_path?: string;
  /** Extra `-o` options, e.g. "ServerAliveInterval=15" */
  options?: string[];
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Settings with every source merged: flags > environment > file > defaults
 */
export interface ResolvedSettings {
  user: string;
  /** SSH readiness timeout in seconds */
  timeout: number;
  port: number;
  /** Seconds between readiness attempts */
  pollInterval: number;
  /** Per-attempt connect timeout in seconds */
  connectTimeout: number;
  tartPath: string;
  sshPath: string;
  scpPath: string;
  sshOptions: string[];
  /** Absolute path of the config file used, or null */
  configPath: string | null;
}

/**
 * Values given on the command line
 */
export interface SettingsOverrides {
  user?: string;
  timeout?: string;
  port?: string;
}
