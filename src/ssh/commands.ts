/**
 * SSH Command Builders
 *
 * Builds argument vectors for ssh and scp. Guests are throwaway clones, so
 * host keys are neither checked nor recorded.
 */

import { isAbsolute } from 'node:path';

/**
 * Connection settings shared by ssh and scp
 */
export interface SshConnectionOptions {
  user: string;
  port: number;
  /** Per-attempt connect timeout in seconds */
  connectTimeout: number;
  /** Extra `-o` values, e.g. "ServerAliveInterval=15" */
  extraOptions?: readonly string[];
}

const BASE_OPTIONS = [
  'StrictHostKeyChecking=no',
  'UserKnownHostsFile=/dev/null',
  'LogLevel=ERROR',
  'BatchMode=yes',
];

/**
 * Build the `-o` flags for a connection.
 */
export function buildSshOptions(options: SshConnectionOptions): string[] {
  const values = [
    ...BASE_OPTIONS,
    `ConnectTimeout=${options.connectTimeout}`,
    ...(options.extraOptions ?? []),
  ];
  return values.flatMap((value) => ['-o', value]);
}

/**
 * Format a host for scp targets; IPv6 literals need brackets.
 */
export function formatScpHost(address: string): string {
  return address.includes(':') ? `[${address}]` : address;
}

/**
 * Anchor a relative local path so scp reads neither `host:path` nor an option.
 */
export function formatScpSource(localPath: string): string {
  if (isAbsolute(localPath) || localPath.startsWith('./') || localPath.startsWith('../')) {
    return localPath;
  }
  return `./${localPath}`;
}

/**
 * Arguments to run `command` on the guest.
 */
export function buildSshArgs(
  address: string,
  command: string,
  options: SshConnectionOptions
): string[] {
  return [
    ...buildSshOptions(options),
    '-p',
    String(options.port),
    `${options.user}@${address}`,
    command,
  ];
}

/**
 * Arguments to copy a local path to the guest.
 *
 * `remotePath` is interpreted by the remote shell, so `~/name` lands in the
 * remote user's home directory.
 */
export function buildScpArgs(
  address: string,
  localPath: string,
  remotePath: string,
  options: SshConnectionOptions & { recursive?: boolean }
): string[] {
  return [
    ...buildSshOptions(options),
    '-P',
    String(options.port),
    ...(options.recursive ? ['-r'] : []),
    formatScpSource(localPath),
    `${options.user}@${formatScpHost(address)}:${remotePath}`,
  ];
}
