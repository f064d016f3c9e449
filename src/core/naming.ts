/**
 * Test Instance Naming Utilities
 *
 * Generates unique names for ephemeral test instances and recognizes
 * names that vmtrial generated, so leftovers can be reported.
 */

import { ConfigError } from './errors.js';

/**
 * Generated instance name pattern.
 * Format: {base}-test-{epochMillis}-{pid}-{seq}
 */
export const TEST_INSTANCE_PATTERN = /^(.+)-test-(\d{10,})-(\d+)-(\d+)$/;

/**
 * Names accepted for caller-supplied instances.
 */
export const INSTANCE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const MAX_INSTANCE_NAME_LENGTH = 64;

let sequence = 0;

/**
 * Inputs for name generation. Overridable in tests.
 */
export interface NameSource {
  now: () => number;
  pid: number;
}

const defaultSource: NameSource = {
  now: () => Date.now(),
  pid: process.pid,
};

/**
 * Generate a unique test instance name for a base image.
 *
 * The pid separates concurrent processes and the per-process sequence
 * separates runs started by one process within the same millisecond.
 *
 * @param baseImage - Base image the instance is cloned from
 * @param source - Clock and pid (defaults to the current process)
 */
export function generateInstanceName(
  baseImage: string,
  source: NameSource = defaultSource
): string {
  const seq = sequence++;
  // Registry images (ghcr.io/org/image:tag) are not valid local names
  const prefix = sanitizeImageName(baseImage);
  return `${prefix}-test-${source.now()}-${source.pid}-${seq}`;
}

/**
 * Reduce an image reference to characters tart accepts in a local name.
 */
export function sanitizeImageName(image: string): string {
  const cleaned = image
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/^[^A-Za-z0-9]+/, '')
    .replace(/-+$/, '');
  return cleaned === '' ? 'vm' : cleaned;
}

/**
 * Validate a caller-supplied instance name.
 *
 * @throws ConfigError if the name cannot be used as a tart VM name
 */
export function assertValidInstanceName(name: string): void {
  if (name.length === 0 || name.length > MAX_INSTANCE_NAME_LENGTH) {
    throw new ConfigError(
      `Instance name must be 1-${MAX_INSTANCE_NAME_LENGTH} characters: '${name}'`,
      'INVALID_ARGUMENT'
    );
  }
  if (!INSTANCE_NAME_PATTERN.test(name)) {
    throw new ConfigError(
      `Invalid instance name '${name}'`,
      'INVALID_ARGUMENT',
      'Use letters, digits, dots, underscores and hyphens, starting with a letter or digit.'
    );
  }
}

/**
 * Parse a generated instance name.
 *
 * @returns Components, or null when the name was not generated by vmtrial
 */
export function parseInstanceName(name: string): {
  base: string;
  startedAt: number;
  pid: number;
  seq: number;
} | null {
  const match = TEST_INSTANCE_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [, base, startedAt, pid, seq] = match;
  if (!base || !startedAt || !pid || !seq) {
    return null;
  }
  return {
    base,
    startedAt: Number(startedAt),
    pid: Number(pid),
    seq: Number(seq),
  };
}

/**
 * Check whether an image store entry looks like a leftover test instance.
 */
export function isTestInstanceName(name: string): boolean {
  return parseInstanceName(name) !== null;
}
