/**
 * tart Queries
 *
 * High-level query functions that use the executor to inspect the image
 * store. Output parsing lives here so the rest of vmtrial never looks at
 * raw tart output.
 */

import { isIP } from 'node:net';

import type { ImageInfo, TartImageSource, TartVMState } from './types.js';
import { TartError, type TartExecutor } from './executor.js';
import { buildIpArgs, buildListArgs, buildVersionArgs } from './commands.js';

/**
 * Result of the tart availability check
 */
export interface TartAvailabilityResult {
  available: boolean;
  version?: string;
  message?: string;
}

const STATES: readonly TartVMState[] = ['running', 'stopped', 'suspended'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse `tart list --format json` output into image summaries.
 *
 * Entries without a string Name are dropped. Unknown states are reported
 * as stopped.
 */
export function parseImageList(data: unknown): ImageInfo[] {
  if (data === null) {
    return [];
  }
  if (!Array.isArray(data)) {
    throw new TartError(
      'Unexpected tart list output: expected an array',
      'INVALID_RESPONSE',
      0,
      '',
      buildListArgs()
    );
  }

  const images: ImageInfo[] = [];
  for (const entry of data) {
    if (!isRecord(entry)) {
      continue;
    }
    const name = entry['Name'];
    if (typeof name !== 'string') {
      continue;
    }
    const stateField = entry['State'];
    const rawState = typeof stateField === 'string' ? stateField.toLowerCase() : '';
    const state = STATES.find((s) => s === rawState) ?? (entry['Running'] === true ? 'running' : 'stopped');
    const source: TartImageSource = entry['Source'] === 'OCI' ? 'OCI' : 'local';
    const disk = entry['Disk'];

    images.push({
      name,
      source,
      state,
      diskGB: typeof disk === 'number' ? disk : null,
    });
  }
  return images;
}

/**
 * Parse `tart ip` output.
 *
 * @returns The address, or null when the output is not a bare IP literal
 */
export function parseIpOutput(output: string): string | null {
  const candidate = output.trim().split(/\s+/)[0] ?? '';
  return isIP(candidate) === 0 ? null : candidate;
}

/**
 * List all images in the store.
 */
export async function listImages(
  executor: TartExecutor,
  signal?: AbortSignal
): Promise<ImageInfo[]> {
  const data = await executor.executeJson<unknown>(buildListArgs(), { signal });
  return parseImageList(data);
}

/**
 * Ask tart for the VM's address.
 *
 * A VM that has not obtained a DHCP lease makes `tart ip` fail; that is
 * reported as "not yet available" (null), not as an error.
 */
export async function resolveAddress(
  executor: TartExecutor,
  name: string,
  signal?: AbortSignal
): Promise<string | null> {
  try {
    const output = await executor.execute(buildIpArgs(name), { timeout: 10000, signal });
    return parseIpOutput(output);
  } catch (error) {
    if (error instanceof TartError && error.code !== 'TART_NOT_AVAILABLE') {
      return null;
    }
    throw error;
  }
}

/**
 * Check that the tart executable can be run.
 */
export async function checkTartAvailable(
  executor: TartExecutor
): Promise<TartAvailabilityResult> {
  try {
    const version = await executor.execute(buildVersionArgs(), { timeout: 10000 });
    return { available: true, version };
  } catch (error) {
    return {
      available: false,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
