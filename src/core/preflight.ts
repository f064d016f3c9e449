/**
 * Preflight Checks for vmtrial
 *
 * Validates requirements before an instance is created:
 * - tart availability
 * - Base image existence
 */

import type { TartExecutor } from '../tart/executor.js';
import { checkTartAvailable } from '../tart/queries.js';
import type { ImageStore } from './types.js';
import { ImageNotFoundError, PreflightError } from './errors.js';

/**
 * Ensure the tart CLI can be executed.
 *
 * @returns The tart version string
 * @throws PreflightError if tart is missing or broken
 */
export async function assertTartAvailable(executor: TartExecutor): Promise<string> {
  const result = await checkTartAvailable(executor);
  if (!result.available) {
    throw new PreflightError(
      result.message ?? 'tart is not available',
      'Install tart: brew install cirruslabs/cli/tart',
      { tartPath: executor.tartPath }
    );
  }
  return result.version ?? 'unknown';
}

/**
 * Ensure the base image exists before anything is cloned.
 *
 * @throws ImageNotFoundError listing the images that do exist
 */
export async function assertBaseImageExists(
  store: ImageStore,
  baseImage: string,
  signal?: AbortSignal
): Promise<void> {
  const images = await store.list(signal);
  if (images.some((image) => image.name === baseImage)) {
    return;
  }
  throw new ImageNotFoundError(
    baseImage,
    images.map((image) => image.name)
  );
}
