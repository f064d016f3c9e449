/**
 * File Staging
 *
 * Copies local paths into the guest home directory before the test runs.
 */

import { stat } from 'node:fs/promises';

import type { RunContext } from './types.js';
import { TransferError } from './errors.js';
import { guestHomePath } from './remote-command.js';
import { throwIfInterrupted } from './cancellation.js';

/**
 * Copy each path to `~/<basename>` in the order given.
 *
 * The first missing path or failed copy aborts staging; later paths are
 * not attempted.
 *
 * @param onCopy - Called before each copy with source and destination
 * @throws TransferError naming the path that failed
 */
export async function stagePaths(
  ctx: RunContext,
  address: string,
  paths: readonly string[],
  onCopy?: (localPath: string, remotePath: string) => void
): Promise<void> {
  const { deps } = ctx;

  for (const localPath of paths) {
    throwIfInterrupted(deps.signal);

    try {
      await stat(localPath);
    } catch {
      throw new TransferError(`Local path not found: ${localPath}`, localPath);
    }

    const remotePath = guestHomePath(localPath);
    onCopy?.(localPath, remotePath);
    try {
      await deps.transport.copy(address, localPath, remotePath, {
        recursive: true,
        signal: deps.signal,
      });
    } catch (error) {
      if (error instanceof TransferError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransferError(`Failed to copy ${localPath}: ${reason}`, localPath);
    }
  }
}
