/**
 * tart Image Store
 *
 * ImageStore implementation backed by the tart CLI.
 */

import type { ImageStore, VMProcess } from '../core/types.js';
import type { ImageInfo } from './types.js';
import type { TartExecutor } from './executor.js';
import { buildCloneArgs, buildDeleteArgs, buildRunArgs, buildStopArgs } from './commands.js';
import { listImages, resolveAddress } from './queries.js';
import { spawnVMProcess } from './vm-process.js';

/**
 * Clones can copy tens of gigabytes on first use.
 */
const CLONE_TIMEOUT_MS = 10 * 60 * 1000;

export class TartImageStore implements ImageStore {
  constructor(private readonly executor: TartExecutor) {}

  list(signal?: AbortSignal): Promise<ImageInfo[]> {
    return listImages(this.executor, signal);
  }

  clone(source: string, target: string, signal?: AbortSignal): Promise<void> {
    return this.executor.executeVoid(buildCloneArgs(source, target), {
      timeout: CLONE_TIMEOUT_MS,
      signal,
    });
  }

  start(name: string): VMProcess {
    return spawnVMProcess(this.executor.tartPath, buildRunArgs(name), {
      verbose: this.executor.verbose,
    });
  }

  stop(name: string): Promise<void> {
    return this.executor.executeVoid(buildStopArgs(name));
  }

  delete(name: string): Promise<void> {
    return this.executor.executeVoid(buildDeleteArgs(name));
  }

  resolveAddress(name: string, signal?: AbortSignal): Promise<string | null> {
    return resolveAddress(this.executor, name, signal);
  }
}
