/**
 * Images Command Handler
 *
 * Lists images in the local tart store and flags test instances that a
 * crashed or --keep run left behind.
 */

import { loadSettings } from '../../config/resolver.js';
import { TartExecutor, listImages } from '../../tart/index.js';
import { assertTartAvailable } from '../../core/preflight.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

/**
 * Options for the images command
 */
export interface ImagesCommandOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Execute the images command.
 *
 * @param options - Command options
 */
export async function imagesCommand(options: ImagesCommandOptions): Promise<void> {
  const output = createOutput('images', options);

  try {
    const settings = await loadSettings(options.config);
    const executor = new TartExecutor({ tartPath: settings.tartPath, verbose: options.verbose });
    await assertTartAvailable(executor);

    const images = await listImages(executor);
    output.imagesTable(images);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
