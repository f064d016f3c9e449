/**
 * `vmtrial validate <file>`: schema-check a configuration file without
 * touching tart, then show the settings a run would use with the current
 * environment applied.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { resolveSettings } from '../../config/resolver.js';
import type { ResolvedSettings } from '../../config/types.js';
import { HARNESS_FAILURE_EXIT_CODE } from '../../core/errors.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Settings in display order.
 */
export function describeSettings(settings: ResolvedSettings): Record<string, string | number> {
  return {
    user: settings.user,
    timeout: `${settings.timeout}s`,
    port: settings.port,
    'poll interval': `${settings.pollInterval}s`,
    'connect timeout': `${settings.connectTimeout}s`,
    tart: settings.tartPath,
    ssh: settings.sshPath,
    scp: settings.scpPath,
    'ssh options': settings.sshOptions.length > 0 ? settings.sshOptions.join(' ') : '(none)',
  };
}

export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);
  const configPath = resolve(file);

  try {
    output.info(`Checking ${configPath}`);
    const checked = validateConfig(await loadYamlFile(configPath));

    if (!checked.valid) {
      output.validationError(checked.errors);
      output.flush();
      process.exit(HARNESS_FAILURE_EXIT_CODE);
    }

    output.validationSuccess(configPath, describeSettings(resolveSettings(checked.config, configPath)));
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
