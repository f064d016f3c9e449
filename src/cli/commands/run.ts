/**
 * Run Command Handler
 *
 * Runs a test script or inline command in an ephemeral clone of a base
 * image and exits with the remote status.
 */

import { loadSettings } from '../../config/resolver.js';
import { TartExecutor, TartImageStore } from '../../tart/index.js';
import { SshTransport } from '../../ssh/transport.js';
import { assertTartAvailable } from '../../core/preflight.js';
import { assertPassed, runTest } from '../../core/orchestrator.js';
import { bindTerminationSignals } from '../../lib/signals.js';
import { RemoteExecutionError } from '../../core/errors.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

/**
 * Options for the run command
 */
export interface RunCommandOptions {
  user?: string;
  timeout?: string;
  port?: string;
  keep?: boolean;
  name?: string;
  copy?: string[];
  env?: string[];
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Execute the run command.
 *
 * This command:
 * 1. Resolves settings (flags > environment > config file > defaults)
 * 2. Checks that tart is installed
 * 3. Binds SIGINT/SIGTERM so an interruption still cleans up
 * 4. Runs the orchestrator, printing one line per phase
 * 5. Exits 0, the remote status, or the harness failure code
 *
 * @param baseImage - Name of the base image to clone
 * @param target - Local script path or inline command
 * @param testArgs - Arguments passed to the target
 * @param options - Command options
 */
export async function runCommand(
  baseImage: string,
  target: string,
  testArgs: string[],
  options: RunCommandOptions
): Promise<void> {
  const output = createOutput('run', options);
  const scope = bindTerminationSignals();

  try {
    const settings = await loadSettings(options.config, {
      user: options.user,
      timeout: options.timeout,
      port: options.port,
    });

    output.banner('vmtrial: ephemeral VM test run');

    const executor = new TartExecutor({ tartPath: settings.tartPath, verbose: options.verbose });
    const version = await assertTartAvailable(executor);
    output.debug(`tart ${version}`);

    const transport = new SshTransport({
      user: settings.user,
      port: settings.port,
      connectTimeout: settings.connectTimeout,
      extraOptions: settings.sshOptions,
      sshPath: settings.sshPath,
      scpPath: settings.scpPath,
      verbose: options.verbose,
    });

    const result = await runTest(
      baseImage,
      {
        target,
        args: testArgs,
        env: options.env ?? [],
        copyPaths: options.copy ?? [],
        instanceName: options.name,
        retain: options.keep === true,
      },
      {
        imageStore: new TartImageStore(executor),
        transport,
        user: settings.user,
        timeoutMs: settings.timeout * 1000,
        pollIntervalMs: settings.pollInterval * 1000,
        signal: scope.signal,
        // Keep stdout parseable in JSON mode
        stdout: output.isJson() ? process.stderr : process.stdout,
        stderr: process.stderr,
        observer: {
          onPhase: (event) => output.phase(event),
          onWarning: (message) => output.warning(message),
          onDebug: (message) => output.debug(message),
        },
      }
    );

    output.runSummary(result);
    output.flush();
    assertPassed(result);
    process.exit(0);
  } catch (error) {
    if (error instanceof RemoteExecutionError) {
      // Already reported by runSummary
      process.exit(error.exitCode);
    }
    handleError(output, error);
  } finally {
    scope.dispose();
  }
}
