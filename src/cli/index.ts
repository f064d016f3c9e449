#!/usr/bin/env node
import { program, type CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { runCommand, type RunCommandOptions } from './commands/run.js';
import { imagesCommand, type ImagesCommandOptions } from './commands/images.js';
import { validateCommand } from './commands/validate.js';
import { HARNESS_FAILURE_EXIT_CODE } from '../core/errors.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

/**
 * Verbose option description shared across commands that spawn tools.
 */
const VERBOSE_DESC = 'Print tart/ssh commands and polling progress';

/**
 * Collect a repeatable option into an array.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   vmtrial --verbose run img cmd    (parent parses --verbose)
 *   vmtrial run img cmd --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

// Usage errors are harness failures, not test failures
program.exitOverride((err: CommanderError) => {
  process.exit(err.exitCode === 0 ? 0 : HARNESS_FAILURE_EXIT_CODE);
});

program
  .name('vmtrial')
  .description('Run tests in ephemeral tart VMs')
  .version(packageJson.version)
  .option('--verbose', VERBOSE_DESC);

program
  .command('run <base-image> <test-target> [test-args...]')
  .description('Clone <base-image>, run <test-target> over SSH, then destroy the clone')
  .option('-u, --user <user>', 'SSH user (env VM_USER, default: admin)')
  .option('-t, --timeout <seconds>', 'SSH connection timeout (env SSH_TIMEOUT, default: 120)')
  .option('-p, --port <port>', 'SSH port (env VM_SSH_PORT, default: 22)')
  .option('-k, --keep', 'Keep the VM after tests (do not destroy)')
  .option('-n, --name <name>', 'Custom name for the test VM (default: auto-generated)')
  .option('-c, --copy <path>', 'Copy a file or directory to the VM (repeatable)', collect, [])
  .option('-e, --env <NAME=VALUE>', 'Set an environment variable in the VM (repeatable)', collect, [])
  .option('--config <file>', 'Configuration file (default: ./vmtrial.yaml if present)')
  .option('--json', 'Output a JSON summary')
  .option('--verbose', VERBOSE_DESC)
  .addHelpText(
    'after',
    `
Pass options meant for the test target after "--":
  $ vmtrial run macos-nix-base ./tests/vm/darwin-test.sh -- --fast
  $ vmtrial run -c . nixos-nix-base "cd project && make check"`
  )
  .action((baseImage: string, target: string, testArgs: string[], opts: RunCommandOptions) =>
    runCommand(baseImage, target, testArgs, withGlobalOpts(opts))
  );

program
  .command('images')
  .description('List local images and leftover test instances')
  .option('--config <file>', 'Configuration file (default: ./vmtrial.yaml if present)')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((opts: ImagesCommandOptions) => imagesCommand(withGlobalOpts(opts)));

program
  .command('validate <file>')
  .description('Validate a YAML configuration file against the schema')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

await program.parseAsync();
