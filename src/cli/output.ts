/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, VmtrialError } from '../core/errors.js';
import type { Phase, PhaseEvent, RunResult } from '../core/types.js';
import type { ImageInfo } from '../tart/types.js';
import { isTestInstanceName } from '../core/naming.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  phases?: PhaseEvent[];
  result?: RunResult;
  images?: ImageOutput[];
  configPath?: string;
  settings?: Record<string, string | number>;
  warnings?: string[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * Image information for images output
 */
export interface ImageOutput {
  name: string;
  source: string;
  state: string;
  diskGB: number | null;
  testInstance: boolean;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * Progress wording per phase: [in progress, done]
 */
const PHASE_TEXT: Record<Phase, [string, string]> = {
  preflight: ['Checking base image', 'Base image found'],
  clone: ['Cloning base image', 'VM cloned'],
  start: ['Starting VM', 'VM started'],
  wait: ['Waiting for SSH', 'SSH available'],
  copy: ['Copying files to VM', 'Files copied'],
  execute: ['Running tests', 'Tests finished'],
  cleanup: ['Cleaning up', 'Cleanup complete'],
};

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * Provides high-level methods for formatting command output in both
 * human-readable and JSON modes. In JSON mode, output is collected
 * and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private verbose: boolean;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean; verbose?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.verbose = options.verbose ?? false;
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Get the output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   */
  error(message: string, error?: VmtrialError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning message. Warnings are kept in JSON output too.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
    this.result.warnings = [...(this.result.warnings ?? []), message];
  }

  /**
   * Print a diagnostic line, only with --verbose.
   */
  debug(message: string): void {
    if (this.mode === 'human' && this.verbose) {
      console.error(`${this.getIndent()}· ${message}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  /**
   * Print a banner line framed by rules.
   */
  banner(title: string): void {
    if (this.mode === 'human') {
      const rule = '='.repeat(44);
      console.log(rule);
      console.log(`  ${title}`);
      console.log(rule);
      console.log();
    }
  }

  // ===========================================================================
  // Run Output
  // ===========================================================================

  /**
   * Report a phase transition from the orchestrator.
   */
  phase(event: PhaseEvent): void {
    this.result.phases = [...(this.result.phases ?? []), event];

    if (this.mode !== 'human') {
      return;
    }

    const [active, done] = PHASE_TEXT[event.phase];
    const detail = event.detail ? `: ${event.detail}` : '';

    switch (event.status) {
      case 'starting':
        console.log(`${this.getIndent()}→ ${active}${detail}...`);
        break;
      case 'completed':
        console.log(`${this.getIndent()}  ✓ ${done}${detail}`);
        break;
      case 'failed':
        console.error(`${this.getIndent()}  ✗ ${active} failed: ${event.error ?? 'Unknown error'}`);
        break;
    }
  }

  /**
   * Print the final pass/fail line and record the result.
   */
  runSummary(result: RunResult): void {
    this.result.result = result;
    this.result.success = result.passed;

    if (this.mode === 'human') {
      const seconds = (result.durationMs / 1000).toFixed(1);
      this.newline();
      if (result.passed) {
        this.success(`Tests passed on '${result.instanceName}' in ${seconds}s`);
      } else {
        console.error(
          `${this.getIndent()}✗ Tests failed with exit code ${result.exitStatus} on '${result.instanceName}' after ${seconds}s`
        );
      }
    }
  }

  // ===========================================================================
  // Images Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const format = (cells: string[]): string =>
        cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

      console.log(`${this.getIndent()}${format(headers)}`);
      for (const row of rows) {
        console.log(`${this.getIndent()}${format(row)}`);
      }
    }
  }

  /**
   * Print the image list, marking leftover test instances.
   */
  imagesTable(images: ImageInfo[]): void {
    const outputs: ImageOutput[] = images.map((image) => ({
      name: image.name,
      source: image.source,
      state: image.state,
      diskGB: image.diskGB,
      testInstance: isTestInstanceName(image.name),
    }));
    const leftovers = outputs.filter((image) => image.testInstance).length;

    if (this.mode === 'human') {
      if (outputs.length === 0) {
        this.info('No images found.');
      } else {
        this.table(
          ['NAME', 'SOURCE', 'STATE', 'DISK', ''],
          outputs.map((image) => [
            image.name,
            image.source,
            image.state,
            image.diskGB === null ? '-' : `${image.diskGB} GB`,
            image.testInstance ? '(test instance)' : '',
          ])
        );
        this.newline();
        this.info(`${outputs.length} image${outputs.length === 1 ? '' : 's'}.`);
      }
      if (leftovers > 0) {
        this.warning(
          `${leftovers} leftover test instance${leftovers === 1 ? '' : 's'}; remove with 'tart delete <name>'.`
        );
      }
    }

    this.result.images = outputs;
    this.result.summary = { images: outputs.length, testInstances: leftovers };
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(path: string, settings: Record<string, string | number>): void {
    this.result.configPath = path;
    this.result.settings = settings;

    if (this.mode === 'human') {
      this.success(`Configuration valid: ${path}`);
      this.indent();
      for (const [key, value] of Object.entries(settings)) {
        this.info(`${key}: ${value}`);
      }
      this.dedent();
    }
  }

  /**
   * Print validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ Configuration invalid`);
      console.error();
      for (const err of errors) {
        console.error(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean; verbose?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
