/**
 * Unit tests for the CLI Output Layer
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import { OutputFormatter } from '../../../src/cli/output.js';
import { describeSettings } from '../../../src/cli/commands/validate.js';
import { resolveSettings } from '../../../src/config/resolver.js';
import type { RunResult } from '../../../src/core/types.js';
import { image } from '../../helpers/fakes.js';

const failedRun: RunResult = {
  exitStatus: 3,
  passed: false,
  instanceName: 'macos-base-test-1700000000000-42-0',
  retained: false,
  address: '192.168.64.5',
  durationMs: 12345,
};

describe('OutputFormatter', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('human mode', () => {
    it('should print phase progress', () => {
      const log = mock.method(console, 'log', () => {});
      const output = new OutputFormatter('run');

      output.phase({ phase: 'clone', status: 'starting', detail: 'macos-base' });
      output.phase({ phase: 'wait', status: 'completed', detail: 'admin@192.168.64.5' });

      assert.deepStrictEqual(
        log.mock.calls.map((call) => call.arguments[0]),
        ['→ Cloning base image: macos-base...', '  ✓ SSH available: admin@192.168.64.5']
      );
    });

    it('should print failed phases to stderr', () => {
      const error = mock.method(console, 'error', () => {});
      const output = new OutputFormatter('run');

      output.phase({ phase: 'copy', status: 'failed', error: 'Local path not found: ./missing' });

      assert.strictEqual(
        error.mock.calls[0]?.arguments[0],
        '  ✗ Copying files to VM failed: Local path not found: ./missing'
      );
    });

    it('should print debug lines only when verbose', () => {
      const error = mock.method(console, 'error', () => {});

      new OutputFormatter('run').debug('Waiting... (2s elapsed, IP: unknown)');
      new OutputFormatter('run', { verbose: true }).debug('Waiting... (4s elapsed, IP: unknown)');

      assert.strictEqual(error.mock.callCount(), 1);
      assert.strictEqual(error.mock.calls[0]?.arguments[0], '· Waiting... (4s elapsed, IP: unknown)');
    });

    it('should warn about leftover test instances', () => {
      mock.method(console, 'log', () => {});
      const warn = mock.method(console, 'warn', () => {});
      const output = new OutputFormatter('images');

      output.imagesTable([image('macos-base'), image('macos-base-test-1700000000000-42-0')]);

      assert.strictEqual(
        warn.mock.calls[0]?.arguments[0],
        "⚠ 1 leftover test instance; remove with 'tart delete <name>'."
      );
      assert.deepStrictEqual(output.getResult().warnings, [
        "1 leftover test instance; remove with 'tart delete <name>'.",
      ]);
    });
  });

  describe('JSON mode', () => {
    it('should collect phases and the result', () => {
      const log = mock.method(console, 'log', () => {});
      mock.method(console, 'error', () => {});
      const output = new OutputFormatter('run', { json: true });

      output.phase({ phase: 'execute', status: 'completed', detail: 'exit status 3' });
      output.warning("Keeping VM 'vm-1' (use 'tart delete vm-1' to remove)");
      output.runSummary(failedRun);

      assert.strictEqual(log.mock.callCount(), 0);
      assert.deepStrictEqual(output.getResult(), {
        success: false,
        command: 'run',
        phases: [{ phase: 'execute', status: 'completed', detail: 'exit status 3' }],
        warnings: ["Keeping VM 'vm-1' (use 'tart delete vm-1' to remove)"],
        result: failedRun,
      });
    });

    it('should mark test instances in the image list', () => {
      const output = new OutputFormatter('images', { json: true });

      output.imagesTable([image('macos-base'), image('macos-base-test-1700000000000-42-0')]);

      const result = output.getResult();
      assert.deepStrictEqual(
        result.images?.map((i) => i.testInstance),
        [false, true]
      );
      assert.deepStrictEqual(result.summary, { images: 2, testInstances: 1 });
    });

    it('should record the resolved settings on validation success', () => {
      const output = new OutputFormatter('validate', { json: true });
      const settings = resolveSettings(
        { ssh: { options: ['ServerAliveInterval=15'] } },
        '/etc/vmtrial/vmtrial.yaml',
        {},
        {}
      );

      output.validationSuccess('/etc/vmtrial/vmtrial.yaml', describeSettings(settings));

      assert.strictEqual(output.getResult().configPath, '/etc/vmtrial/vmtrial.yaml');
      assert.deepStrictEqual(output.getResult().settings, {
        user: 'admin',
        timeout: '120s',
        port: 22,
        'poll interval': '2s',
        'connect timeout': '5s',
        tart: 'tart',
        ssh: 'ssh',
        scp: 'scp',
        'ssh options': 'ServerAliveInterval=15',
      });
    });

    it('should print the collected result once on flush', () => {
      const log = mock.method(console, 'log', () => {});
      const output = new OutputFormatter('validate', { json: true });

      output.flush();

      assert.strictEqual(log.mock.callCount(), 1);
      assert.strictEqual(
        log.mock.calls[0]?.arguments[0],
        JSON.stringify({ success: true, command: 'validate' }, null, 2)
      );
    });
  });
});
