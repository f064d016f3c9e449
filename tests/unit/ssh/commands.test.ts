/**
 * Unit tests for SSH Command Builders
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  buildScpArgs,
  formatScpSource,
  buildSshArgs,
  buildSshOptions,
  formatScpHost,
  type SshConnectionOptions,
} from '../../../src/ssh/commands.js';

const connection: SshConnectionOptions = { user: 'admin', port: 22, connectTimeout: 5 };

const BASE_FLAGS = [
  '-o',
  'StrictHostKeyChecking=no',
  '-o',
  'UserKnownHostsFile=/dev/null',
  '-o',
  'LogLevel=ERROR',
  '-o',
  'BatchMode=yes',
  '-o',
  'ConnectTimeout=5',
];

describe('buildSshOptions', () => {
  it('should disable host key checks and set the connect timeout', () => {
    assert.deepStrictEqual(buildSshOptions(connection), BASE_FLAGS);
  });

  it('should append extra options', () => {
    assert.deepStrictEqual(
      buildSshOptions({ ...connection, extraOptions: ['ServerAliveInterval=15'] }),
      [...BASE_FLAGS, '-o', 'ServerAliveInterval=15']
    );
  });
});

describe('formatScpHost', () => {
  it('should bracket IPv6 literals', () => {
    assert.strictEqual(formatScpHost('fe80::1'), '[fe80::1]');
    assert.strictEqual(formatScpHost('192.168.64.5'), '192.168.64.5');
  });
});

describe('buildSshArgs', () => {
  it('should pass the command as the last argument', () => {
    assert.deepStrictEqual(buildSshArgs('192.168.64.5', 'exit 0', { ...connection, port: 2222 }), [
      ...BASE_FLAGS,
      '-p',
      '2222',
      'admin@192.168.64.5',
      'exit 0',
    ]);
  });
});

describe('buildScpArgs', () => {
  it('should copy directories recursively', () => {
    assert.deepStrictEqual(
      buildScpArgs('192.168.64.5', './fixtures', '~/fixtures', { ...connection, recursive: true }),
      [...BASE_FLAGS, '-P', '22', '-r', './fixtures', 'admin@192.168.64.5:~/fixtures']
    );
  });

  it('should bracket IPv6 hosts in the target', () => {
    assert.deepStrictEqual(buildScpArgs('fe80::1', 'run.sh', '~/run.sh', connection), [
      ...BASE_FLAGS,
      '-P',
      '22',
      './run.sh',
      'admin@[fe80::1]:~/run.sh',
    ]);
  });
});

describe('formatScpSource', () => {
  it('should anchor relative paths that scp would misread', () => {
    assert.strictEqual(formatScpSource('build:1'), './build:1');
    assert.strictEqual(formatScpSource('-rf'), './-rf');
    assert.strictEqual(formatScpSource('.'), './.');
  });

  it('should leave absolute and dot-relative paths alone', () => {
    assert.strictEqual(formatScpSource('/tmp/a:b'), '/tmp/a:b');
    assert.strictEqual(formatScpSource('./fixtures'), './fixtures');
    assert.strictEqual(formatScpSource('../shared'), '../shared');
  });

  it('should be applied to the scp source argument', () => {
    const args = buildScpArgs('192.168.64.5', 'data:v2', '~/data:v2', connection);
    assert.deepStrictEqual(args.slice(-2), ['./data:v2', 'admin@192.168.64.5:~/data:v2']);
  });
});
