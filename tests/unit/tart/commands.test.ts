/**
 * Unit tests for tart Command Builders
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  buildCloneArgs,
  buildDeleteArgs,
  buildIpArgs,
  buildListArgs,
  buildRunArgs,
  buildStopArgs,
  buildVersionArgs,
} from '../../../src/tart/commands.js';

describe('tart command builders', () => {
  it('should list images as JSON', () => {
    assert.deepStrictEqual(buildListArgs(), ['list', '--format', 'json']);
  });

  it('should clone source to target', () => {
    assert.deepStrictEqual(buildCloneArgs('macos-base', 'macos-base-test-1'), [
      'clone',
      'macos-base',
      'macos-base-test-1',
    ]);
  });

  it('should run headless', () => {
    assert.deepStrictEqual(buildRunArgs('vm-1'), ['run', 'vm-1', '--no-graphics']);
  });

  it('should pass names as single arguments', () => {
    assert.deepStrictEqual(buildIpArgs('vm 1'), ['ip', 'vm 1']);
    assert.deepStrictEqual(buildStopArgs('vm-1'), ['stop', 'vm-1']);
    assert.deepStrictEqual(buildDeleteArgs('vm-1'), ['delete', 'vm-1']);
    assert.deepStrictEqual(buildVersionArgs(), ['--version']);
  });
});
