/**
 * Unit tests for Verbose Output Helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatCommand, supportsAnsi } from '../../../src/lib/verbose.js';

describe('formatCommand', () => {
  it('should fence a single line with blank lines', () => {
    assert.strictEqual(formatCommand('tart list --format json', '[tart] ', false), '\n[tart] tart list --format json\n\n');
  });

  it('should indent continuation lines to the prefix width', () => {
    assert.strictEqual(formatCommand('first\nsecond', '[ssh] ', false), '\n[ssh] first\n      second\n\n');
  });

  it('should wrap output in gray when ANSI is supported', () => {
    assert.strictEqual(formatCommand('tart ip vm', '$ ', true), '\x1b[90m\n$ tart ip vm\n\n\x1b[0m');
  });
});

describe('supportsAnsi', () => {
  it('should follow the TTY flag of the stream', () => {
    assert.strictEqual(supportsAnsi({ isTTY: true }), true);
    assert.strictEqual(supportsAnsi({ isTTY: false }), false);
    assert.strictEqual(supportsAnsi({}), false);
  });
});
