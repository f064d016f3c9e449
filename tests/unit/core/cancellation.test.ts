/**
 * Unit tests for Cancellation Helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';

import { deadlineSignal, interruptionOf, throwIfInterrupted } from '../../../src/core/cancellation.js';
import { InterruptedError } from '../../../src/core/errors.js';

describe('interruptionOf', () => {
  it('should carry the signal name from the abort reason', () => {
    const controller = new AbortController();
    controller.abort('SIGTERM');

    assert.strictEqual(interruptionOf(controller.signal).signal, 'SIGTERM');
  });

  it('should leave the signal empty for other reasons', () => {
    const controller = new AbortController();
    controller.abort('deadline');

    assert.strictEqual(interruptionOf(controller.signal).signal, null);
  });
});

describe('throwIfInterrupted', () => {
  it('should do nothing without a signal', () => {
    assert.doesNotThrow(() => throwIfInterrupted(undefined));
  });

  it('should throw once aborted', () => {
    const controller = new AbortController();
    controller.abort('SIGINT');

    assert.throws(() => throwIfInterrupted(controller.signal), InterruptedError);
  });
});

describe('deadlineSignal', () => {
  it('should abort when the deadline passes', async () => {
    const { signal, dispose } = deadlineSignal(undefined, 1);

    await delay(20);

    assert.strictEqual(signal.aborted, true);
    assert.strictEqual(signal.reason, 'deadline');
    dispose();
  });

  it('should follow the parent signal', () => {
    const parent = new AbortController();
    const { signal, dispose } = deadlineSignal(parent.signal, 60000);

    parent.abort('SIGINT');

    assert.strictEqual(signal.aborted, true);
    assert.strictEqual(signal.reason, 'SIGINT');
    dispose();
  });

  it('should start aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort('SIGTERM');

    const { signal, dispose } = deadlineSignal(parent.signal, 60000);

    assert.strictEqual(signal.reason, 'SIGTERM');
    dispose();
  });
});
