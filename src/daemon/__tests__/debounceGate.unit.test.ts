/**
 * DebounceGate unit tests
 *
 * Uses a fake clock so the cooldown can be stepped through deterministically.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { useFakeClock, type ClockHelper } from '@/__testutils__/index.js';
import { DebounceGate } from '@/daemon/tasks/debounceGate.js';

void describe('DebounceGate', () => {
  let clock: ClockHelper;

  beforeEach(() => {
    clock = useFakeClock();
  });

  afterEach(() => {
    clock.restore();
  });

  void it('lets exactly one caller through per cooldown window', () => {
    const gate = new DebounceGate(500);

    const results = Array.from({ length: 5 }, () => gate.tryClose());

    assert.deepEqual(results, [true, false, false, false, false]);
    assert.equal(gate.current, 'closed');
  });

  void it('reopens once the cooldown expires', () => {
    const gate = new DebounceGate(500);
    gate.tryClose();

    clock.tick(499);
    assert.equal(gate.isOpen, false);

    clock.tick(1);
    assert.equal(gate.isOpen, true);
    assert.equal(gate.tryClose(), true);
  });

  void it('does not extend the cooldown for attempts while closed', () => {
    const gate = new DebounceGate(500);
    gate.tryClose();

    clock.tick(400);
    assert.equal(gate.tryClose(), false);
    clock.tick(100);

    assert.equal(gate.isOpen, true);
  });

  void it('arms a single reopen timer per window', () => {
    const gate = new DebounceGate(500);

    gate.tryClose();
    gate.tryClose();

    assert.equal(clock.clock.getPendingTimers(), 1);
  });

  void it('cancels the pending reopen on dispose', () => {
    const gate = new DebounceGate(500);
    gate.tryClose();

    gate.dispose();

    assert.equal(gate.isOpen, true);
    assert.equal(clock.clock.getPendingTimers(), 0);
  });

  void it('rejects a negative cooldown', () => {
    assert.throws(() => new DebounceGate(-1), {
      message: 'Debounce cooldown must not be negative',
    });
  });
});
