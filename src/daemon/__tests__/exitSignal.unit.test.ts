/**
 * ExitSignal unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';

void describe('ExitSignal', () => {
  void it('starts unsignalled', () => {
    const exitSignal = new ExitSignal();

    assert.equal(exitSignal.isSignalled, false);
  });

  void it('releases every waiter on signal', async () => {
    const exitSignal = new ExitSignal();
    const released: string[] = [];

    const first = exitSignal.wait().then(() => released.push('first'));
    const second = exitSignal.wait().then(() => released.push('second'));
    exitSignal.signal();
    await Promise.all([first, second]);

    assert.deepEqual(released, ['first', 'second']);
  });

  void it('resolves wait() immediately once signalled', async () => {
    const exitSignal = new ExitSignal();
    exitSignal.signal();

    await exitSignal.wait();

    assert.equal(exitSignal.isSignalled, true);
  });

  void it('reports only the first signal() as the broadcast', () => {
    const exitSignal = new ExitSignal();

    assert.equal(exitSignal.signal(), true);
    assert.equal(exitSignal.signal(), false);
    assert.equal(exitSignal.isSignalled, true);
  });
});
