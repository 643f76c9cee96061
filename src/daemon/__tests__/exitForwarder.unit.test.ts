/**
 * Exit forwarder unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { DaemonCommand } from '@/app/commands.js';
import { createQueue } from '@/channel/queue.js';
import { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';
import { forwardExit } from '@/daemon/lifecycle/exitForwarder.js';

void describe('forwardExit', () => {
  void it('sends a single kill_server once shutdown is signalled', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const exitSignal = new ExitSignal();

    const forwarding = forwardExit(exitSignal, sender);
    assert.equal(receiver.size, 0);

    exitSignal.signal();
    await forwarding;

    assert.deepEqual(await receiver.recv(), { kind: 'kill_server' });
    // Its sender handle is closed afterwards, so the queue ends
    assert.equal(await receiver.recv(), null);
  });

  void it('finishes quietly when the UI loop has already stopped', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const exitSignal = new ExitSignal();
    receiver.close();

    exitSignal.signal();

    await forwardExit(exitSignal, sender);
    assert.equal(sender.isReceiverClosed, true);
  });
});
