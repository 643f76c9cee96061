/**
 * One-shot channel unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createOneshot } from '@/channel/oneshot.js';

void describe('createOneshot', () => {
  void it('delivers the value to a waiting receiver', async () => {
    const [sender, receiver] = createOneshot<string>();

    const pending = receiver.recv();
    assert.equal(sender.send('done'), true);

    assert.equal(await pending, 'done');
  });

  void it('keeps a value sent before recv()', async () => {
    const [sender, receiver] = createOneshot<string>();

    sender.send('early');

    assert.equal(await receiver.recv(), 'early');
  });

  void it('accepts only the first value', async () => {
    const [sender, receiver] = createOneshot<number>();

    assert.equal(sender.send(1), true);
    assert.equal(sender.send(2), false);

    assert.equal(await receiver.recv(), 1);
  });

  void it('resolves null when the sender closes without sending', async () => {
    const [sender, receiver] = createOneshot<number>();

    const pending = receiver.recv();
    sender.close();

    assert.equal(await pending, null);
  });

  void it('drops the value silently once the receiver is gone', () => {
    const [sender, receiver] = createOneshot<number>();

    receiver.close();

    assert.equal(sender.isReceiverClosed, true);
    assert.equal(sender.send(1), false);
  });

  void it('releases a waiting receiver that closes itself', async () => {
    const [, receiver] = createOneshot<number>();

    const pending = receiver.recv();
    receiver.close();

    assert.equal(await pending, null);
  });

  void it('can be received only once', async () => {
    const [sender, receiver] = createOneshot<number>();
    sender.send(1);

    await receiver.recv();

    await assert.rejects(receiver.recv(), { message: 'One-shot receiver already consumed' });
  });
});
