/**
 * UI loop unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { CommandHandler } from '@/app/App.js';
import type { DaemonCommand, DaemonCommandKind } from '@/app/commands.js';
import { runUiLoop } from '@/app/uiLoop.js';
import { createQueue } from '@/channel/queue.js';

/**
 * Records the commands it sees and stops on kill_server.
 */
class RecordingHandler implements CommandHandler {
  readonly handled: DaemonCommandKind[] = [];
  private stopped = false;

  handleCommand(command: DaemonCommand): void {
    this.handled.push(command.kind);
    if (command.kind === 'kill_server') {
      this.stopped = true;
    }
  }

  get isStopped(): boolean {
    return this.stopped;
  }
}

void describe('runUiLoop', () => {
  void it('applies commands in order and stops at kill_server', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const handler = new RecordingHandler();

    sender.send({ kind: 'noop' });
    sender.send({ kind: 'close_all' });
    sender.send({ kind: 'kill_server' });
    sender.send({ kind: 'noop' });

    await runUiLoop(receiver, handler);

    assert.deepEqual(handler.handled, ['noop', 'close_all', 'kill_server']);
  });

  void it('closes the queue on the way out so later sends fail', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    sender.send({ kind: 'kill_server' });

    await runUiLoop(receiver, new RecordingHandler());

    assert.equal(sender.isReceiverClosed, true);
    assert.throws(() => sender.send({ kind: 'noop' }), { name: 'QueueClosedError' });
  });

  void it('ends when every producer has gone away', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const handler = new RecordingHandler();

    const running = runUiLoop(receiver, handler);
    sender.send({ kind: 'noop' });
    sender.close();
    await running;

    assert.deepEqual(handler.handled, ['noop']);
  });

  void it('waits for commands that arrive later', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const handler = new RecordingHandler();

    const running = runUiLoop(receiver, handler);
    await new Promise((resolve) => setTimeout(resolve, 10));
    assert.deepEqual(handler.handled, []);

    sender.send({ kind: 'kill_server' });
    await running;

    assert.deepEqual(handler.handled, ['kill_server']);
  });

  void it('never applies two commands at once with several producers', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const producers = ['a', 'b', 'c'].map((name) => ({ name, sink: sender.clone() }));
    sender.close();

    const applied: string[] = [];
    let applying = false;
    let overlapped = false;
    const handler: CommandHandler = {
      handleCommand(command: DaemonCommand): void {
        if (applying) {
          overlapped = true;
        }
        applying = true;
        if (command.kind === 'update_vars') {
          for (const [producer, seq] of command.assignments) {
            applied.push(`${producer}${seq}`);
          }
        }
        applying = false;
      },
      isStopped: false,
    };

    const running = runUiLoop(receiver, handler);

    await Promise.all(
      producers.map(async ({ name, sink }) => {
        for (let seq = 0; seq < 5; seq++) {
          sink.send({ kind: 'update_vars', assignments: [[name, String(seq)]] });
          await new Promise((resolve) => setImmediate(resolve));
        }
      })
    );
    for (const { sink } of producers) {
      sink.close();
    }
    await running;

    assert.equal(overlapped, false);
    assert.equal(applied.length, 15);
    for (const name of ['a', 'b', 'c']) {
      assert.deepEqual(
        applied.filter((entry) => entry.startsWith(name)),
        [0, 1, 2, 3, 4].map((seq) => `${name}${seq}`)
      );
    }
  });
});
