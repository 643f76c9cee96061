/**
 * Task supervisor unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { TaskFailedError } from '@/daemon/errors.js';
import { supervise } from '@/daemon/tasks/supervisor.js';

void describe('supervise', () => {
  void it('resolves once every task has finished', async () => {
    const finished: string[] = [];

    await supervise([
      {
        name: 'slow',
        run: async () => {
          await new Promise((resolve) => setTimeout(resolve, 20));
          finished.push('slow');
        },
      },
      {
        name: 'fast',
        run: () => {
          finished.push('fast');
          return Promise.resolve();
        },
      },
    ]);

    assert.deepEqual(finished, ['fast', 'slow']);
  });

  void it('resolves immediately for an empty task list', async () => {
    await supervise([]);
  });

  void it('fails fast with the name of the failing task', async () => {
    let releaseSlow: () => void = () => {};
    const slow = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });

    await assert.rejects(
      supervise([
        { name: 'waiting', run: () => slow },
        { name: 'command-server', run: () => Promise.reject(new Error('EADDRINUSE')) },
      ]),
      (error: unknown) => {
        assert.ok(error instanceof TaskFailedError);
        assert.equal(error.taskName, 'command-server');
        assert.equal(error.message, 'Task "command-server" failed: EADDRINUSE');
        return true;
      }
    );

    releaseSlow();
  });

  void it('treats a synchronous throw in run() as that task failing', async () => {
    await assert.rejects(
      supervise([
        {
          name: 'broken',
          run: () => {
            throw new Error('boom');
          },
        },
      ]),
      { name: 'TaskFailedError', message: 'Task "broken" failed: boom' }
    );
  });
});
