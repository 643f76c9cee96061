/**
 * Signal handler unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { FakeSignalSource } from '@/__testutils__/index.js';
import { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';
import { setupSignalHandlers } from '@/daemon/lifecycle/signalHandlers.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('setupSignalHandlers', () => {
  void it('installs a handler for SIGINT and SIGTERM', () => {
    const source = new FakeSignalSource();

    setupSignalHandlers(new ExitSignal(), { source });

    assert.equal(source.listenerCount('SIGINT'), 1);
    assert.equal(source.listenerCount('SIGTERM'), 1);
  });

  void it('broadcasts shutdown on SIGTERM', () => {
    const source = new FakeSignalSource();
    const exitSignal = new ExitSignal();
    setupSignalHandlers(exitSignal, { source });

    source.emit('SIGTERM');

    assert.equal(exitSignal.isSignalled, true);
  });

  void it('starts a single shutdown for repeated signals', () => {
    const source = new FakeSignalSource();
    const exitSignal = new ExitSignal();
    let broadcasts = 0;
    const original = exitSignal.signal.bind(exitSignal);
    exitSignal.signal = (): boolean => {
      broadcasts++;
      return original();
    };
    setupSignalHandlers(exitSignal, { source });

    source.emit('SIGTERM');
    source.emit('SIGTERM');
    source.emit('SIGINT');

    assert.equal(broadcasts, 1);
  });

  void it('ends the process through onFatal when the broadcast throws', () => {
    const source = new FakeSignalSource();
    const exitSignal = new ExitSignal();
    exitSignal.signal = (): boolean => {
      throw new Error('broken');
    };
    const exitCodes: number[] = [];
    setupSignalHandlers(exitSignal, { source, onFatal: (code) => exitCodes.push(code) });

    source.emit('SIGINT');

    assert.deepEqual(exitCodes, [EXIT_CODES.SIGNAL_HANDLER_ERROR]);
  });

  void it('removes its handlers again', () => {
    const source = new FakeSignalSource();
    const exitSignal = new ExitSignal();
    const remove = setupSignalHandlers(exitSignal, { source });

    remove();
    source.emit('SIGTERM');

    assert.equal(source.listenerCount('SIGTERM'), 0);
    assert.equal(exitSignal.isSignalled, false);
  });
});
