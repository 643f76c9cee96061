/**
 * Exit Forwarder task
 *
 * Turns the shutdown broadcast into a kill command on the UI queue, so every
 * shutdown path (signal, task failure) ends the same way a `kill` request
 * does.
 */

import type { CommandSink } from '@/app/commands.js';
import { QueueClosedError } from '@/channel/queue.js';
import type { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('lifecycle');

/**
 * Wait for shutdown, then send `kill_server` once. A queue that is already
 * closed is logged and otherwise ignored.
 */
export async function forwardExit(exitSignal: ExitSignal, sink: CommandSink): Promise<void> {
  await exitSignal.wait();
  log.info('Forward task received exit event');

  try {
    sink.send({ kind: 'kill_server' });
  } catch (error) {
    if (error instanceof QueueClosedError) {
      log.debug('UI loop already stopped, nothing to forward');
    } else {
      log.warn(`Failed to forward exit to UI loop: ${getErrorMessage(error)}`);
    }
  } finally {
    sink.close();
  }
}
