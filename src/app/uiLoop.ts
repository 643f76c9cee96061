/**
 * UI loop
 *
 * The single consumer of the command queue. Commands are applied strictly one
 * after another: the next command is not received until the previous
 * handler has returned, so application state is only ever touched here.
 */

import type { CommandHandler } from '@/app/App.js';
import type { DaemonCommand } from '@/app/commands.js';
import type { QueueReceiver } from '@/channel/queue.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('app');

/**
 * Drain the queue into the handler until the handler stops (kill command) or
 * every producer has gone away. Closes the receiver on the way out so that
 * later sends fail instead of piling up.
 */
export async function runUiLoop(
  receiver: QueueReceiver<DaemonCommand>,
  handler: CommandHandler
): Promise<void> {
  try {
    for await (const command of receiver) {
      handler.handleCommand(command);
      if (handler.isStopped) {
        break;
      }
    }
  } finally {
    receiver.close();
  }
  log.info('UI loop finished');
}
