/**
 * Task Supervisor
 *
 * Fail-fast join over a fixed set of background tasks. Every task starts on
 * its own; the supervisor waits for all of them and gives up on the first
 * failure. Nothing is restarted: a task that ends is either the intended
 * shutdown path or an unrecoverable fault.
 */

import { TaskFailedError } from '@/daemon/errors.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('supervisor');

export interface SupervisedTask {
  /** Name used in logs and in {@link TaskFailedError} */
  name: string;
  run: () => Promise<void>;
}

function startTask(task: SupervisedTask): Promise<void> {
  log.debug(`Starting task ${task.name}`);
  // Deferred so a synchronous throw in run() becomes this task's failure
  return Promise.resolve()
    .then(() => task.run())
    .then(
      () => log.debug(`Task ${task.name} finished`),
      (error: unknown) => {
        throw new TaskFailedError(task.name, error);
      }
    );
}

/**
 * Run every task and wait for all of them.
 *
 * Remaining tasks are not cancelled on failure; the caller decides how the
 * process ends.
 *
 * @throws TaskFailedError for the first task that fails
 */
export async function supervise(tasks: readonly SupervisedTask[]): Promise<void> {
  try {
    await Promise.all(tasks.map((task) => startTask(task)));
  } catch (error) {
    log.error(`Exiting with error: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  }
}
