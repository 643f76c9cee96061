/**
 * Daemon server
 *
 * Wires the daemon together: detach, working directory, initial state,
 * shutdown signal, command queue, background tasks and the UI loop.
 *
 * Shutdown always travels the same path. Whatever starts it (a signal, a
 * `kill` request, a failed task) ends up as `kill_server` on the queue; the
 * UI loop applies it and returns, and the remaining tasks are then closed.
 */

import { App } from '@/app/App.js';
import type { DaemonCommand } from '@/app/commands.js';
import type { ConfigLoader } from '@/app/config.js';
import { fileConfigLoader } from '@/app/config.js';
import { runUiLoop } from '@/app/uiLoop.js';
import { createQueue } from '@/channel/queue.js';
import { COMMAND_RESPONSE_TIMEOUT_MS } from '@/constants.js';
import { detach as detachProcess, nodeDetachHost, type DetachHost } from '@/daemon/detach.js';
import { DaemonStartupError } from '@/daemon/errors.js';
import { CommandServer } from '@/daemon/ipcServer.js';
import { forwardExit } from '@/daemon/lifecycle/exitForwarder.js';
import { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';
import { setupSignalHandlers, type SignalSource } from '@/daemon/lifecycle/signalHandlers.js';
import { DebounceGate } from '@/daemon/tasks/debounceGate.js';
import { ConfigWatcher } from '@/daemon/tasks/fileWatcher.js';
import { supervise, type SupervisedTask } from '@/daemon/tasks/supervisor.js';
import type { DaemonPaths } from '@/runtime/paths.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

const log = createLogger('daemon');

export interface ServerOptions {
  paths: DaemonPaths;
  /** Fork into the background first (default true) */
  detach?: boolean;
  detachHost?: DetachHost;
  signalSource?: SignalSource;
  loader?: ConfigLoader;
  /** Change the working directory (default `process.chdir`) */
  chdir?: (dir: string) => void;
  /** Reload debounce window for the config watcher */
  reloadDebounceMs?: number;
  commandTimeoutMs?: number;
  /** Called once the tasks are started, just before the UI loop runs */
  onReady?: (exitSignal: ExitSignal) => void;
}

function printBanner(paths: DaemonPaths): void {
  log.info(`widgetd ${VERSION} daemon starting (PID ${process.pid})`);
  log.info(`Config directory: ${paths.configDir}`);
  log.info(`Socket: ${paths.socketPath}`);
}

/**
 * Run the daemon until it shuts down.
 *
 * @returns Exit code for the process: SUCCESS after a clean shutdown (or in
 *   the launching process after detaching), TASK_FAILURE when a background
 *   task brought the daemon down
 * @throws DaemonStartupError for failures before the UI loop starts
 * @throws ConfigError if the initial configuration cannot be loaded
 */
export async function initializeServer(options: ServerOptions): Promise<number> {
  const { paths } = options;

  if (options.detach ?? true) {
    const role = await detachProcess(paths.logFile, options.detachHost ?? nodeDetachHost);
    if (role === 'launcher') {
      return EXIT_CODES.SUCCESS;
    }
  }

  printBanner(paths);

  const chdir = options.chdir ?? ((dir: string) => process.chdir(dir));
  try {
    chdir(paths.configDir);
  } catch (error) {
    throw new DaemonStartupError(
      `Failed to change working directory to ${paths.configDir}: ${getErrorMessage(error)}`,
      'CHDIR_FAILED',
      error
    );
  }

  const app = App.load(paths, options.loader ?? fileConfigLoader);

  const exitSignal = new ExitSignal();
  const removeSignalHandlers = setupSignalHandlers(
    exitSignal,
    options.signalSource ? { source: options.signalSource } : {}
  );

  const [sender, receiver] = createQueue<DaemonCommand>();
  const watcherSink = sender.clone();
  const serverSink = sender.clone();
  const exitSink = sender.clone();
  // Each task holds its own handle; the UI loop drains once all are gone
  sender.close();

  const watcher = new ConfigWatcher(
    paths.configDir,
    watcherSink,
    new DebounceGate(options.reloadDebounceMs)
  );
  const commandServer = new CommandServer(
    paths.socketPath,
    serverSink,
    options.commandTimeoutMs ?? COMMAND_RESPONSE_TIMEOUT_MS
  );

  const tasks: SupervisedTask[] = [
    {
      name: 'config-watcher',
      run: async () => {
        try {
          await watcher.run();
        } finally {
          watcherSink.close();
        }
      },
    },
    {
      name: 'command-server',
      run: async () => {
        try {
          await commandServer.run();
        } finally {
          serverSink.close();
        }
      },
    },
    { name: 'exit-forwarder', run: () => forwardExit(exitSignal, exitSink) },
  ];

  let shuttingDown = false;
  let taskFailure: unknown = null;
  const supervision = supervise(tasks).catch((error: unknown) => {
    if (shuttingDown) {
      log.debug(`Task ended during shutdown: ${getErrorMessage(error)}`);
      return;
    }
    taskFailure = error;
    exitSignal.signal();
  });

  options.onReady?.(exitSignal);

  try {
    await runUiLoop(receiver, app);
  } finally {
    shuttingDown = true;
    exitSignal.signal();
    // Signals arriving during teardown must still hit the idempotent handler
    try {
      await watcher.close();
      await commandServer.stop();
      await supervision;
    } finally {
      removeSignalHandlers();
    }
  }

  if (taskFailure !== null) {
    log.error(`Daemon stopped after task failure: ${getErrorMessage(taskFailure)}`);
    return EXIT_CODES.TASK_FAILURE;
  }

  log.info('Daemon stopped');
  return EXIT_CODES.SUCCESS;
}
