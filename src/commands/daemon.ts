import type { Command } from 'commander';

import { reportCommandError } from '@/commands/shared/CommandRunner.js';
import { resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import { initializeServer } from '@/daemon/server.js';
import { pingDaemon } from '@/ipc/client.js';
import { isConnectionError } from '@/ipc/utils/errors.js';
import type { DaemonPaths } from '@/runtime/paths.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { daemonAlreadyRunningError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('launcher');

/** How long to wait for an existing daemon to answer before starting a new one */
const ALIVE_CHECK_TIMEOUT_MS = 1000;

interface DaemonOptions {
  /** False with --no-daemonize */
  daemonize: boolean;
}

/**
 * Fail if a daemon already answers on this configuration's socket.
 *
 * A stale socket file (ECONNREFUSED) or none at all (ENOENT) means no
 * daemon; the server removes the stale file when it binds.
 *
 * @throws CommandError with DAEMON_ALREADY_RUNNING
 */
export async function ensureNoRunningDaemon(paths: DaemonPaths): Promise<void> {
  try {
    await pingDaemon(paths.socketPath, { timeoutMs: ALIVE_CHECK_TIMEOUT_MS });
  } catch (error) {
    if (isConnectionError(error)) {
      log.debug(`No daemon on ${paths.socketPath}`);
      return;
    }
    log.debug(`Alive check failed: ${getErrorMessage(error)}`);
    return;
  }

  throw new CommandError(
    daemonAlreadyRunningError(paths.configDir),
    { suggestion: 'Stop it with: widgetd kill' },
    EXIT_CODES.DAEMON_ALREADY_RUNNING
  );
}

/**
 * Register daemon command
 */
export function registerDaemonCommand(program: Command): void {
  program
    .command('daemon')
    .description('Start the daemon for the selected configuration')
    .option('--no-daemonize', 'Stay in the foreground instead of detaching')
    .action(async (options: DaemonOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      let exitCode: number;
      try {
        await ensureNoRunningDaemon(paths);
        exitCode = await initializeServer({ paths, detach: options.daemonize });
      } catch (error) {
        exitCode = reportCommandError(error, false, { configDir: paths.configDir });
      }
      process.exit(exitCode);
    });
}
