/**
 * Daemonizer
 *
 * Detaches the daemon from the controlling terminal before anything else
 * allocates resources. Node has no fork(), so the process re-launches itself
 * as a detached session leader with the same arguments, marked through the
 * environment; the parent exits with status 0 once the child is running and
 * the child carries on as the daemon.
 *
 * Output redirection follows the descriptors of the launching process:
 * stdout/stderr that are terminals are pointed at the log file (opened in
 * append mode), anything already redirected by the caller is passed through
 * untouched.
 */

import { spawn } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import { dirname } from 'path';
import { isatty } from 'tty';

import { DAEMON_CHILD_ENV_VALUE, DAEMON_CHILD_ENV_VAR } from '@/constants.js';
import { DaemonStartupError } from '@/daemon/errors.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('launcher');

export const STDOUT_FD = 1;
export const STDERR_FD = 2;

/**
 * Where a standard stream of the daemon should go.
 * - 'log': the log file
 * - 'inherit': whatever the launching process already had
 */
export type StreamTarget = 'log' | 'inherit';

export interface StdioPlan {
  stdout: StreamTarget;
  stderr: StreamTarget;
}

/**
 * Decide which standard streams to redirect, from the descriptor numbers alone.
 *
 * @param isTerminal - Whether a descriptor is attached to a terminal
 */
export function planStdioRedirect(isTerminal: (fd: number) => boolean): StdioPlan {
  return {
    stdout: isTerminal(STDOUT_FD) ? 'log' : 'inherit',
    stderr: isTerminal(STDERR_FD) ? 'log' : 'inherit',
  };
}

/**
 * Build the child's stdio array for a plan. stdin is always detached.
 */
export function toSpawnStdio(
  plan: StdioPlan,
  logFd: number
): ['ignore', number | 'inherit', number | 'inherit'] {
  return [
    'ignore',
    plan.stdout === 'log' ? logFd : 'inherit',
    plan.stderr === 'log' ? logFd : 'inherit',
  ];
}

/**
 * The part of a spawned child the daemonizer needs.
 */
export interface SpawnedProcess {
  readonly pid?: number | undefined;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  unref(): void;
}

/**
 * Process-level effects of detaching. Replaced wholesale in tests.
 */
export interface DetachHost {
  isDaemonChild(): boolean;
  isTerminal(fd: number): boolean;
  /** Open (creating if absent) for appending; returns the descriptor */
  openLog(logPath: string): number;
  closeFd(fd: number): void;
  spawnDetached(stdio: ['ignore', number | 'inherit', number | 'inherit']): SpawnedProcess;
  exit(code: number): void;
}

export const nodeDetachHost: DetachHost = {
  isDaemonChild: () => process.env[DAEMON_CHILD_ENV_VAR] === DAEMON_CHILD_ENV_VALUE,
  isTerminal: (fd) => isatty(fd),
  openLog: (logPath) => {
    mkdirSync(dirname(logPath), { recursive: true });
    return openSync(logPath, 'a');
  },
  closeFd: (fd) => closeSync(fd),
  spawnDetached: (stdio) =>
    spawn(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
      detached: true,
      stdio,
      env: { ...process.env, [DAEMON_CHILD_ENV_VAR]: DAEMON_CHILD_ENV_VALUE },
    }),
  exit: (code) => process.exit(code),
};

function waitForSpawn(child: SpawnedProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (error) => reject(error));
  });
}

/**
 * Which side of the detach the caller is on.
 */
export type DetachRole = 'launcher' | 'daemon';

/**
 * Detach from the terminal, redirecting terminal output to `logPath`.
 *
 * In the launching process the host exits with status 0 once the detached
 * child is running, so 'launcher' is only ever seen with a stubbed host. In
 * the detached child it returns 'daemon' immediately.
 *
 * @throws DaemonStartupError if the log file cannot be opened or the child
 *   cannot be started; nothing is left running in that case
 */
export async function detach(
  logPath: string,
  host: DetachHost = nodeDetachHost
): Promise<DetachRole> {
  if (host.isDaemonChild()) {
    log.debug('Running as detached daemon process');
    return 'daemon';
  }

  let logFd: number;
  try {
    logFd = host.openLog(logPath);
  } catch (error) {
    throw new DaemonStartupError(
      `Error opening log file (${logPath}) for writing: ${getErrorMessage(error)}`,
      'LOG_OPEN_FAILED',
      error
    );
  }

  const plan = planStdioRedirect((fd) => host.isTerminal(fd));
  log.debug(`Detaching (stdout → ${plan.stdout}, stderr → ${plan.stderr})`);

  try {
    const child = host.spawnDetached(toSpawnStdio(plan, logFd));
    await waitForSpawn(child);
    child.unref();
    log.debug(`Daemon process started (PID ${child.pid ?? 'unknown'})`);
  } catch (error) {
    throw new DaemonStartupError(
      `Failed to detach daemon process: ${getErrorMessage(error)}`,
      'DETACH_FAILED',
      error
    );
  } finally {
    host.closeFd(logFd);
  }

  host.exit(0);
  return 'launcher';
}
