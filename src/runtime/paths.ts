/**
 * Daemon path resolution.
 *
 * Single source of truth for the configuration directory, the files inside
 * it, the IPC socket and the log file. Socket and log names carry a short
 * hash of the configuration directory so that one daemon runs per
 * configuration.
 */

import { createHash } from 'crypto';
import * as os from 'os';
import * as path from 'path';

import {
  CONFIG_FILE_NAME,
  RUNTIME_DIR_OVERRIDE_ENV,
  STYLESHEET_FILE_NAME,
  APP_NAME,
} from '@/constants.js';

export interface DaemonPaths {
  configDir: string;
  yuckPath: string;
  scssPath: string;
  socketPath: string;
  logFile: string;
}

function nonEmptyEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Default configuration directory: $XDG_CONFIG_HOME/widgetd or ~/.config/widgetd.
 */
export function getDefaultConfigDir(): string {
  const xdgConfig = nonEmptyEnv('XDG_CONFIG_HOME');
  return path.join(xdgConfig ?? path.join(os.homedir(), '.config'), APP_NAME);
}

/**
 * Directory holding the IPC socket.
 *
 * Uses os.homedir()/os.tmpdir() dynamically to support test environment changes.
 */
export function getRuntimeDir(): string {
  return nonEmptyEnv(RUNTIME_DIR_OVERRIDE_ENV) ?? nonEmptyEnv('XDG_RUNTIME_DIR') ?? os.tmpdir();
}

/**
 * Directory holding the daemon log file.
 */
export function getCacheDir(): string {
  return nonEmptyEnv('XDG_CACHE_HOME') ?? path.join(os.homedir(), '.cache');
}

/**
 * Short stable hash identifying a configuration directory.
 *
 * @example
 * ```typescript
 * configDirHash('/home/user/.config/widgetd') // → 8 hex characters
 * ```
 */
export function configDirHash(configDir: string): string {
  return createHash('sha256').update(configDir).digest('hex').slice(0, 8);
}

/**
 * Resolve every daemon path for a configuration directory.
 *
 * @param configDir - Configuration directory; relative paths resolve against
 *   the current directory. Defaults to {@link getDefaultConfigDir}.
 */
export function resolveDaemonPaths(configDir?: string): DaemonPaths {
  const dir = path.resolve(configDir ?? getDefaultConfigDir());
  const hash = configDirHash(dir);

  return {
    configDir: dir,
    yuckPath: path.join(dir, CONFIG_FILE_NAME),
    scssPath: path.join(dir, STYLESHEET_FILE_NAME),
    socketPath: path.join(getRuntimeDir(), `${APP_NAME}-server_${hash}.sock`),
    logFile: path.join(getCacheDir(), `${APP_NAME}_${hash}.log`),
  };
}
