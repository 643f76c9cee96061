/**
 * IPC Error Detection
 *
 * Utilities for detecting IPC transport-level errors.
 */

import { IPCConnectionError } from '@/ipc/transport/IPCError.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Detect whether an error indicates the daemon socket is unavailable.
 * Checks for ENOENT (socket file doesn't exist) and ECONNREFUSED (daemon not listening).
 *
 * @example
 * ```typescript
 * try {
 *   await pingDaemon(paths.socketPath);
 * } catch (error) {
 *   if (isConnectionError(error)) {
 *     console.error('Daemon not running. Start with: widgetd daemon');
 *   }
 * }
 * ```
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof IPCConnectionError) {
    return error.isDaemonAbsent;
  }
  const message = getErrorMessage(error);
  return message.includes('ENOENT') || message.includes('ECONNREFUSED');
}
