/**
 * IPC Client
 *
 * Public API for talking to a running daemon over its Unix socket.
 * Every function takes the socket path of the daemon to address, so one
 * CLI can reach daemons of different configurations.
 */

import type {
  ActionName,
  ActionParams,
  ActionRequest,
  ActionResponse,
} from './protocol/index.js';

import { sendRequest, type SendOptions } from './transport/index.js';
import { withSession } from './utils/index.js';

/**
 * Build a request frame for an action with a fresh session ID.
 */
export function buildRequest<A extends ActionName>(
  action: A,
  params: ActionParams[A]
): ActionRequest<A> {
  const type: `${A}_request` = `${action}_request`;
  return withSession({ ...params, type });
}

/**
 * Send one action to the daemon and return its response.
 *
 * @throws IPCError subclasses for transport failures; an `error` status is
 *   returned, not thrown
 */
export async function requestAction<A extends ActionName>(
  socketPath: string,
  action: A,
  params: ActionParams[A],
  options?: SendOptions
): Promise<ActionResponse> {
  return sendRequest(socketPath, action, buildRequest(action, params), options);
}

/**
 * Check that the daemon is running and its UI loop is draining commands.
 *
 * @example
 * ```typescript
 * const response = await pingDaemon(paths.socketPath);
 * console.log(response.output); // 'pong'
 * ```
 */
export async function pingDaemon(
  socketPath: string,
  options?: SendOptions
): Promise<ActionResponse> {
  return requestAction(socketPath, 'ping', {}, options);
}

/**
 * Ask the daemon to reload its configuration and stylesheet.
 * Resolves once the reload has been applied (or has failed).
 */
export async function reloadConfig(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'reload', {});
}

/**
 * Ask the daemon to shut down. Resolves once the request is queued.
 */
export async function killDaemon(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'kill', {});
}

export async function updateVars(
  socketPath: string,
  assignments: Array<[name: string, value: string]>
): Promise<ActionResponse> {
  return requestAction(socketPath, 'update', { assignments });
}

export async function openWindow(socketPath: string, window: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'open', { window });
}

export async function closeWindows(
  socketPath: string,
  windows: string[]
): Promise<ActionResponse> {
  return requestAction(socketPath, 'close', { windows });
}

export async function closeAllWindows(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'close_all', {});
}

/**
 * Current variable values, one `name: value` per line.
 */
export async function getState(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'state', {});
}

/**
 * Defined windows in definition order, open ones prefixed with `*`.
 */
export async function getWindows(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'windows', {});
}

export async function getDebugInfo(socketPath: string): Promise<ActionResponse> {
  return requestAction(socketPath, 'debug', {});
}
