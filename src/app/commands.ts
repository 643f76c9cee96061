/**
 * Daemon commands
 *
 * The only values that cross from background tasks (config watcher, command
 * server, exit forwarder) into the UI loop. Commands that expect an answer
 * carry a one-shot {@link Responder}.
 */

import type { OneshotSender } from '@/channel/oneshot.js';
import type { QueueSender } from '@/channel/queue.js';

/**
 * Answer to a command, delivered once over the command's responder.
 */
export type DaemonResponse =
  | { kind: 'success'; payload: string }
  | { kind: 'failure'; message: string };

export type Responder = OneshotSender<DaemonResponse>;

export type DaemonCommand =
  | { kind: 'noop' }
  | { kind: 'update_vars'; assignments: Array<[name: string, value: string]> }
  | { kind: 'reload_config_and_css'; responder: Responder }
  | { kind: 'open_window'; window: string; responder: Responder }
  | { kind: 'close_windows'; windows: string[]; responder: Responder }
  | { kind: 'close_all' }
  | { kind: 'print_state'; responder: Responder }
  | { kind: 'print_windows'; responder: Responder }
  | { kind: 'print_debug'; responder: Responder }
  | { kind: 'kill_server' };

export type DaemonCommandKind = DaemonCommand['kind'];

/**
 * Producer-side handle on the command queue.
 */
export type CommandSink = QueueSender<DaemonCommand>;

export function success(payload = ''): DaemonResponse {
  return { kind: 'success', payload };
}

export function failure(message: string): DaemonResponse {
  return { kind: 'failure', message };
}
