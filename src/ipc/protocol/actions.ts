/**
 * Client Action Schemas
 *
 * Request parameters for every action a client can ask of the daemon.
 * Requests are `<action>_request` frames; the daemon answers each with one
 * `<action>_response` frame carrying the same sessionId.
 */

type NoParams = Record<never, never>;

/**
 * Request parameters per action.
 */
export interface ActionParams {
  /** Check that the daemon is up and its UI loop is draining commands */
  ping: NoParams;
  /** Reload configuration and stylesheet */
  reload: NoParams;
  /** Shut the daemon down */
  kill: NoParams;
  /** Set variable values */
  update: { assignments: Array<[name: string, value: string]> };
  open: { window: string };
  close: { windows: string[] };
  close_all: NoParams;
  /** Print variable values */
  state: NoParams;
  /** Print defined windows, marking open ones */
  windows: NoParams;
  /** Print a debug dump of the daemon state */
  debug: NoParams;
}

export type ActionName = keyof ActionParams;

export const ACTION_NAMES: readonly ActionName[] = [
  'ping',
  'reload',
  'kill',
  'update',
  'open',
  'close',
  'close_all',
  'state',
  'windows',
  'debug',
];

/**
 * Client request message (CLI → daemon).
 */
export type ActionRequest<A extends ActionName> = {
  type: `${A}_request`;
} & {
  sessionId: string;
} & ActionParams[A];

/**
 * Union of all possible client request types.
 */
export type ActionRequestUnion = { [K in ActionName]: ActionRequest<K> }[ActionName];

/**
 * Daemon response message (daemon → CLI).
 */
export interface ActionResponse<A extends ActionName = ActionName> {
  type: `${A}_response`;
  sessionId: string;
  status: 'ok' | 'error';
  /** Text produced by the daemon (query actions) */
  output?: string;
  error?: string;
}
