/**
 * IPC Transport Layer
 *
 * Handles Unix domain socket communication with JSONL protocol.
 */

import { connect } from 'net';

import type { ActionName, ActionRequest, ActionResponse } from '@/ipc/protocol/index.js';

import { getIPCRequestTimeout } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

import {
  IPCConnectionError,
  IPCEarlyCloseError,
  IPCParseError,
  IPCTimeoutError,
} from './IPCError.js';
import { JSONLBuffer, parseJSONLFrame, toJSONLFrame } from './jsonl.js';
import { assertActionResponse, validateResponseType, validateSessionId } from './validation.js';

const log = createLogger('client');

export interface SendOptions {
  /** Overrides the `WIDGETD_IPC_TIMEOUT_MS` / default request timeout */
  timeoutMs?: number;
}

/**
 * Send one request to the daemon and wait for its response.
 *
 * One connection per request: the first complete frame settles the call and
 * the socket is destroyed. Anything after that frame is ignored.
 *
 * @throws IPCConnectionError when the daemon is not listening
 * @throws IPCTimeoutError when no response arrives in time
 * @throws IPCParseError for malformed or mismatched responses
 * @throws IPCEarlyCloseError when the daemon hangs up first
 */
export function sendRequest<A extends ActionName>(
  socketPath: string,
  action: A,
  request: ActionRequest<A>,
  options: SendOptions = {}
): Promise<ActionResponse> {
  const timeoutMs = options.timeoutMs ?? getIPCRequestTimeout();
  const expectedType = `${action}_response`;

  return new Promise((resolve, reject) => {
    const frames = new JSONLBuffer();
    const socket = connect(socketPath);
    let settled = false;

    const settle = (outcome: ActionResponse | Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      if (outcome instanceof Error) {
        reject(outcome);
      } else {
        resolve(outcome);
      }
    };

    const timer = setTimeout(() => settle(new IPCTimeoutError(action, timeoutMs)), timeoutMs);

    socket.setEncoding('utf8');
    socket.setNoDelay(true);

    socket.once('connect', () => {
      socket.write(toJSONLFrame(request));
      log.debug(`${action} request sent`);
    });

    socket.on('data', (chunk: string) => {
      const [line] = frames.process(chunk);
      if (line === undefined) return;
      try {
        const response = assertActionResponse(parseJSONLFrame(line), action);
        validateSessionId(request, response, action);
        validateResponseType(response, expectedType, action);
        log.debug(`${action} response received`);
        settle(response);
      } catch (error) {
        settle(IPCParseError.from(action, error));
      }
    });

    socket.once('error', (error) => {
      settle(IPCConnectionError.fromSocketError(action, socketPath, error));
    });

    // 'close' follows both a remote end and a local error, so it alone detects hang-ups
    socket.once('close', () => settle(new IPCEarlyCloseError(action)));
  });
}

export * from './IPCError.js';
