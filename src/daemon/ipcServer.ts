/**
 * Daemon IPC Server
 *
 * The command-server task. Accepts JSONL requests on the daemon's Unix
 * socket and turns each valid one into exactly one {@link DaemonCommand} on
 * the command queue. Requests that need an answer carry a one-shot responder
 * and the reply is written back once the UI loop has applied the command.
 */

import type { Socket } from 'node:net';

import { createOneshot, type OneshotReceiver } from '@/channel/oneshot.js';
import { QueueClosedError } from '@/channel/queue.js';
import {
  failure,
  success,
  type CommandSink,
  type DaemonCommand,
  type DaemonResponse,
  type Responder,
} from '@/app/commands.js';
import { COMMAND_RESPONSE_TIMEOUT_MS } from '@/constants.js';
import { SocketServer } from '@/daemon/server/SocketServer.js';
import {
  JSONLBuffer,
  parseActionRequest,
  parseJSONLFrame,
  toJSONLFrame,
  type ActionName,
  type ActionRequestUnion,
  type ActionResponse,
} from '@/ipc/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('server');

export const SHUTTING_DOWN_MESSAGE = 'Daemon is shutting down';

function toActionResponse(
  action: ActionName,
  sessionId: string,
  result: DaemonResponse
): ActionResponse {
  const type: `${ActionName}_response` = `${action}_response`;
  if (result.kind === 'success') {
    return result.payload
      ? { type, sessionId, status: 'ok', output: result.payload }
      : { type, sessionId, status: 'ok' };
  }
  return { type, sessionId, status: 'error', error: result.message };
}

function actionOf(request: ActionRequestUnion): ActionName {
  switch (request.type) {
    case 'ping_request':
      return 'ping';
    case 'reload_request':
      return 'reload';
    case 'kill_request':
      return 'kill';
    case 'update_request':
      return 'update';
    case 'open_request':
      return 'open';
    case 'close_request':
      return 'close';
    case 'close_all_request':
      return 'close_all';
    case 'state_request':
      return 'state';
    case 'windows_request':
      return 'windows';
    case 'debug_request':
      return 'debug';
  }
}

/**
 * Unix socket server feeding the command queue.
 */
export class CommandServer {
  private readonly socketServer = new SocketServer();
  private readonly awaiting = new Set<OneshotReceiver<DaemonResponse>>();
  private stopRequested = false;
  private settle: ((error?: Error) => void) | null = null;

  constructor(
    private readonly socketPath: string,
    private readonly sink: CommandSink,
    private readonly responseTimeoutMs: number = COMMAND_RESPONSE_TIMEOUT_MS
  ) {}

  /**
   * Serve until {@link stop} is called.
   *
   * @throws Error when the socket cannot be bound, or the server fails later
   */
  async run(): Promise<void> {
    const finished = new Promise<void>((resolve, reject) => {
      this.settle = (error?: Error): void => {
        this.settle = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };
    });

    try {
      await this.socketServer.start(
        this.socketPath,
        (socket) => this.handleConnection(socket),
        (error) => {
          void this.socketServer.stop().finally(() => this.settle?.(error));
        }
      );
    } catch (error) {
      this.settle = null;
      throw error;
    }

    if (this.stopRequested) {
      // stop() raced the bind; the listener it missed is closed here
      await this.socketServer.stop();
    }

    await finished;
    log.debug('Command server finished');
  }

  /**
   * Close the socket, drop connected clients and let {@link run} resolve.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    for (const response of this.awaiting) {
      response.close();
    }
    this.awaiting.clear();
    await this.socketServer.stop();
    this.settle?.();
  }

  /** Requests waiting for the UI loop to answer */
  get pendingResponses(): number {
    return this.awaiting.size;
  }

  private handleConnection(socket: Socket): void {
    log.debug('Client connected');
    const buffer = new JSONLBuffer();
    socket.setEncoding('utf8');

    socket.on('data', (chunk: string) => {
      for (const line of buffer.process(chunk)) {
        void this.handleMessage(socket, line);
      }
    });

    socket.on('end', () => {
      log.debug('Client disconnected');
    });

    socket.on('error', (err) => {
      log.debug(`Client socket error: ${err.message}`);
    });
  }

  private async handleMessage(socket: Socket, line: string): Promise<void> {
    let frame: unknown;
    try {
      frame = parseJSONLFrame(line);
    } catch (error) {
      log.warn(`Dropping malformed frame: ${getErrorMessage(error)}`);
      return;
    }

    const parsed = parseActionRequest(frame);
    if (!parsed.ok) {
      if (parsed.sessionId === undefined) {
        log.warn(`Dropping invalid request: ${parsed.error}`);
        return;
      }
      log.warn(`Rejecting invalid request: ${parsed.error}`);
      this.write(socket, {
        type: 'error_response',
        sessionId: parsed.sessionId,
        status: 'error',
        error: parsed.error,
      });
      return;
    }

    const request = parsed.request;
    const action = actionOf(request);
    log.debug(`${action} request received`);

    const result = await this.dispatch(request);
    this.write(socket, toActionResponse(action, request.sessionId, result));
  }

  /**
   * Enqueue the command for one request and produce its answer.
   */
  private async dispatch(request: ActionRequestUnion): Promise<DaemonResponse> {
    try {
      switch (request.type) {
        case 'ping_request':
          this.sink.send({ kind: 'noop' });
          return success('pong');
        case 'kill_request':
          this.sink.send({ kind: 'kill_server' });
          return success();
        case 'update_request':
          this.sink.send({ kind: 'update_vars', assignments: request.assignments });
          return success();
        case 'close_all_request':
          this.sink.send({ kind: 'close_all' });
          return success();
        case 'reload_request':
          return await this.ask((responder) => ({ kind: 'reload_config_and_css', responder }));
        case 'open_request': {
          const { window } = request;
          return await this.ask((responder) => ({ kind: 'open_window', window, responder }));
        }
        case 'close_request': {
          const { windows } = request;
          return await this.ask((responder) => ({ kind: 'close_windows', windows, responder }));
        }
        case 'state_request':
          return await this.ask((responder) => ({ kind: 'print_state', responder }));
        case 'windows_request':
          return await this.ask((responder) => ({ kind: 'print_windows', responder }));
        case 'debug_request':
          return await this.ask((responder) => ({ kind: 'print_debug', responder }));
      }
    } catch (error) {
      if (error instanceof QueueClosedError) {
        return failure(SHUTTING_DOWN_MESSAGE);
      }
      log.error(`Failed to enqueue command: ${getErrorMessage(error)}`);
      return failure(getErrorMessage(error));
    }
  }

  /**
   * Send a command carrying a fresh responder and wait for the UI loop's
   * answer, up to the response timeout.
   */
  private async ask(build: (responder: Responder) => DaemonCommand): Promise<DaemonResponse> {
    const [responder, response] = createOneshot<DaemonResponse>();
    this.sink.send(build(responder));
    this.awaiting.add(response);

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.responseTimeoutMs);
      timer.unref?.();
    });

    try {
      const result = await Promise.race([response.recv(), timedOut]);
      if (result === 'timeout') {
        response.close();
        return failure(`No response from the daemon within ${this.responseTimeoutMs}ms`);
      }
      if (result === null && this.stopRequested) {
        return failure(SHUTTING_DOWN_MESSAGE);
      }
      return result ?? failure('Daemon dropped the request without responding');
    } finally {
      clearTimeout(timer);
      this.awaiting.delete(response);
    }
  }

  private write(socket: Socket, response: ActionResponse | ErrorFrame): void {
    if (socket.destroyed) {
      log.debug(`Client went away before ${response.type}`);
      return;
    }
    socket.write(toJSONLFrame(response));
  }
}

interface ErrorFrame {
  type: 'error_response';
  sessionId: string;
  status: 'error';
  error: string;
}
