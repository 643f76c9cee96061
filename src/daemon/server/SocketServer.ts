import { mkdirSync, unlinkSync } from 'node:fs';
import { createServer, type Server, type Socket } from 'node:net';
import { dirname } from 'node:path';

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage, isErrnoException } from '@/utils/errors.js';

export type ConnectionHandler = (socket: Socket) => void;

/**
 * Thin wrapper around Node's net.Server that centralizes socket lifecycle
 * management (setup, connection tracking, teardown).
 */
export class SocketServer {
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private socketPath: string | null = null;
  private readonly log = createLogger('server');

  /**
   * Start listening on the provided Unix domain socket path.
   *
   * @param onError - Called for server errors after listening started
   */
  async start(
    socketPath: string,
    handler: ConnectionHandler,
    onError?: (error: Error) => void
  ): Promise<void> {
    this.socketPath = socketPath;
    mkdirSync(dirname(socketPath), { recursive: true });
    this.cleanupStaleSocket();

    const server = createServer((socket: Socket) => {
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      handler(socket);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (error: Error): void => {
        this.log.error(`Socket server error: ${error.message}`);
        reject(error);
      };
      server.once('error', onStartupError);

      server.listen(socketPath, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          this.log.error(`Socket server error: ${error.message}`);
          onError?.(error);
        });
        this.log.info(`IPC server listening on ${socketPath}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server and clean up the socket file.
   */
  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const server = this.server;
    if (server) {
      this.server = null;
      await new Promise<void>((resolve) => {
        server.close(() => {
          this.log.info('IPC server stopped');
          resolve();
        });
      });
    }

    this.cleanupStaleSocket();
    this.socketPath = null;
  }

  private cleanupStaleSocket(): void {
    if (!this.socketPath) {
      return;
    }

    try {
      unlinkSync(this.socketPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      this.log.debug(`Failed to remove socket file: ${getErrorMessage(error)}`);
    }
  }
}
