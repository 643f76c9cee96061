/**
 * Failures of a single client request to the daemon.
 *
 * Every class carries the exit code the CLI ends with, so command handlers
 * can rethrow transport errors without mapping them.
 */

import { getErrorMessage, isErrnoException } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

export class IPCError extends Error {
  readonly exitCode: number;

  constructor(
    message: string,
    exitCode: number = EXIT_CODES.SOFTWARE_ERROR,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/**
 * The socket could not be reached. `code` is the errno name when there is one.
 */
export class IPCConnectionError extends IPCError {
  constructor(
    message: string,
    readonly socketPath: string,
    readonly code?: string
  ) {
    super(message, EXIT_CODES.RESOURCE_NOT_FOUND);
  }

  /**
   * Wrap a socket error raised while sending `action`.
   *
   * @example
   * IPC ping connection error | Socket: /run/user/1000/widgetd_3f2a.sock | Code: ENOENT | Details: connect ENOENT ...
   */
  static fromSocketError(action: string, socketPath: string, error: Error): IPCConnectionError {
    const code = isErrnoException(error) ? error.code : undefined;
    const parts = [`IPC ${action} connection error`, `Socket: ${socketPath}`];
    if (code) {
      parts.push(`Code: ${code}`);
    }
    parts.push(`Details: ${error.message}`);
    return new IPCConnectionError(parts.join(' | '), socketPath, code);
  }

  /** True when nothing is listening: the socket file is gone or refuses. */
  get isDaemonAbsent(): boolean {
    return this.code === 'ENOENT' || this.code === 'ECONNREFUSED';
  }
}

export class IPCTimeoutError extends IPCError {
  constructor(
    readonly action: string,
    readonly timeoutMs: number
  ) {
    super(`${action} request timeout after ${timeoutMs / 1000}s`, EXIT_CODES.IPC_TIMEOUT);
  }
}

/**
 * A response frame that is not JSON, not a response, or answers another request.
 */
export class IPCParseError extends IPCError {
  constructor(
    readonly action: string,
    detail: string,
    cause?: Error
  ) {
    super(
      `Failed to parse ${action} response: ${detail}`,
      EXIT_CODES.SOFTWARE_ERROR,
      cause ? { cause } : undefined
    );
  }

  static from(action: string, error: unknown): IPCParseError {
    if (error instanceof IPCParseError) {
      return error;
    }
    return new IPCParseError(
      action,
      getErrorMessage(error),
      error instanceof Error ? error : undefined
    );
  }
}

/** The daemon hung up before answering, usually because it is shutting down. */
export class IPCEarlyCloseError extends IPCError {
  constructor(readonly action: string) {
    super(`Connection closed before ${action} response received`);
  }
}
