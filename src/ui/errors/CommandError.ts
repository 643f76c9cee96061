/**
 * Structured error handling for CLI commands.
 *
 * Provides CommandError class for throwing errors with metadata and exit codes.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Metadata that can be attached to command errors.
 */
export interface ErrorMetadata {
  /** User-facing suggestion for resolving the error */
  suggestion?: string;
  /** Technical note or additional context */
  note?: string;
  /** Additional contextual key-value pairs */
  context?: Record<string, string>;
}

/**
 * Error thrown by CLI commands, carrying user-facing hints and the exit code
 * `runCommand` ends the process with.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Daemon already running for /home/me/.config/widgetd',
 *   { suggestion: 'Stop it with: widgetd kill' },
 *   EXIT_CODES.DAEMON_ALREADY_RUNNING
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
