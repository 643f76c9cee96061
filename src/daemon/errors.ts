/**
 * Daemon layer error classes.
 *
 * Provides structured error handling for startup, task and configuration errors.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all daemon-related errors.
 */
export class DaemonError extends Error {
  public readonly exitCode: number;
  public readonly code?: string;

  constructor(message: string, code?: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'DaemonError';
    this.exitCode = exitCode;
    if (code !== undefined) {
      this.code = code;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DaemonError);
    }
  }
}

/**
 * Daemon startup error.
 *
 * Thrown before the run loop starts: detach failures, an unusable config
 * directory, a watch that cannot be registered, a socket that cannot be bound.
 *
 * @example
 * ```typescript
 * throw new DaemonStartupError(
 *   'Failed to open log file /tmp/widgetd.log',
 *   'LOG_OPEN_FAILED'
 * );
 * ```
 */
export class DaemonStartupError extends DaemonError {
  public override readonly name = 'DaemonStartupError';

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, code, EXIT_CODES.DAEMON_STARTUP_FAILURE);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * A supervised task ended with an error.
 *
 * Wraps the original failure with the name of the task that produced it.
 */
export class TaskFailedError extends DaemonError {
  public override readonly name = 'TaskFailedError';
  public readonly taskName: string;

  constructor(taskName: string, cause: unknown) {
    super(
      `Task "${taskName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TASK_FAILED',
      EXIT_CODES.TASK_FAILURE
    );
    this.taskName = taskName;
    this.cause = cause;
  }
}

/**
 * Configuration error.
 *
 * Thrown when the configuration file cannot be read or parsed.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Unclosed "(" opened on line 3', 'UNBALANCED_PARENS');
 * ```
 */
export class ConfigError extends DaemonError {
  public override readonly name = 'ConfigError';

  constructor(message: string, code?: string) {
    super(message, code, EXIT_CODES.INVALID_CONFIG);
  }
}
