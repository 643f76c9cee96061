/**
 * Semantic exit codes for script-friendly error handling.
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing resources, conflicts)
 * - **100-119**: Software errors (startup failures, task crashes, timeouts)
 *
 * Values are stable: scripts may check specific codes (e.g. 83 for
 * "daemon not running") or the ranges.
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99): Issues caused by user input or environment

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Requested resource not found (daemon, window, config file) */
  RESOURCE_NOT_FOUND: 83,

  /** Daemon already running for this configuration */
  DAEMON_ALREADY_RUNNING: 86,

  /** Configuration file could not be parsed */
  INVALID_CONFIG: 87,

  // Software Errors (100-119): Internal failures or integration issues

  /** Daemon failed before entering its run loop */
  DAEMON_STARTUP_FAILURE: 100,

  /** A supervised daemon task failed */
  TASK_FAILURE: 101,

  /** IPC request timed out */
  IPC_TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Signal handler error */
  SIGNAL_HANDLER_ERROR: 105,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
