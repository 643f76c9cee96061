/**
 * Centralized configuration constants for widgetd
 *
 * Timing, naming and environment-variable constants used throughout the
 * daemon and the CLI.
 */

// ============================================================================
// NAMES
// ============================================================================

export const APP_NAME = 'widgetd';

/**
 * Configuration file inside the configuration directory
 */
export const CONFIG_FILE_NAME = 'widgetd.yuck';

/**
 * Stylesheet inside the configuration directory (optional)
 */
export const STYLESHEET_FILE_NAME = 'widgetd.scss';

/**
 * File extensions whose changes trigger a configuration reload
 */
export const RELEVANT_EXTENSIONS: ReadonlySet<string> = new Set(['.yuck', '.scss']);

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Set in the environment of the detached daemon process so that it does not
 * detach again
 */
export const DAEMON_CHILD_ENV_VAR = 'WIDGETD_DAEMON_CHILD';
export const DAEMON_CHILD_ENV_VALUE = '1';

/**
 * Overrides the directory holding the IPC socket (used by tests)
 */
export const RUNTIME_DIR_OVERRIDE_ENV = 'WIDGETD_RUNTIME_DIR';

// ============================================================================
// TIMEOUTS & INTERVALS
// ============================================================================

/**
 * Reload debounce window: at most one reload command per window
 */
export const RELOAD_DEBOUNCE_MS = 500;

/**
 * How long the command server waits for the UI loop to answer a command
 */
export const COMMAND_RESPONSE_TIMEOUT_MS = 10000;

/**
 * IPC request timeout in milliseconds (15 seconds)
 *
 * Can be overridden via WIDGETD_IPC_TIMEOUT_MS environment variable (used by tests)
 *
 * @returns IPC request timeout in milliseconds
 */
export function getIPCRequestTimeout(): number {
  const override = process.env['WIDGETD_IPC_TIMEOUT_MS'];
  if (override !== undefined) {
    const parsed = parseInt(override, 10);
    if (!Number.isNaN(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return 15000;
}
