/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * Every line goes to stderr with a context prefix. Once the daemon has
 * detached, stderr is the daemon log file, so the same calls serve the CLI
 * and the daemon. Set WIDGETD_DEBUG=1 or pass --debug for 'debug' lines.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['WIDGETD_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility and tagging of log messages.
 *
 * - 'info': Always shown (key milestones)
 * - 'warn' / 'error': Always shown, tagged with the level
 * - 'debug': Only shown in debug mode
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext =
  | 'launcher'
  | 'daemon'
  | 'watcher'
  | 'server'
  | 'supervisor'
  | 'lifecycle'
  | 'app'
  | 'client';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a warning (always shown, tagged WARN). */
  warn: (message: string) => void;

  /** Log an error (always shown, tagged ERROR). */
  error: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function formatLine(context: LogContext, message: string, level: LogLevel): string {
  switch (level) {
    case 'warn':
      return `[${context}] WARN ${message}`;
    case 'error':
      return `[${context}] ERROR ${message}`;
    case 'info':
    case 'debug':
      return `[${context}] ${message}`;
  }
}

/**
 * Create a logger instance for a specific context.
 *
 * @param context - Component context for log prefix
 * @returns Logger instance with info/warn/error/debug methods
 *
 * @example
 * ```typescript
 * const log = createLogger('watcher');
 *
 * log.info('Watching /home/user/.config/widgetd');
 * log.error('Failed to reload config: unbalanced parentheses');
 * log.debug('Ignoring change to notes.txt');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(formatLine(context, message, level));
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    warn: (message: string) => logMessage(message, 'warn'),
    error: (message: string) => logMessage(message, 'error'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}
