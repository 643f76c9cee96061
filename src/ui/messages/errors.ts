/**
 * Common error messages and patterns.
 *
 * Centralized location for reusable error messages with consistent formatting.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Context for daemon error messages.
 */
export interface DaemonErrorContext {
  /** Config directory the CLI was addressing */
  configDir?: string;
  /** Whether to suggest retrying (for transient errors) */
  suggestRetry?: boolean;
}

/**
 * "daemon not running" error with a hint on how to start one.
 *
 * @example
 * ```typescript
 * console.error(daemonNotRunningError({ configDir: '/home/me/.config/widgetd' }));
 * ```
 */
export function daemonNotRunningError(context?: DaemonErrorContext): string {
  return joinLines(
    'Error: Daemon not running',
    context?.configDir !== undefined && `  Config: ${context.configDir}`,
    '',
    'Start the daemon:',
    context?.configDir !== undefined
      ? `  widgetd --config ${context.configDir} daemon`
      : '  widgetd daemon',
    context?.suggestRetry && '',
    context?.suggestRetry && 'Or try the command again if this was transient'
  );
}

export function daemonAlreadyRunningError(configDir: string): string {
  return `Daemon already running for ${configDir}`;
}

/**
 * Generate generic error message with optional context.
 *
 * @example
 * ```typescript
 * console.error(genericError('Operation failed', 'Socket timeout'));
 * ```
 */
export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}


export function invalidAssignmentError(argument: string): string {
  return `Invalid assignment "${argument}": expected name=value`;
}
