/**
 * Success messages printed by client commands.
 */

import { pluralize } from '@/ui/formatting.js';

export const RELOADED_MESSAGE = 'Configuration reloaded';
export const KILL_REQUESTED_MESSAGE = 'Daemon is shutting down';
export const ALL_WINDOWS_CLOSED_MESSAGE = 'Closed all windows';

export function variablesUpdatedMessage(count: number): string {
  return `Updated ${pluralize(count, 'variable')}`;
}

export function windowOpenedMessage(window: string): string {
  return `Opened ${window}`;
}

export function windowsClosedMessage(windows: string[]): string {
  return `Closed ${windows.join(', ')}`;
}

export const NO_WINDOWS_MESSAGE = 'No windows defined';
export const NO_VARIABLES_MESSAGE = 'No variables defined';
