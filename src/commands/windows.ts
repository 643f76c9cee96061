import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import {
  closeAllWindows,
  closeWindows,
  getWindows,
  openWindow,
  validateIPCResponse,
} from '@/ipc/index.js';
import {
  ALL_WINDOWS_CLOSED_MESSAGE,
  NO_WINDOWS_MESSAGE,
  windowOpenedMessage,
  windowsClosedMessage,
} from '@/ui/messages/commands.js';

export type WindowEntry = { name: string; open: boolean };
type WindowsResult = { windows: WindowEntry[] };
type MessageResult = { message: string };

const OPEN_MARKER = '*';

/**
 * Parse the daemon's window listing: one window per line, open windows
 * prefixed with `*`.
 */
export function parseWindowsOutput(output: string): WindowEntry[] {
  return output
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) =>
      line.startsWith(OPEN_MARKER)
        ? { name: line.slice(OPEN_MARKER.length), open: true }
        : { name: line, open: false }
    );
}

export function formatWindows(data: WindowsResult): string {
  if (data.windows.length === 0) {
    return NO_WINDOWS_MESSAGE;
  }
  return data.windows
    .map((window) => `${window.open ? OPEN_MARKER : ' '} ${window.name}`)
    .join('\n');
}

/**
 * Register open, close, close-all and windows commands
 */
export function registerWindowCommands(program: Command): void {
  program
    .command('open')
    .description('Open a window')
    .argument('<window>', 'Name of a window defined in the configuration')
    .addOption(jsonOption)
    .action(async (window: string, options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, MessageResult>(
        async () => {
          const response = await openWindow(paths.socketPath, window);
          if (response.status === 'error') {
            return { success: false, error: response.error ?? `Failed to open ${window}` };
          }
          return { success: true, data: { message: windowOpenedMessage(window) } };
        },
        options,
        (data) => data.message,
        { configDir: paths.configDir }
      );
    });

  program
    .command('close')
    .description('Close one or more windows')
    .argument('<windows...>', 'Names of open windows')
    .addOption(jsonOption)
    .action(async (windows: string[], options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, MessageResult>(
        async () => {
          const response = await closeWindows(paths.socketPath, windows);
          if (response.status === 'error') {
            return { success: false, error: response.error ?? 'Failed to close windows' };
          }
          return { success: true, data: { message: windowsClosedMessage(windows) } };
        },
        options,
        (data) => data.message,
        { configDir: paths.configDir }
      );
    });

  program
    .command('close-all')
    .description('Close every open window')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, MessageResult>(
        async () => {
          const response = await closeAllWindows(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { message: ALL_WINDOWS_CLOSED_MESSAGE } };
        },
        options,
        (data) => data.message,
        { configDir: paths.configDir }
      );
    });

  program
    .command('windows')
    .description('List defined windows (* marks open ones)')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, WindowsResult>(
        async () => {
          const response = await getWindows(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { windows: parseWindowsOutput(response.output ?? '') } };
        },
        options,
        formatWindows,
        { configDir: paths.configDir }
      );
    });
}
