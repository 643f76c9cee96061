import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import { killDaemon, reloadConfig, validateIPCResponse } from '@/ipc/index.js';
import { KILL_REQUESTED_MESSAGE, RELOADED_MESSAGE } from '@/ui/messages/commands.js';

type MessageResult = { message: string };

/**
 * Register reload and kill commands
 */
export function registerLifecycleCommands(program: Command): void {
  program
    .command('reload')
    .description('Reload configuration and stylesheet')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, MessageResult>(
        async () => {
          const response = await reloadConfig(paths.socketPath);
          if (response.status === 'error') {
            return { success: false, error: response.error ?? 'Reload failed' };
          }
          return { success: true, data: { message: RELOADED_MESSAGE } };
        },
        options,
        (data) => data.message,
        { configDir: paths.configDir }
      );
    });

  program
    .command('kill')
    .description('Stop the daemon')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, MessageResult>(
        async () => {
          const response = await killDaemon(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { message: KILL_REQUESTED_MESSAGE } };
        },
        options,
        (data) => data.message,
        { configDir: paths.configDir }
      );
    });
}
