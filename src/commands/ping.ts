import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import { pingDaemon, validateIPCResponse } from '@/ipc/index.js';

type PingResult = { reply: string };

/**
 * Register ping command
 */
export function registerPingCommand(program: Command): void {
  program
    .command('ping')
    .description('Check that the daemon is running and responsive')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, PingResult>(
        async () => {
          const response = await pingDaemon(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { reply: response.output ?? '' } };
        },
        options,
        (data) => data.reply,
        { configDir: paths.configDir }
      );
    });
}
