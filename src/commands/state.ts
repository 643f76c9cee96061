import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import { getDebugInfo, getState, validateIPCResponse } from '@/ipc/index.js';
import { NO_VARIABLES_MESSAGE } from '@/ui/messages/commands.js';

type StateResult = { variables: Record<string, string> };
type DebugResult = { lines: string[] };

const STATE_SEPARATOR = ': ';

/**
 * Parse the daemon's `name: value` state listing. Values may contain the
 * separator; names never do.
 */
export function parseStateOutput(output: string): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const line of output.split('\n')) {
    const separator = line.indexOf(STATE_SEPARATOR);
    if (separator <= 0) {
      continue;
    }
    variables[line.slice(0, separator)] = line.slice(separator + STATE_SEPARATOR.length);
  }
  return variables;
}

export function formatState(data: StateResult): string {
  const entries = Object.entries(data.variables);
  if (entries.length === 0) {
    return NO_VARIABLES_MESSAGE;
  }
  return entries.map(([name, value]) => `${name}${STATE_SEPARATOR}${value}`).join('\n');
}

/**
 * Register state and debug commands
 */
export function registerStateCommands(program: Command): void {
  program
    .command('state')
    .description('Print the current variable values')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, StateResult>(
        async () => {
          const response = await getState(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { variables: parseStateOutput(response.output ?? '') } };
        },
        options,
        formatState,
        { configDir: paths.configDir }
      );
    });

  program
    .command('debug')
    .description('Print a debug dump of the daemon state')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, DebugResult>(
        async () => {
          const response = await getDebugInfo(paths.socketPath);
          validateIPCResponse(response);
          return { success: true, data: { lines: (response.output ?? '').split('\n') } };
        },
        options,
        (data) => data.lines.join('\n'),
        { configDir: paths.configDir }
      );
    });
}
