import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, resolveCommandPaths } from '@/commands/shared/commonOptions.js';
import { updateVars, validateIPCResponse } from '@/ipc/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { variablesUpdatedMessage } from '@/ui/messages/commands.js';
import { invalidAssignmentError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

type UpdateResult = { updated: string[] };

/**
 * Parse `name=value` arguments. The value may itself contain `=`.
 *
 * @throws CommandError with INVALID_ARGUMENTS for an argument without a
 *   name or without `=`
 *
 * @example
 * ```typescript
 * parseAssignments(['volume=40', 'title=a=b'])
 * // [['volume', '40'], ['title', 'a=b']]
 * ```
 */
export function parseAssignments(args: string[]): Array<[string, string]> {
  return args.map((arg) => {
    const separator = arg.indexOf('=');
    if (separator <= 0) {
      throw new CommandError(
        invalidAssignmentError(arg),
        { suggestion: 'Example: widgetd update volume=40' },
        EXIT_CODES.INVALID_ARGUMENTS
      );
    }
    return [arg.slice(0, separator), arg.slice(separator + 1)];
  });
}

/**
 * Register update command
 */
export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Set variable values')
    .argument('<assignments...>', 'One or more name=value pairs')
    .addOption(jsonOption)
    .action(async (args: string[], options: BaseCommandOptions, command: Command) => {
      const paths = resolveCommandPaths(command);
      await runCommand<BaseCommandOptions, UpdateResult>(
        async () => {
          const assignments = parseAssignments(args);
          const response = await updateVars(paths.socketPath, assignments);
          validateIPCResponse(response);
          return { success: true, data: { updated: assignments.map(([name]) => name) } };
        },
        options,
        (data) => variablesUpdatedMessage(data.updated.length),
        { configDir: paths.configDir }
      );
    });
}
