import { Option, type Command } from 'commander';

import { resolveDaemonPaths, type DaemonPaths } from '@/runtime/paths.js';

/**
 * Shared --json flag for all commands that support JSON output.
 *
 * @example
 * ```typescript
 * program
 *   .command('state')
 *   .addOption(jsonOption)
 *   .action((options) => {
 *     if (options.json) {
 *       console.log(JSON.stringify(data));
 *     }
 *   });
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Global `-c, --config <dir>`, read from any subcommand.
 */
export const configOption = new Option(
  '-c, --config <dir>',
  'Configuration directory (default: $XDG_CONFIG_HOME/widgetd)'
);

/**
 * Resolve the daemon paths for the configuration selected on the command line.
 */
export function resolveCommandPaths(command: Command): DaemonPaths {
  const config: unknown = command.optsWithGlobals()['config'];
  return resolveDaemonPaths(typeof config === 'string' ? config : undefined);
}
