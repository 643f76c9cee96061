import type { Command } from 'commander';

import { registerDaemonCommand } from '@/commands/daemon.js';
import { registerLifecycleCommands } from '@/commands/lifecycle.js';
import { registerPingCommand } from '@/commands/ping.js';
import { registerStateCommands } from '@/commands/state.js';
import { registerUpdateCommand } from '@/commands/update.js';
import { registerWindowCommands } from '@/commands/windows.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Daemon:'),
  registerDaemonCommand,
  registerPingCommand,
  registerLifecycleCommands,

  addCommandGroup('Windows:'),
  registerWindowCommands,

  addCommandGroup('State:'),
  registerUpdateCommand,
  registerStateCommands,
];
