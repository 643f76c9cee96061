#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { configOption } from '@/commands/shared/commonOptions.js';
import { enableDebugLogging } from '@/ui/logging/index.js';
import { VERSION } from '@/utils/version.js';

// ============================================================================
// Constants
// ============================================================================

// Commander Configuration
const CLI_NAME = 'widgetd';
const CLI_DESCRIPTION = 'Widget daemon: serves widget windows from a configuration directory';

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Main entry point.
 *
 * Every subcommand but `daemon` is a thin client: it addresses the daemon
 * of the selected configuration over its socket and exits. `daemon` starts
 * that daemon and, unless told otherwise, detaches it from the terminal.
 */
async function main(): Promise<void> {
  // Check for --debug flag early so option parsing itself can log
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)')
    .addOption(configOption);

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

void main();
