import { isConnectionError } from '@/ipc/utils/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { CommandError } from '@/ui/errors/index.js';
import { daemonNotRunningError, genericError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export type CommandResult<T> =
  | { success: true; data: T }
  | {
      success: false;
      error: string;
      /** Defaults to UNHANDLED_EXCEPTION */
      exitCode?: number;
    };

export type CommandHandler<TOptions extends BaseCommandOptions, TResult> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output. An empty string prints nothing.
 */
export type CommandFormatter<TResult> = (data: TResult) => string;

/**
 * Where command output goes. The console in production.
 */
export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleIO: CommandIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export interface RunSettings {
  /** Config directory addressed, shown in "daemon not running" hints */
  configDir?: string;
  io?: CommandIO;
}

function hasExitCode(error: unknown): error is Error & { exitCode: number } {
  return error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number';
}

/**
 * Print an error thrown by a command and pick the exit code for it.
 *
 * - CommandError: message, metadata lines, its exit code
 * - daemon socket missing or refusing: "daemon not running", RESOURCE_NOT_FOUND
 * - IPC and daemon errors: message, their own exit code
 * - anything else: message, UNHANDLED_EXCEPTION
 */
export function reportCommandError(
  error: unknown,
  json: boolean,
  settings: RunSettings = {}
): number {
  const io = settings.io ?? consoleIO;

  if (error instanceof CommandError) {
    if (json) {
      io.stdout(
        JSON.stringify(
          OutputBuilder.buildJsonError(error.message, {
            exitCode: error.exitCode,
            ...error.metadata,
          }),
          null,
          2
        )
      );
    } else {
      io.stderr(genericError(error.message));
      for (const value of Object.values(error.metadata)) {
        if (typeof value === 'string') {
          io.stderr(value);
        }
      }
    }
    return error.exitCode;
  }

  if (isConnectionError(error)) {
    const exitCode = EXIT_CODES.RESOURCE_NOT_FOUND;
    if (json) {
      io.stdout(
        JSON.stringify(
          OutputBuilder.buildJsonError('Daemon not running', {
            exitCode,
            suggestion: 'Start it with: widgetd daemon',
          }),
          null,
          2
        )
      );
    } else {
      io.stderr(
        daemonNotRunningError(
          settings.configDir !== undefined ? { configDir: settings.configDir } : undefined
        )
      );
    }
    return exitCode;
  }

  const exitCode = hasExitCode(error) ? error.exitCode : EXIT_CODES.UNHANDLED_EXCEPTION;
  const errorMessage = getErrorMessage(error);
  if (json) {
    io.stdout(JSON.stringify(OutputBuilder.buildJsonError(errorMessage, { exitCode }), null, 2));
  } else {
    io.stderr(genericError(errorMessage));
  }
  return exitCode;
}

/**
 * Run a handler and print its result. Returns the exit code instead of
 * exiting so that it can be tested.
 */
export async function executeCommand<TOptions extends BaseCommandOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>,
  settings: RunSettings = {}
): Promise<number> {
  const io = settings.io ?? consoleIO;
  const json = options.json ?? false;

  try {
    const result = await handler(options);

    if (!result.success) {
      const exitCode = result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION;
      if (json) {
        io.stdout(
          JSON.stringify(OutputBuilder.buildJsonError(result.error, { exitCode }), null, 2)
        );
      } else {
        io.stderr(genericError(result.error));
      }
      return exitCode;
    }

    if (json || !formatter) {
      io.stdout(JSON.stringify(OutputBuilder.buildJsonSuccess({ data: result.data }), null, 2));
    } else {
      const formattedOutput = formatter(result.data);
      if (formattedOutput) {
        io.stdout(formattedOutput);
      }
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportCommandError(error, json, settings);
  }
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async () => {
 *     const response = await getState(paths.socketPath);
 *     validateIPCResponse(response);
 *     return { success: true, data: parseStateOutput(response.output ?? '') };
 *   },
 *   options,
 *   formatState
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>,
  settings?: RunSettings
): Promise<void> {
  process.exit(await executeCommand(handler, options, formatter, settings));
}
