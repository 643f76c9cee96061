/**
 * Signal Handlers
 *
 * SIGINT and SIGTERM broadcast shutdown through the {@link ExitSignal}.
 * Repeated signals are harmless: only the first one starts a shutdown.
 */

import type { ExitSignal } from '@/daemon/lifecycle/exitSignal.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('lifecycle');

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Where signals come from. `process` in production.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface SignalHandlerOptions {
  source?: SignalSource;
  /** Called when shutdown cannot be broadcast; must end the process */
  onFatal?: (exitCode: number) => void;
}

/**
 * Install SIGINT/SIGTERM handlers.
 *
 * @returns Function that removes the handlers again
 */
export function setupSignalHandlers(
  exitSignal: ExitSignal,
  options: SignalHandlerOptions = {}
): () => void {
  const source = options.source ?? process;
  const onFatal = options.onFatal ?? ((code: number) => process.exit(code));

  const listener: SignalListener = (signal) => {
    if (exitSignal.isSignalled) {
      log.debug(`Received ${signal}, shutdown already in progress`);
      return;
    }

    log.info(`Received ${signal}, shutting down...`);
    try {
      exitSignal.signal();
    } catch (error) {
      log.error(`Failed to broadcast shutdown to tasks: ${getErrorMessage(error)}`);
      onFatal(EXIT_CODES.SIGNAL_HANDLER_ERROR);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    source.on(signal, listener);
  }

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      source.off(signal, listener);
    }
  };
}
