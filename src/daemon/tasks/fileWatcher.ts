/**
 * Config Watcher task
 *
 * Watches the configuration directory recursively and asks the UI loop to
 * reload configuration and stylesheet when a relevant file changes. Bursts
 * of changes are coalesced by a {@link DebounceGate}: at most one reload
 * command per cooldown window.
 */

import { stat } from 'fs/promises';
import { extname } from 'path';

import { watch, type FSWatcher } from 'chokidar';

import { failure, type CommandSink, type DaemonResponse } from '@/app/commands.js';
import { createOneshot, type OneshotReceiver } from '@/channel/oneshot.js';
import { RELEVANT_EXTENSIONS } from '@/constants.js';
import { DaemonStartupError } from '@/daemon/errors.js';
import { DebounceGate } from '@/daemon/tasks/debounceGate.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('watcher');

/**
 * Whether a change to this path should trigger a reload.
 *
 * Only configuration (.yuck) and stylesheet (.scss) files count; changes to
 * anything else in the directory never cause a reload.
 */
export function isRelevantChange(filePath: string): boolean {
  return RELEVANT_EXTENSIONS.has(extname(filePath));
}

async function logReloadOutcome(
  response: OneshotReceiver<DaemonResponse>
): Promise<DaemonResponse | null> {
  const result = await response.recv();
  if (result === null) {
    log.error('No response to configuration reload request');
  } else if (result.kind === 'success') {
    log.info('Reloaded config successfully');
  } else {
    log.error(`Failed to reload config: ${result.message}`);
  }
  return result;
}

export class ConfigWatcher {
  private watcher: FSWatcher | null = null;
  private finish: ((error?: unknown) => void) | null = null;
  private closed = false;

  constructor(
    private readonly rootDir: string,
    private readonly sink: CommandSink,
    private readonly gate: DebounceGate = new DebounceGate()
  ) {}

  /**
   * Handle one filesystem change.
   *
   * @returns The pending reload outcome when this change sent a reload
   *   command, or null when it was ignored or coalesced
   * @throws QueueClosedError if the UI loop no longer accepts commands
   */
  handleChange(filePath: string): Promise<DaemonResponse | null> | null {
    if (!isRelevantChange(filePath)) {
      log.debug(`Ignoring change to ${filePath}`);
      return null;
    }

    if (!this.gate.tryClose()) {
      log.debug(`Coalescing change to ${filePath}`);
      return null;
    }

    log.debug(`Change to ${filePath}, requesting reload`);
    const [responder, response] = createOneshot<DaemonResponse>();
    this.sink.send({ kind: 'reload_config_and_css', responder });

    return logReloadOutcome(response).catch((error: unknown) => {
      log.error(`Reload response failed: ${getErrorMessage(error)}`);
      return failure(getErrorMessage(error));
    });
  }

  /**
   * Register the watch and run until {@link close} is called or a fatal
   * error occurs.
   *
   * @throws DaemonStartupError if the directory cannot be watched
   * @throws QueueClosedError if a reload cannot be delivered
   */
  async run(): Promise<void> {
    await this.assertWatchableDirectory();
    if (this.closed) {
      return;
    }

    const watcher = watch(this.rootDir, { ignoreInitial: true, persistent: true });
    this.watcher = watcher;

    await new Promise<void>((resolve, reject) => {
      let ready = false;
      let settled = false;

      this.finish = (error?: unknown): void => {
        if (settled) return;
        settled = true;
        this.finish = null;
        watcher.close().then(
          () => (error === undefined ? resolve() : reject(error)),
          (closeError: unknown) => reject(error ?? closeError)
        );
      };

      const onFsEvent = (filePath: string): void => {
        try {
          void this.handleChange(filePath);
        } catch (error) {
          log.error(`Cannot deliver reload request: ${getErrorMessage(error)}`);
          this.finish?.(error);
        }
      };

      watcher.on('add', onFsEvent);
      watcher.on('change', onFsEvent);
      watcher.on('unlink', onFsEvent);

      watcher.on('ready', () => {
        ready = true;
        log.info(`Watching ${this.rootDir}`);
      });

      watcher.on('error', (error: unknown) => {
        if (!ready) {
          this.finish?.(
            new DaemonStartupError(
              `Failed to watch ${this.rootDir}: ${getErrorMessage(error)}`,
              'WATCH_SETUP_FAILED',
              error
            )
          );
          return;
        }
        log.error(`Encountered error while watching files: ${getErrorMessage(error)}`);
      });
    });
  }

  /**
   * Stop watching. `run()` resolves once the watcher is closed.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.gate.dispose();
    this.finish?.();
    if (this.watcher) {
      await this.watcher.close();
    }
  }

  private async assertWatchableDirectory(): Promise<void> {
    try {
      const stats = await stat(this.rootDir);
      if (!stats.isDirectory()) {
        throw new DaemonStartupError(`${this.rootDir} is not a directory`, 'WATCH_SETUP_FAILED');
      }
    } catch (error) {
      if (error instanceof DaemonStartupError) {
        throw error;
      }
      throw new DaemonStartupError(
        `Failed to watch ${this.rootDir}: ${getErrorMessage(error)}`,
        'WATCH_SETUP_FAILED',
        error
      );
    }
  }
}
