/**
 * Application state
 *
 * Owned by the UI loop. Every mutation happens in {@link App.handleCommand},
 * which the UI loop calls with one command at a time.
 */

import type { ConfigLoader, WidgetConfig } from '@/app/config.js';
import { fileConfigLoader } from '@/app/config.js';
import {
  failure,
  success,
  type DaemonCommand,
  type DaemonResponse,
  type Responder,
} from '@/app/commands.js';
import type { DaemonPaths } from '@/runtime/paths.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('app');

/**
 * What the UI loop needs from the state it drives.
 */
export interface CommandHandler {
  handleCommand(command: DaemonCommand): void;
  readonly isStopped: boolean;
}

function respond(responder: Responder, response: DaemonResponse): void {
  if (!responder.send(response)) {
    log.debug('Requester stopped waiting; response dropped');
  }
}

function responderOf(command: DaemonCommand): Responder | null {
  return 'responder' in command ? command.responder : null;
}

export class App implements CommandHandler {
  private config: WidgetConfig;
  private stylesheet: string | null;
  private vars: Map<string, string>;
  private readonly openWindows = new Set<string>();
  private stopped = false;

  constructor(
    private readonly paths: DaemonPaths,
    initialConfig: WidgetConfig,
    initialStylesheet: string | null,
    private readonly loader: ConfigLoader = fileConfigLoader
  ) {
    this.config = initialConfig;
    this.stylesheet = initialStylesheet;
    this.vars = new Map(initialConfig.varDefaults);
  }

  /**
   * Load configuration and stylesheet from disk and build the initial state.
   *
   * @throws ConfigError if the configuration cannot be loaded
   */
  static load(paths: DaemonPaths, loader: ConfigLoader = fileConfigLoader): App {
    const config = loader.loadConfig(paths.yuckPath);
    const stylesheet = loader.loadStylesheet(paths.scssPath);
    return new App(paths, config, stylesheet, loader);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  getVar(name: string): string | undefined {
    return this.vars.get(name);
  }

  getOpenWindows(): string[] {
    return [...this.openWindows];
  }

  getStylesheet(): string | null {
    return this.stylesheet;
  }

  getConfig(): WidgetConfig {
    return this.config;
  }

  /**
   * Apply one command. Never throws: a failing handler is logged and, when
   * the command has a responder, answered with a failure.
   */
  handleCommand(command: DaemonCommand): void {
    log.debug(`Handling ${command.kind}`);
    try {
      this.apply(command);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(`Failed to handle ${command.kind}: ${message}`);
      const responder = responderOf(command);
      if (responder) {
        respond(responder, failure(message));
      }
    }
  }

  private apply(command: DaemonCommand): void {
    switch (command.kind) {
      case 'noop':
        break;
      case 'update_vars':
        this.updateVars(command.assignments);
        break;
      case 'reload_config_and_css':
        respond(command.responder, this.reload());
        break;
      case 'open_window':
        respond(command.responder, this.openWindow(command.window));
        break;
      case 'close_windows':
        respond(command.responder, this.closeWindows(command.windows));
        break;
      case 'close_all':
        this.closeAll();
        break;
      case 'print_state':
        respond(command.responder, success(this.formatState()));
        break;
      case 'print_windows':
        respond(command.responder, success(this.formatWindows()));
        break;
      case 'print_debug':
        respond(command.responder, success(this.formatDebug()));
        break;
      case 'kill_server':
        log.info('Received kill command, stopping UI loop');
        this.closeAll();
        this.stopped = true;
        break;
    }
  }

  private updateVars(assignments: Array<[string, string]>): void {
    for (const [name, value] of assignments) {
      if (!this.config.varDefaults.has(name)) {
        log.warn(`Ignoring update of undeclared variable "${name}"`);
        continue;
      }
      this.vars.set(name, value);
    }
  }

  /**
   * Reload configuration and stylesheet. On failure the previous ones stay
   * active.
   */
  private reload(): DaemonResponse {
    let config: WidgetConfig;
    let stylesheet: string | null;
    try {
      config = this.loader.loadConfig(this.paths.yuckPath);
      stylesheet = this.loader.loadStylesheet(this.paths.scssPath);
    } catch (error) {
      return failure(getErrorMessage(error));
    }

    this.config = config;
    this.stylesheet = stylesheet;
    this.vars = new Map(config.varDefaults);

    for (const window of [...this.openWindows]) {
      if (!config.windows.has(window)) {
        log.info(`Closing window "${window}": no longer defined`);
        this.openWindows.delete(window);
      }
    }

    return success();
  }

  private openWindow(window: string): DaemonResponse {
    if (!this.config.windows.has(window)) {
      return failure(`No window named "${window}" is defined`);
    }
    this.openWindows.add(window);
    return success();
  }

  private closeWindows(windows: string[]): DaemonResponse {
    const notOpen = windows.filter((window) => !this.openWindows.has(window));
    for (const window of windows) {
      this.openWindows.delete(window);
    }
    if (notOpen.length > 0) {
      return failure(`Not open: ${notOpen.join(', ')}`);
    }
    return success();
  }

  private closeAll(): void {
    this.openWindows.clear();
  }

  private formatState(): string {
    return [...this.vars.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, value]) => `${name}: ${value}`)
      .join('\n');
  }

  private formatWindows(): string {
    return [...this.config.windows.keys()]
      .map((name) => (this.openWindows.has(name) ? `*${name}` : name))
      .join('\n');
  }

  private formatDebug(): string {
    return [
      `config dir: ${this.paths.configDir}`,
      `config file: ${this.paths.yuckPath}`,
      `stylesheet: ${this.stylesheet === null ? 'none' : `${this.stylesheet.length} bytes`}`,
      `windows: ${[...this.config.windows.keys()].join(', ') || 'none'}`,
      `open windows: ${[...this.openWindows].join(', ') || 'none'}`,
      `variables: ${this.vars.size}`,
    ].join('\n');
  }
}
