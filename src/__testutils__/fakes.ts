/**
 * In-process stand-ins for the daemon's process-level seams.
 */

import { EventEmitter } from 'node:events';

import { parseConfig, type ConfigLoader, type WidgetConfig } from '@/app/config.js';
import type { DetachHost, SpawnedProcess } from '@/daemon/detach.js';
import type { SignalSource } from '@/daemon/lifecycle/signalHandlers.js';

type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Signal source the test fires by hand.
 *
 * @example
 * const signals = new FakeSignalSource();
 * setupSignalHandlers(exitSignal, { source: signals });
 * signals.emit('SIGTERM');
 */
export class FakeSignalSource implements SignalSource {
  private readonly listeners = new Map<NodeJS.Signals, Set<SignalListener>>();

  on(signal: NodeJS.Signals, listener: SignalListener): this {
    const set = this.listeners.get(signal) ?? new Set<SignalListener>();
    set.add(listener);
    this.listeners.set(signal, set);
    return this;
  }

  off(signal: NodeJS.Signals, listener: SignalListener): this {
    this.listeners.get(signal)?.delete(listener);
    return this;
  }

  emit(signal: NodeJS.Signals): void {
    for (const listener of [...(this.listeners.get(signal) ?? [])]) {
      listener(signal);
    }
  }

  listenerCount(signal: NodeJS.Signals): number {
    return this.listeners.get(signal)?.size ?? 0;
  }
}

/**
 * Child process double that reports 'spawn' (or an error) on the next tick.
 */
export class FakeChild extends EventEmitter implements SpawnedProcess {
  readonly pid = 4242;
  unrefCalled = false;

  constructor(failWith?: Error) {
    super();
    setImmediate(() => {
      if (failWith) {
        this.emit('error', failWith);
      } else {
        this.emit('spawn');
      }
    });
  }

  unref(): void {
    this.unrefCalled = true;
  }
}

export interface FakeDetachHostOptions {
  daemonChild?: boolean;
  /** Descriptors that are terminals (default: none) */
  terminals?: number[];
  openLogError?: Error;
  spawnError?: Error;
}

/**
 * Records every process-level effect of detach() instead of performing it.
 */
export class FakeDetachHost implements DetachHost {
  static readonly LOG_FD = 17;

  readonly openedLogs: string[] = [];
  readonly closedFds: number[] = [];
  readonly spawnedWith: Array<['ignore', number | 'inherit', number | 'inherit']> = [];
  readonly exitCodes: number[] = [];
  lastChild: FakeChild | null = null;

  constructor(private readonly options: FakeDetachHostOptions = {}) {}

  isDaemonChild(): boolean {
    return this.options.daemonChild ?? false;
  }

  isTerminal(fd: number): boolean {
    return (this.options.terminals ?? []).includes(fd);
  }

  openLog(logPath: string): number {
    if (this.options.openLogError) {
      throw this.options.openLogError;
    }
    this.openedLogs.push(logPath);
    return FakeDetachHost.LOG_FD;
  }

  closeFd(fd: number): void {
    this.closedFds.push(fd);
  }

  spawnDetached(stdio: ['ignore', number | 'inherit', number | 'inherit']): SpawnedProcess {
    this.spawnedWith.push(stdio);
    this.lastChild = new FakeChild(this.options.spawnError);
    return this.lastChild;
  }

  exit(code: number): void {
    this.exitCodes.push(code);
  }
}

/**
 * Config loader over in-memory file contents, keyed by path.
 * A missing stylesheet path reads as null, like a missing file.
 */
export class MemoryConfigLoader implements ConfigLoader {
  readonly files = new Map<string, string>();
  loadCount = 0;

  loadConfig(yuckPath: string): WidgetConfig {
    this.loadCount++;
    const source = this.files.get(yuckPath);
    if (source === undefined) {
      throw new Error(`Config file not found: ${yuckPath}`);
    }
    return parseConfig(source, 'widgetd.yuck');
  }

  loadStylesheet(scssPath: string): string | null {
    return this.files.get(scssPath) ?? null;
  }
}
