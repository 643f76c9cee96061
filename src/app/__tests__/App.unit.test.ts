/**
 * Application state unit tests
 *
 * Commands go straight into handleCommand(); answers are read from the
 * command's responder.
 */

import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { MemoryConfigLoader } from '@/__testutils__/index.js';
import { App } from '@/app/App.js';
import type { DaemonCommand, DaemonResponse, Responder } from '@/app/commands.js';
import { createOneshot } from '@/channel/oneshot.js';
import type { DaemonPaths } from '@/runtime/paths.js';

const PATHS: DaemonPaths = {
  configDir: '/cfg',
  yuckPath: '/cfg/widgetd.yuck',
  scssPath: '/cfg/widgetd.scss',
  socketPath: '/run/widgetd.sock',
  logFile: '/cache/widgetd.log',
};

const CONFIG = [
  '(defvar volume 40)',
  '(defvar theme "dark")',
  '(defwindow bar (box))',
  '(defwindow clock (label))',
].join('\n');

/**
 * Apply a command that carries a responder and return the answer.
 */
async function ask(
  app: App,
  build: (responder: Responder) => DaemonCommand
): Promise<DaemonResponse | null> {
  const [responder, response] = createOneshot<DaemonResponse>();
  app.handleCommand(build(responder));
  return response.recv();
}

void describe('App', () => {
  let loader: MemoryConfigLoader;
  let app: App;

  beforeEach(() => {
    loader = new MemoryConfigLoader();
    loader.files.set(PATHS.yuckPath, CONFIG);
    loader.files.set(PATHS.scssPath, '.bar {}');
    app = App.load(PATHS, loader);
  });

  void describe('load', () => {
    void it('starts from the configured defaults', () => {
      assert.equal(app.getVar('volume'), '40');
      assert.equal(app.getVar('theme'), 'dark');
      assert.equal(app.getStylesheet(), '.bar {}');
      assert.deepEqual(app.getOpenWindows(), []);
      assert.equal(app.isStopped, false);
    });

    void it('propagates a configuration that cannot be loaded', () => {
      loader.files.delete(PATHS.yuckPath);

      assert.throws(() => App.load(PATHS, loader), {
        message: 'Config file not found: /cfg/widgetd.yuck',
      });
    });
  });

  void describe('update_vars', () => {
    void it('updates declared variables and ignores the rest', () => {
      app.handleCommand({
        kind: 'update_vars',
        assignments: [
          ['volume', '70'],
          ['brightness', '3'],
        ],
      });

      assert.equal(app.getVar('volume'), '70');
      assert.equal(app.getVar('brightness'), undefined);
    });
  });

  void describe('windows', () => {
    void it('opens a defined window', async () => {
      const result = await ask(app, (responder) => ({
        kind: 'open_window',
        window: 'bar',
        responder,
      }));

      assert.deepEqual(result, { kind: 'success', payload: '' });
      assert.deepEqual(app.getOpenWindows(), ['bar']);
    });

    void it('refuses to open an undefined window', async () => {
      const result = await ask(app, (responder) => ({
        kind: 'open_window',
        window: 'dock',
        responder,
      }));

      assert.deepEqual(result, { kind: 'failure', message: 'No window named "dock" is defined' });
      assert.deepEqual(app.getOpenWindows(), []);
    });

    void it('closes the open windows and reports the ones that were not open', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'bar', responder }));

      const result = await ask(app, (responder) => ({
        kind: 'close_windows',
        windows: ['bar', 'clock'],
        responder,
      }));

      assert.deepEqual(result, { kind: 'failure', message: 'Not open: clock' });
      assert.deepEqual(app.getOpenWindows(), []);
    });

    void it('closes every window on close_all', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'bar', responder }));
      await ask(app, (responder) => ({ kind: 'open_window', window: 'clock', responder }));

      app.handleCommand({ kind: 'close_all' });

      assert.deepEqual(app.getOpenWindows(), []);
    });
  });

  void describe('queries', () => {
    void it('prints variables sorted by name', async () => {
      const result = await ask(app, (responder) => ({ kind: 'print_state', responder }));

      assert.deepEqual(result, { kind: 'success', payload: 'theme: dark\nvolume: 40' });
    });

    void it('prints windows in declaration order, marking open ones', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'clock', responder }));

      const result = await ask(app, (responder) => ({ kind: 'print_windows', responder }));

      assert.deepEqual(result, { kind: 'success', payload: 'bar\n*clock' });
    });

    void it('prints a debug summary', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'bar', responder }));

      const result = await ask(app, (responder) => ({ kind: 'print_debug', responder }));

      assert.deepEqual(result, {
        kind: 'success',
        payload: [
          'config dir: /cfg',
          'config file: /cfg/widgetd.yuck',
          'stylesheet: 7 bytes',
          'windows: bar, clock',
          'open windows: bar',
          'variables: 2',
        ].join('\n'),
      });
    });
  });

  void describe('reload_config_and_css', () => {
    void it('replaces configuration and stylesheet and resets variables', async () => {
      app.handleCommand({ kind: 'update_vars', assignments: [['volume', '70']] });
      loader.files.set(PATHS.yuckPath, '(defvar volume 10)\n(defwindow bar)');
      loader.files.delete(PATHS.scssPath);

      const result = await ask(app, (responder) => ({ kind: 'reload_config_and_css', responder }));

      assert.deepEqual(result, { kind: 'success', payload: '' });
      assert.equal(app.getVar('volume'), '10');
      assert.equal(app.getVar('theme'), undefined);
      assert.equal(app.getStylesheet(), null);
      assert.deepEqual([...app.getConfig().windows.keys()], ['bar']);
    });

    void it('closes open windows that are no longer defined', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'bar', responder }));
      await ask(app, (responder) => ({ kind: 'open_window', window: 'clock', responder }));
      loader.files.set(PATHS.yuckPath, '(defwindow bar)');

      await ask(app, (responder) => ({ kind: 'reload_config_and_css', responder }));

      assert.deepEqual(app.getOpenWindows(), ['bar']);
    });

    void it('keeps the previous state when the new configuration is invalid', async () => {
      loader.files.set(PATHS.yuckPath, '(defwindow bar');

      const result = await ask(app, (responder) => ({ kind: 'reload_config_and_css', responder }));

      assert.deepEqual(result, {
        kind: 'failure',
        message: 'widgetd.yuck:1: Unclosed "(" opened here',
      });
      assert.deepEqual([...app.getConfig().windows.keys()], ['bar', 'clock']);
      assert.equal(app.getVar('volume'), '40');
    });
  });

  void describe('kill_server', () => {
    void it('closes every window and stops', async () => {
      await ask(app, (responder) => ({ kind: 'open_window', window: 'bar', responder }));

      app.handleCommand({ kind: 'kill_server' });

      assert.equal(app.isStopped, true);
      assert.deepEqual(app.getOpenWindows(), []);
    });
  });

  void it('drops the answer quietly when the requester stopped waiting', () => {
    const [responder, response] = createOneshot<DaemonResponse>();
    response.close();

    app.handleCommand({ kind: 'print_state', responder });

    assert.equal(responder.isReceiverClosed, true);
  });
});
