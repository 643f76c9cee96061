/**
 * Config watcher contract tests
 *
 * Runs the real chokidar watch over a temporary directory.
 *
 * Contract:
 * - Input: filesystem changes under the configuration directory
 * - Output: reload_config_and_css commands on the queue
 * - Behavior: run() ends on close(), an unusable directory fails at startup
 */

import assert from 'node:assert/strict';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { assertEventually, createTempDir, type TempDir } from '@/__testutils__/index.js';
import { success, type DaemonCommand } from '@/app/commands.js';
import { createQueue } from '@/channel/queue.js';
import { DaemonStartupError } from '@/daemon/errors.js';
import { DebounceGate } from '@/daemon/tasks/debounceGate.js';
import { ConfigWatcher } from '@/daemon/tasks/fileWatcher.js';

void describe('ConfigWatcher contract', () => {
  let tempDir: TempDir;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  void it('sends a reload when a config file in a subdirectory changes', async () => {
    const nested = join(tempDir.path, 'bar');
    mkdirSync(nested);
    const [sender, receiver] = createQueue<DaemonCommand>();
    const watcher = new ConfigWatcher(tempDir.path, sender, new DebounceGate(200));
    const running = watcher.run();

    // The watch is registered asynchronously; keep touching the file until it reports
    let revision = 0;
    await assertEventually(
      () => {
        writeFileSync(join(nested, 'panel.yuck'), `(defvar revision ${revision++})`);
        return receiver.size > 0;
      },
      5000,
      'No reload command after changing panel.yuck'
    );

    const command = await receiver.recv();
    assert.equal(command?.kind, 'reload_config_and_css');
    if (command?.kind === 'reload_config_and_css') {
      command.responder.send(success());
    }

    await watcher.close();
    await running;
  });

  void it('never reloads for files without a relevant extension', async () => {
    const [sender, receiver] = createQueue<DaemonCommand>();
    const watcher = new ConfigWatcher(tempDir.path, sender, new DebounceGate(200));
    const running = watcher.run();

    for (let i = 0; i < 5; i++) {
      writeFileSync(join(tempDir.path, 'notes.txt'), `note ${i}`);
      await new Promise((resolve) => setTimeout(resolve, 50));
    }

    assert.equal(receiver.size, 0);
    await watcher.close();
    await running;
  });

  void it('fails at startup when the directory does not exist', async () => {
    const [sender] = createQueue<DaemonCommand>();
    const watcher = new ConfigWatcher(join(tempDir.path, 'missing'), sender);

    await assert.rejects(watcher.run(), (error: unknown) => {
      assert.ok(error instanceof DaemonStartupError);
      assert.equal(error.code, 'WATCH_SETUP_FAILED');
      return true;
    });
  });

  void it('fails at startup when the path is a file', async () => {
    const filePath = join(tempDir.path, 'widgetd.yuck');
    writeFileSync(filePath, '');
    const [sender] = createQueue<DaemonCommand>();
    const watcher = new ConfigWatcher(filePath, sender);

    await assert.rejects(watcher.run(), {
      name: 'DaemonStartupError',
      message: `${filePath} is not a directory`,
    });
  });

  void it('returns straight away when closed before it started', async () => {
    const [sender] = createQueue<DaemonCommand>();
    const watcher = new ConfigWatcher(tempDir.path, sender);

    await watcher.close();
    await watcher.run();
  });
});
