/**
 * CommandRunner unit tests
 *
 * Output is captured through a recording CommandIO; nothing exits.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { executeCommand, type CommandIO } from '@/commands/shared/CommandRunner.js';
import { IPCConnectionError, IPCTimeoutError } from '@/ipc/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

class RecordingIO implements CommandIO {
  readonly out: string[] = [];
  readonly err: string[] = [];

  stdout(text: string): void {
    this.out.push(text);
  }

  stderr(text: string): void {
    this.err.push(text);
  }
}

void describe('executeCommand', () => {
  void it('prints formatted output and exits with SUCCESS', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      async () => ({ success: true, data: { count: 2 } }),
      {},
      (data) => `Updated ${data.count} variables`,
      { io }
    );

    assert.equal(exitCode, EXIT_CODES.SUCCESS);
    assert.deepEqual(io.out, ['Updated 2 variables']);
    assert.deepEqual(io.err, []);
  });

  void it('prints nothing for an empty formatted result', async () => {
    const io = new RecordingIO();

    await executeCommand(
      async () => ({ success: true, data: {} }),
      {},
      () => '',
      { io }
    );

    assert.deepEqual(io.out, []);
  });

  void it('wraps data in the JSON envelope with --json', async () => {
    const io = new RecordingIO();

    await executeCommand(
      async () => ({ success: true, data: { windows: ['bar'] } }),
      { json: true },
      () => 'ignored',
      { io }
    );

    assert.equal(io.out.length, 1);
    assert.deepEqual(JSON.parse(io.out[0] ?? ''), {
      version: VERSION,
      success: true,
      data: { windows: ['bar'] },
    });
  });

  void it('reports a failed result with its exit code', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      async () => ({
        success: false,
        error: 'No window named "dock" is defined',
        exitCode: EXIT_CODES.RESOURCE_NOT_FOUND,
      }),
      {},
      undefined,
      { io }
    );

    assert.equal(exitCode, EXIT_CODES.RESOURCE_NOT_FOUND);
    assert.deepEqual(io.err, ['Error: No window named "dock" is defined']);
  });

  void it('prints a CommandError with its metadata', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      () => {
        throw new CommandError(
          'Invalid assignment "volume": expected name=value',
          { suggestion: 'Example: widgetd update volume=40' },
          EXIT_CODES.INVALID_ARGUMENTS
        );
      },
      {},
      undefined,
      { io }
    );

    assert.equal(exitCode, EXIT_CODES.INVALID_ARGUMENTS);
    assert.deepEqual(io.err, [
      'Error: Invalid assignment "volume": expected name=value',
      'Example: widgetd update volume=40',
    ]);
  });

  void it('explains a missing daemon for connection errors', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      () => {
        throw new IPCConnectionError('IPC ping connection error', '/run/wd.sock', 'ENOENT');
      },
      {},
      undefined,
      { io, configDir: '/cfg' }
    );

    assert.equal(exitCode, EXIT_CODES.RESOURCE_NOT_FOUND);
    assert.deepEqual(io.err, [
      [
        'Error: Daemon not running',
        '  Config: /cfg',
        '',
        'Start the daemon:',
        '  widgetd --config /cfg daemon',
      ].join('\n'),
    ]);
  });

  void it('uses the exit code an IPC error carries', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      () => {
        throw new IPCTimeoutError('state', 2000);
      },
      { json: true },
      undefined,
      { io }
    );

    assert.equal(exitCode, EXIT_CODES.IPC_TIMEOUT);
    assert.deepEqual(JSON.parse(io.out[0] ?? ''), {
      version: VERSION,
      success: false,
      error: 'state request timeout after 2s',
      exitCode: EXIT_CODES.IPC_TIMEOUT,
    });
  });

  void it('falls back to UNHANDLED_EXCEPTION', async () => {
    const io = new RecordingIO();

    const exitCode = await executeCommand(
      () => {
        throw new Error('boom');
      },
      {},
      undefined,
      { io }
    );

    assert.equal(exitCode, EXIT_CODES.UNHANDLED_EXCEPTION);
    assert.deepEqual(io.err, ['Error: boom']);
  });
});
