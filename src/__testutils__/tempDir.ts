/**
 * Temporary directories for tests that need a real filesystem or socket.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TempDir {
  path: string;
  cleanup: () => void;
}

/**
 * Create a fresh directory under the OS temp dir. Short prefix: Unix socket
 * paths inside it must stay under the platform length limit.
 */
export function createTempDir(prefix = 'wd-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
