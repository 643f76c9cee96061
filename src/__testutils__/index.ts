/**
 * Test utilities - Re-export all test helpers
 *
 * Single import point for all test utilities:
 * ```ts
 * import { FakeClock, useFakeClock, createTempDir } from '@/__testutils__/index.js';
 * ```
 */

export { FakeClock } from './FakeClock.js';
export { useFakeClock, type ClockHelper } from './testClock.js';
export { assertEventually, retryUntil } from './assertions.js';
export { createTempDir, type TempDir } from './tempDir.js';
export { FakeChild, FakeDetachHost, FakeSignalSource, MemoryConfigLoader } from './fakes.js';
