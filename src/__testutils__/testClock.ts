/**
 * testClock - installs a FakeClock in place of the global timer functions
 */

import { FakeClock } from './FakeClock.js';

export interface ClockHelper {
  clock: FakeClock;
  tick: (ms: number) => void;
  restore: () => void;
}

/**
 * Replace setTimeout/clearTimeout with a fake clock.
 *
 * Usage:
 * ```typescript
 * const { tick, restore } = useFakeClock();
 * gate.tryClose();
 * tick(500); // reopen timer fires
 * restore();
 * ```
 */
export function useFakeClock(): ClockHelper {
  const clock = new FakeClock();

  // Store original timer functions
  const originalSetTimeout = global.setTimeout;
  const originalClearTimeout = global.clearTimeout;

  global.setTimeout = ((callback: () => void, delay: number) => {
    return clock.setTimeout(callback, delay);
  }) as typeof setTimeout;

  global.clearTimeout = ((id: NodeJS.Timeout | undefined) => {
    clock.clearTimer(id);
  }) as typeof clearTimeout;

  return {
    clock,

    /**
     * Advance time and run due timers
     */
    tick(ms: number): void {
      clock.tick(ms);
    },

    /**
     * Restore original timer functions
     * IMPORTANT: Call this in afterEach() to avoid polluting other tests
     */
    restore(): void {
      global.setTimeout = originalSetTimeout;
      global.clearTimeout = originalClearTimeout;
      clock.reset();
    },
  };
}
