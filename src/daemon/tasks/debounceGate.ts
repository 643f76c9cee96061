/**
 * Debounce Gate
 *
 * Open → Closed → (cooldown timer) → Open.
 *
 * `tryClose()` succeeds for exactly one caller per cooldown window; the
 * cooldown timer is armed by that caller and reopens the gate on expiry
 * regardless of further activity. The event loop runs one callback at a
 * time, so the check-and-set in `tryClose()` cannot interleave with another
 * caller.
 */

import { RELOAD_DEBOUNCE_MS } from '@/constants.js';

export type GateState = 'open' | 'closed';

export class DebounceGate {
  private state: GateState = 'open';
  private reopenTimer: NodeJS.Timeout | null = null;

  constructor(private readonly cooldownMs: number = RELOAD_DEBOUNCE_MS) {
    if (cooldownMs < 0) {
      throw new Error('Debounce cooldown must not be negative');
    }
  }

  /**
   * Close the gate if it is open and arm the reopen timer.
   *
   * @returns True only for the call that performed the open → closed transition
   */
  tryClose(): boolean {
    if (this.state === 'closed') {
      return false;
    }
    this.state = 'closed';

    this.reopenTimer = setTimeout(() => {
      this.reopenTimer = null;
      this.state = 'open';
    }, this.cooldownMs);
    this.reopenTimer.unref?.();

    return true;
  }

  get current(): GateState {
    return this.state;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Cancel a pending reopen and leave the gate open.
   */
  dispose(): void {
    if (this.reopenTimer) {
      clearTimeout(this.reopenTimer);
      this.reopenTimer = null;
    }
    this.state = 'open';
  }
}
