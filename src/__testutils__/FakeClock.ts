/**
 * FakeClock - Deterministic one-shot timers for tests
 *
 * Timers fire only when the test advances time with tick(). Callbacks run
 * in trigger order; ties run in scheduling order.
 */

interface TimerTask {
  id: number;
  callback: () => void;
  triggerAt: number;
}

export class FakeClock {
  private currentTime = 0;
  private nextTimerId = 1;
  private timerTasks: Map<number, TimerTask> = new Map();

  /**
   * Get current fake time in milliseconds
   */
  now(): number {
    return this.currentTime;
  }

  /**
   * Schedule a one-time timer (setTimeout)
   */
  setTimeout(callback: () => void, delay: number): NodeJS.Timeout {
    const id = this.nextTimerId++;
    this.timerTasks.set(id, { id, callback, triggerAt: this.currentTime + Math.max(0, delay) });
    return id as unknown as NodeJS.Timeout;
  }

  /**
   * Cancel a timer (clearTimeout)
   */
  clearTimer(id: NodeJS.Timeout | undefined): void {
    if (id !== undefined) {
      this.timerTasks.delete(id as unknown as number);
    }
  }

  /**
   * Advance time and run every timer due by then, including timers that
   * callbacks schedule within the window.
   */
  tick(ms: number): void {
    const target = this.currentTime + ms;

    for (;;) {
      const next = this.nextDue(target);
      if (!next) {
        break;
      }
      this.timerTasks.delete(next.id);
      this.currentTime = next.triggerAt;
      next.callback();
    }

    this.currentTime = target;
  }

  /**
   * Get number of pending timers
   */
  getPendingTimers(): number {
    return this.timerTasks.size;
  }

  /**
   * Reset clock to initial state
   */
  reset(): void {
    this.currentTime = 0;
    this.nextTimerId = 1;
    this.timerTasks.clear();
  }

  private nextDue(target: number): TimerTask | undefined {
    let next: TimerTask | undefined;
    for (const task of this.timerTasks.values()) {
      if (task.triggerAt > target) {
        continue;
      }
      if (!next || task.triggerAt < next.triggerAt) {
        next = task;
      }
    }
    return next;
  }
}
