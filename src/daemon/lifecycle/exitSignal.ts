/**
 * Exit Signal
 *
 * Shutdown broadcast shared by every long-running task. Signalling is
 * idempotent and permanent: once signalled, every current and future
 * `wait()` resolves. Tasks subscribe on their own; the code that signals
 * never needs to know which tasks exist.
 */

export class ExitSignal {
  private signalled = false;
  private readonly released: Promise<void>;
  private release: () => void = () => {};

  constructor() {
    this.released = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  /**
   * Broadcast shutdown. Only the first call has an effect.
   *
   * @returns True if this call performed the broadcast
   */
  signal(): boolean {
    if (this.signalled) {
      return false;
    }
    this.signalled = true;
    this.release();
    return true;
  }

  /**
   * Resolve once shutdown has been signalled (immediately if it already has).
   */
  wait(): Promise<void> {
    return this.released;
  }

  get isSignalled(): boolean {
    return this.signalled;
  }
}
