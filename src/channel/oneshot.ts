/**
 * One-shot channel: carries exactly one value from one sender to one receiver.
 *
 * Either side may give up. If the receiver closes first, `send()` reports
 * false and the value is dropped. If the sender closes without sending,
 * `recv()` resolves to null.
 *
 * @module channel/oneshot
 */

type Settle<T> = (value: T | null) => void;

class OneshotState<T> {
  settled = false;
  receiverClosed = false;
  value: T | null = null;
  waiter: Settle<T> | null = null;

  settle(value: T | null): void {
    this.settled = true;
    this.value = value;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(value);
    }
  }
}

export class OneshotSender<T> {
  /** @internal */
  constructor(private readonly state: OneshotState<T>) {}

  /**
   * Deliver the value.
   *
   * @returns False if a value was already delivered, the sender was closed,
   *   or the receiver has lost interest
   */
  send(value: T): boolean {
    const { state } = this;
    if (state.settled || state.receiverClosed) {
      return false;
    }
    state.settle(value);
    return true;
  }

  /**
   * Close without delivering. A waiting receiver gets null.
   */
  close(): void {
    if (!this.state.settled) {
      this.state.settle(null);
    }
  }

  get isReceiverClosed(): boolean {
    return this.state.receiverClosed;
  }
}

export class OneshotReceiver<T> {
  private consumed = false;

  /** @internal */
  constructor(private readonly state: OneshotState<T>) {}

  /**
   * Wait for the value. May be called once.
   *
   * @returns The value, or null if the sender closed without sending
   */
  recv(): Promise<T | null> {
    if (this.consumed) {
      return Promise.reject(new Error('One-shot receiver already consumed'));
    }
    this.consumed = true;

    const { state } = this;
    if (state.settled || state.receiverClosed) {
      return Promise.resolve(state.value);
    }
    return new Promise<T | null>((resolve) => {
      state.waiter = resolve;
    });
  }

  /**
   * Stop waiting. Later sends report false.
   */
  close(): void {
    const { state } = this;
    state.receiverClosed = true;
    const waiter = state.waiter;
    if (waiter) {
      state.waiter = null;
      waiter(null);
    }
  }
}

/**
 * Create a one-shot channel.
 *
 * @example
 * ```typescript
 * const [responder, response] = createOneshot<DaemonResponse>();
 * sink.send({ kind: 'reload_config_and_css', responder });
 * const result = await response.recv();
 * ```
 */
export function createOneshot<T>(): [OneshotSender<T>, OneshotReceiver<T>] {
  const state = new OneshotState<T>();
  return [new OneshotSender(state), new OneshotReceiver(state)];
}
