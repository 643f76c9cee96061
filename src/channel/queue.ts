/**
 * Unbounded multi-producer / single-consumer queue.
 *
 * Producers each hold their own {@link QueueSender} (obtained with
 * `clone()`); the consumer owns the single {@link QueueReceiver}. Items from
 * one sender arrive in the order that sender sent them. Nothing is promised
 * about the interleaving of different senders.
 *
 * The queue ends when every sender has been closed and the buffer is
 * drained: `recv()` then resolves to `null`. Closing the receiver makes
 * every later `send()` throw {@link QueueClosedError}.
 *
 * @module channel/queue
 */

/**
 * Thrown by `send()` once the receiving side has gone away.
 */
export class QueueClosedError extends Error {
  public override readonly name = 'QueueClosedError';

  constructor() {
    super('Queue receiver is closed');
  }
}

class QueueState<T> {
  readonly buffer: T[] = [];
  pendingRecv: ((item: T | null) => void) | null = null;
  liveSenders = 0;
  receiverClosed = false;

  push(item: T): void {
    if (this.receiverClosed) {
      throw new QueueClosedError();
    }

    const waiter = this.pendingRecv;
    if (waiter) {
      this.pendingRecv = null;
      waiter(item);
      return;
    }
    this.buffer.push(item);
  }

  senderClosed(): void {
    this.liveSenders--;
    if (this.liveSenders === 0 && this.buffer.length === 0 && this.pendingRecv) {
      const waiter = this.pendingRecv;
      this.pendingRecv = null;
      waiter(null);
    }
  }
}

/**
 * Producer handle. Cheap to clone; each clone must be closed separately.
 */
export class QueueSender<T> {
  private closed = false;

  /** @internal */
  constructor(private readonly state: QueueState<T>) {
    state.liveSenders++;
  }

  /**
   * Enqueue an item. Never blocks.
   *
   * @throws QueueClosedError if the receiver is closed
   * @throws Error if this handle was closed
   */
  send(item: T): void {
    if (this.closed) {
      throw new Error('Cannot send on a closed sender handle');
    }
    this.state.push(item);
  }

  /**
   * Create another producer handle on the same queue.
   */
  clone(): QueueSender<T> {
    if (this.closed) {
      throw new Error('Cannot clone a closed sender handle');
    }
    return new QueueSender(this.state);
  }

  /**
   * Release this handle. Safe to call multiple times.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.state.senderClosed();
  }

  get isReceiverClosed(): boolean {
    return this.state.receiverClosed;
  }
}

/**
 * Consumer handle. There is exactly one per queue.
 */
export class QueueReceiver<T> implements AsyncIterable<T> {
  /** @internal */
  constructor(private readonly state: QueueState<T>) {}

  /**
   * Take the next item, suspending while the queue is empty.
   *
   * @returns The next item, or null once every sender is closed and the
   *   buffer is empty (or the receiver itself was closed)
   */
  recv(): Promise<T | null> {
    const { state } = this;

    if (state.pendingRecv) {
      return Promise.reject(new Error('Queue already has a pending receive'));
    }

    const next = state.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (state.receiverClosed || state.liveSenders === 0) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      state.pendingRecv = resolve;
    });
  }

  /**
   * Stop receiving. Buffered items are discarded, a pending `recv()`
   * resolves to null, and later sends fail.
   */
  close(): void {
    const { state } = this;
    if (state.receiverClosed) {
      return;
    }
    state.receiverClosed = true;
    state.buffer.length = 0;

    const waiter = state.pendingRecv;
    if (waiter) {
      state.pendingRecv = null;
      waiter(null);
    }
  }

  /**
   * Number of buffered items not yet received.
   */
  get size(): number {
    return this.state.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.recv();
      if (item === null) {
        return;
      }
      yield item;
    }
  }
}

/**
 * Create an unbounded queue.
 *
 * @returns The first sender handle and the receiver
 *
 * @example
 * ```typescript
 * const [sender, receiver] = createQueue<DaemonCommand>();
 * const watcherSender = sender.clone();
 *
 * for await (const command of receiver) {
 *   app.handleCommand(command);
 * }
 * ```
 */
export function createQueue<T>(): [QueueSender<T>, QueueReceiver<T>] {
  const state = new QueueState<T>();
  return [new QueueSender(state), new QueueReceiver(state)];
}
