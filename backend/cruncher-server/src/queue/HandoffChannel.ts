/**
 * HandoffChannel
 *
 * A zero-capacity rendezvous between producers and consumers. `offer()` hands
 * an item straight to a consumer already parked in `receive()` and fails
 * otherwise; nothing is ever buffered, so "no consumer ready" and "queue full"
 * are the same condition.
 *
 * Consumers are served in the order they started waiting. Closing the channel
 * wakes every parked consumer with `done: true`.
 */

export type ReceiveResult<T> = { done: false; value: T } | { done: true };

type Receiver<T> = (result: ReceiveResult<T>) => void;

export class HandoffChannel<T> implements AsyncIterable<T> {
  private readonly receivers: Receiver<T>[] = [];
  private closed: boolean = false;

  /**
   * Hand an item to a waiting consumer without blocking.
   *
   * @returns true if a consumer took the item, false if none was waiting
   *          or the channel is closed
   */
  offer(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const receiver = this.receivers.shift();
    if (!receiver) {
      return false;
    }

    receiver({ done: false, value });
    return true;
  }

  /**
   * Wait for the next item. Resolves with `done: true` once the channel closes.
   */
  receive(): Promise<ReceiveResult<T>> {
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Close the channel. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Number of consumers currently parked in receive() */
  get waitingReceivers(): number {
    return this.receivers.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}
