export interface LagPolicy<T> {
  /** Buffered events kept before the oldest is dropped. */
  capacity: number;
  /** Marker yielded once before the events that follow a drop. */
  lagEvent: () => T;
}

/**
 * Single-consumer async event sequence. Producers `push`, the consumer
 * iterates. Without a lag policy the buffer is unbounded.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private lagged = false;

  constructor(private readonly lag?: LagPolicy<T>) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Returns `false` if the channel is closed and the event was dropped. */
  push(event: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
      return true;
    }
    if (this.lag && this.buffer.length >= this.lag.capacity) {
      this.buffer.shift();
      this.lagged = true;
    }
    this.buffer.push(event);
    return true;
  }

  /** Ends the sequence after the buffered events are consumed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.lagged && this.lag) {
      this.lagged = false;
      return Promise.resolve({ done: false, value: this.lag.lagEvent() });
    }
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) return Promise.resolve({ done: false, value });
    }
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.buffer = [];
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }
}
