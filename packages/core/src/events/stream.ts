/**
 * Event Stream
 *
 * Single-consumer async channel between a running agent and its caller. The
 * producer is held back once `capacity` events are waiting, so a slow
 * consumer slows the run down instead of growing the buffer.
 *
 * @module @helmsman/core/events/stream
 */

export interface EventStreamOptions {
  /** Events buffered before `push` waits (default: 1000) */
  capacity?: number;
  /** Called once if the consumer stops iterating before the end */
  onDetach?: () => void;
}

export const DEFAULT_STREAM_CAPACITY = 1000;

interface PendingRead<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * @example
 * ```typescript
 * const stream = new EventStream<string>({ capacity: 10 });
 * void (async () => {
 *   await stream.push("a");
 *   stream.end();
 * })();
 * for await (const item of stream) console.log(item);
 * ```
 */
export class EventStream<T> implements AsyncIterable<T> {
  readonly #capacity: number;
  readonly #onDetach?: () => void;
  readonly #buffer: Array<{ value: T }> = [];
  #producers: Array<() => void> = [];
  #reader: PendingRead<T> | undefined;
  #closed = false;
  #failure: { error: unknown } | undefined;
  #detached = false;

  constructor(options: EventStreamOptions = {}) {
    this.#capacity = Math.max(1, options.capacity ?? DEFAULT_STREAM_CAPACITY);
    this.#onDetach = options.onDetach;
  }

  /** True once the consumer has stopped iterating early */
  get detached(): boolean {
    return this.#detached;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Deliver a value. Resolves once it fits in the buffer. Values pushed after
   * `end`, `fail` or a detach are dropped.
   */
  async push(value: T): Promise<void> {
    if (this.#closed || this.#detached) {
      return;
    }
    if (this.#reader) {
      const reader = this.#reader;
      this.#reader = undefined;
      reader.resolve({ done: false, value });
      return;
    }
    this.#buffer.push({ value });
    while (this.#buffer.length > this.#capacity && !this.#detached) {
      await new Promise<void>((resolve) => this.#producers.push(resolve));
    }
  }

  /** No more values; buffered ones are still delivered */
  end(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#reader?.resolve({ done: true, value: undefined });
    this.#reader = undefined;
  }

  /** Deliver buffered values, then reject the consumer with `error` */
  fail(error: unknown): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#failure = { error };
    this.#reader?.reject(error);
    this.#reader = undefined;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.#next(),
      return: async () => {
        this.#detach();
        return { done: true, value: undefined };
      },
    };
  }

  /** Consume everything until the stream ends */
  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  #next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.#buffer.shift();
    if (entry) {
      this.#producers.shift()?.();
      return Promise.resolve({ done: false, value: entry.value });
    }
    if (this.#failure) {
      return Promise.reject(this.#failure.error);
    }
    if (this.#closed || this.#detached) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.#reader = { resolve, reject };
    });
  }

  #detach(): void {
    if (this.#detached || this.#closed) {
      return;
    }
    this.#detached = true;
    this.#buffer.length = 0;
    for (const release of this.#producers) {
      release();
    }
    this.#producers = [];
    this.#onDetach?.();
  }
}
