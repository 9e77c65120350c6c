/**
 * Bounded async FIFO
 *
 * The channel primitive between pipeline stages:
 * - offer(): waits for space up to a timeout (bounded-block producers)
 * - pushDropOldest(): evicts the oldest queued item when full (best-effort consumers)
 * - async iteration drains remaining items after close(); after fail() the
 *   iterator throws the failure once the buffer is empty
 */

export type OfferOutcome = 'accepted' | 'timeout' | 'closed' | 'aborted';

export interface DropOldestOutcome<T> {
  accepted: boolean;
  dropped: T | undefined;
}

interface Taker<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

type SpaceOutcome = 'space' | 'timeout' | 'aborted';

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private takers: Taker<T>[] = [];
  private spaceWaiters: Set<() => void> = new Set();
  private closed = false;
  private failed = false;
  private failure: unknown = undefined;

  constructor(public readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity > 0)) {
      throw new RangeError(`queue capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Non-blocking enqueue. Returns false when full or closed. */
  push(item: T): boolean {
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker.resolve({ value: item, done: false });
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Enqueue, evicting the oldest queued item `evictable` allows when full.
   * With nothing evictable the new item itself is dropped.
   */
  pushDropOldest(item: T, evictable: (queued: T) => boolean = () => true): DropOldestOutcome<T> {
    if (this.closed) return { accepted: false, dropped: undefined };

    let dropped: T | undefined;
    if (this.takers.length === 0 && this.items.length >= this.capacity) {
      const index = this.items.findIndex(evictable);
      if (index === -1) return { accepted: false, dropped: item };
      [dropped] = this.items.splice(index, 1);
    }
    this.push(item);
    return { accepted: true, dropped };
  }

  /**
   * Enqueue, waiting for space while the queue is full.
   * Resolves 'timeout' once `timeoutMs` passes without space.
   */
  async offer(item: T, timeoutMs: number = Number.POSITIVE_INFINITY, signal?: AbortSignal): Promise<OfferOutcome> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (this.closed) return 'closed';
      if (signal?.aborted) return 'aborted';
      if (this.push(item)) return 'accepted';

      const remaining = deadline - Date.now();
      if (remaining <= 0) return 'timeout';

      const outcome = await this.waitForSpace(remaining, signal);
      if (outcome !== 'space') return outcome;
    }
  }

  async shift(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      this.wakeOneProducer();
      return { value, done: false };
    }

    if (this.closed) {
      if (this.failed) throw this.failure;
      return { value: undefined, done: true };
    }

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.takers.push({ resolve, reject });
    });
  }

  /** Stop accepting items. Queued items are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker.resolve({ value: undefined, done: true });
    }
    this.wakeAllProducers();
  }

  /** Close with a terminal error, raised to the reader after the buffer drains. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failed = true;
    this.failure = error;
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker.reject(error);
    }
    this.wakeAllProducers();
  }

  /** Discard queued items, returning how many were removed. */
  clear(): number {
    const removed = this.items.length;
    this.items = [];
    this.wakeAllProducers();
    return removed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.shift(),
      return: async (): Promise<IteratorResult<T>> => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private waitForSpace(timeoutMs: number, signal?: AbortSignal): Promise<SpaceOutcome> {
    return new Promise<SpaceOutcome>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (outcome: SpaceOutcome): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.spaceWaiters.delete(wake);
        resolve(outcome);
      };
      const wake = (): void => finish('space');
      const onAbort = (): void => finish('aborted');

      this.spaceWaiters.add(wake);
      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => finish('timeout'), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wakeOneProducer(): void {
    for (const wake of this.spaceWaiters) {
      wake();
      return;
    }
  }

  private wakeAllProducers(): void {
    for (const wake of [...this.spaceWaiters]) {
      wake();
    }
  }
}
