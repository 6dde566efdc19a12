/**
 * Bounded Outbound Queue
 *
 * FIFO channel between many producers (position handlers) and the single TAK
 * writer. Producers wait for space up to a timeout; the consumer waits for
 * items until its signal is aborted.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type OfferResult =
  | "accepted"   // Item is in the queue (or handed straight to the consumer)
  | "timeout"    // No space within the timeout
  | "closed";    // Queue was drained while waiting

interface PendingProducer<T> {
  item: T;
  resolve: (result: OfferResult) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface PendingConsumer<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BOUNDED QUEUE
// ═══════════════════════════════════════════════════════════════════════════════

export class BoundedQueue<T> {
  readonly capacity: number;
  private items: T[] = [];
  private producers: PendingProducer<T>[] = [];
  private consumers: PendingConsumer<T>[] = [];
  private highWaterMark = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /** Highest occupancy seen */
  get maxSize(): number {
    return this.highWaterMark;
  }

  /**
   * Enqueue without waiting. Returns false when full.
   */
  tryOffer(item: T): boolean {
    const consumer = this.consumers.shift();
    if (consumer) {
      this.settleConsumer(consumer);
      consumer.resolve(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.push(item);
    return true;
  }

  /**
   * Enqueue, waiting up to timeoutMs for space.
   */
  offer(item: T, timeoutMs: number): Promise<OfferResult> {
    if (this.tryOffer(item)) {
      return Promise.resolve("accepted");
    }

    return new Promise<OfferResult>((resolve) => {
      const pending: PendingProducer<T> = {
        item,
        resolve,
        timer: setTimeout(() => {
          this.producers = this.producers.filter((p) => p !== pending);
          resolve("timeout");
        }, timeoutMs),
      };
      this.producers.push(pending);
    });
  }

  /**
   * Dequeue the oldest item, waiting until one arrives.
   * Rejects with the signal's reason when aborted.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) {
        this.admitWaitingProducer();
        return Promise.resolve(item);
      }
    }

    return new Promise<T>((resolve, reject) => {
      const consumer: PendingConsumer<T> = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          this.consumers = this.consumers.filter((c) => c !== consumer);
          reject(signal?.reason);
        },
      };
      signal?.addEventListener("abort", consumer.onAbort, { once: true });
      this.consumers.push(consumer);
    });
  }

  /**
   * Discard everything queued and turn away waiting producers.
   * Returns the number of items discarded.
   */
  drain(): number {
    const discarded = this.items.length;
    this.items = [];

    const producers = this.producers;
    this.producers = [];
    for (const producer of producers) {
      clearTimeout(producer.timer);
      producer.resolve("closed");
    }

    return discarded;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────────────────────────

  private push(item: T): void {
    this.items.push(item);
    this.highWaterMark = Math.max(this.highWaterMark, this.items.length);
  }

  /** A slot just opened; move the longest-waiting producer in */
  private admitWaitingProducer(): void {
    const producer = this.producers.shift();
    if (!producer) return;
    clearTimeout(producer.timer);
    this.push(producer.item);
    producer.resolve("accepted");
  }

  private settleConsumer(consumer: PendingConsumer<T>): void {
    consumer.signal?.removeEventListener("abort", consumer.onAbort);
  }
}
