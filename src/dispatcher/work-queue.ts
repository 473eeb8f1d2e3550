import { QueueFullError, RejectedError } from '../errors/app-error.js';
import {
  type CancellableTimeout,
  createUnrefTimeout,
} from '../lib/timer-utils.js';

interface EnqueueOptions {
  /** How long to wait for space; 0 fails at once when full. */
  timeoutMs: number;
}

interface BlockedProducer<T> {
  item: T;
  resolve: () => void;
  reject: (error: unknown) => void;
  timeout: CancellableTimeout<null>;
}

/**
 * Bounded FIFO between the submit path and the worker loops.
 *
 * `dequeue()` resolves `null` only once the queue is closed and empty,
 * which is how idle workers learn that they should exit.
 */
export class WorkQueue<T> {
  private items: (T | undefined)[] = [];
  private head = 0;
  private readonly consumers: ((item: T | null) => void)[] = [];
  private readonly producers: BlockedProducer<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Queue capacity must be a positive integer');
    }
  }

  get depth(): number {
    const depth = this.items.length - this.head;
    return depth > 0 ? depth : 0;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get waitingConsumers(): number {
    return this.consumers.length;
  }

  get blockedProducers(): number {
    return this.producers.length;
  }

  tryEnqueue(item: T): boolean {
    this.ensureOpen();
    if (this.handToConsumer(item)) return true;
    if (this.depth >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  enqueue(item: T, options: EnqueueOptions): Promise<void> {
    try {
      if (this.tryEnqueue(item)) return Promise.resolve();
    } catch (error: unknown) {
      return Promise.reject(error);
    }

    if (options.timeoutMs <= 0) {
      return Promise.reject(new QueueFullError(this.capacity));
    }

    return new Promise<void>((resolve, reject) => {
      const timeout = createUnrefTimeout(options.timeoutMs, null);
      const producer: BlockedProducer<T> = { item, resolve, reject, timeout };
      this.producers.push(producer);

      void timeout.promise
        .then(() => {
          if (!this.removeProducer(producer)) return;
          reject(new QueueFullError(this.capacity));
        })
        .catch((error: unknown) => {
          if (this.removeProducer(producer)) reject(error);
        });
    });
  }

  dequeue(): Promise<T | null> {
    const item = this.take();
    if (item !== undefined) return Promise.resolve(item);
    if (this.isClosed) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Stops accepting new items. Queued items can still be dequeued and
   * producers already blocked keep their place until space frees up or
   * their own timeout fires. Idle consumers wake with `null`.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    // Consumers only wait while the queue is empty, so no producer is blocked.
    for (const consumer of this.consumers.splice(0, this.consumers.length)) {
      consumer(null);
    }
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    const drained: T[] = [];
    let item = this.take();
    while (item !== undefined) {
      drained.push(item);
      item = this.take();
    }
    return drained;
  }

  private ensureOpen(): void {
    if (this.isClosed) throw new RejectedError('closed');
  }

  private removeProducer(producer: BlockedProducer<T>): boolean {
    const index = this.producers.indexOf(producer);
    if (index === -1) return false;
    this.producers.splice(index, 1);
    return true;
  }

  private handToConsumer(item: T): boolean {
    const consumer = this.consumers.shift();
    if (!consumer) return false;
    consumer(item);
    return true;
  }

  private take(): T | undefined {
    while (this.head < this.items.length) {
      const item = this.items[this.head];
      this.items[this.head] = undefined;
      this.head += 1;

      if (item !== undefined) {
        this.maybeCompact();
        this.admitBlockedProducer();
        return item;
      }
    }

    this.maybeCompact();
    return undefined;
  }

  private admitBlockedProducer(): void {
    if (this.depth >= this.capacity) return;
    const producer = this.producers.shift();
    if (!producer) return;
    producer.timeout.cancel();
    this.items.push(producer.item);
    producer.resolve();
  }

  private maybeCompact(): void {
    if (this.head === 0) return;

    if (
      this.head >= this.items.length ||
      (this.head > 1024 && this.head > this.items.length / 2)
    ) {
      this.items.splice(0, this.head);
      this.head = 0;
    }
  }
}
