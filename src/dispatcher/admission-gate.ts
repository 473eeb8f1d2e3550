import type { AdmissionPolicy } from '../config/index.js';
import {
  InvariantViolationError,
  RejectedError,
} from '../errors/app-error.js';

export interface Permit {
  readonly id: number;
}

interface AcquireOptions {
  signal?: AbortSignal;
}

interface Waiter {
  resolve: (permit: Permit) => void;
  reject: (error: unknown) => void;
  signal: AbortSignal | undefined;
  abortListener: (() => void) | undefined;
}

/**
 * Counting permit pool bounding concurrently in-flight requests.
 *
 * Released permits are handed to the oldest waiter directly, so a late
 * `acquire()` can never overtake someone already waiting.
 */
export class AdmissionGate {
  private readonly outstanding = new Set<number>();
  private readonly waiters: Waiter[] = [];
  private readonly idleWaiters = new Set<() => void>();
  private permitSeq = 1;
  private closed = false;

  constructor(
    private readonly limit: number,
    private readonly policy: AdmissionPolicy = 'wait'
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError('Admission limit must be a positive integer');
    }
  }

  get inFlight(): number {
    return this.outstanding.size;
  }

  get available(): number {
    return this.limit - this.outstanding.size;
  }

  get pending(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  tryAcquire(): Permit | null {
    if (this.closed) return null;
    if (this.outstanding.size >= this.limit) return null;
    return this.issue();
  }

  acquire(options: AcquireOptions = {}): Promise<Permit> {
    const { signal } = options;
    if (this.closed) return Promise.reject(new RejectedError('closed'));
    if (signal?.aborted) return Promise.reject(signal.reason);

    const permit = this.tryAcquire();
    if (permit) return Promise.resolve(permit);

    if (this.policy === 'reject') {
      return Promise.reject(new RejectedError('limit'));
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        abortListener: undefined,
      };
      if (signal) {
        waiter.abortListener = () => {
          this.removeWaiter(waiter);
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.abortListener, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  release(permit: Permit): void {
    if (!this.outstanding.delete(permit.id)) {
      throw new InvariantViolationError(
        `Permit ${permit.id} released while not outstanding (in flight: ${this.outstanding.size}, limit: ${this.limit})`
      );
    }

    const next = this.waiters.shift();
    if (next) {
      this.detach(next);
      next.resolve(this.issue());
      return;
    }

    if (this.outstanding.size === 0) this.notifyIdle();
  }

  /**
   * Fails every pending and future acquire. Outstanding permits stay valid
   * and must still be released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      this.detach(waiter);
      waiter.reject(new RejectedError('closed'));
    }
  }

  whenIdle(): Promise<void> {
    if (this.outstanding.size === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.add(resolve);
    });
  }

  private issue(): Permit {
    const permit: Permit = Object.freeze({ id: this.permitSeq++ });
    this.outstanding.add(permit.id);
    return permit;
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.abortListener) {
      waiter.signal.removeEventListener('abort', waiter.abortListener);
    }
  }

  private notifyIdle(): void {
    const resolvers = Array.from(this.idleWaiters);
    this.idleWaiters.clear();
    for (const resolve of resolvers) resolve();
  }
}
