import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';

import { resolveDispatcherOptions } from '../config/schema.js';
import {
  type InvariantViolationError,
  QueueFullError,
  RejectedError,
  TimeoutError,
} from '../errors/app-error.js';
import { createUnrefTimeout } from '../lib/timer-utils.js';
import { logDebug, logError, logInfo } from '../services/logger.js';
import { AdmissionGate, type Permit } from './admission-gate.js';
import { InFlightRegistry, type Job } from './in-flight.js';
import { errorOutcome } from './outcome.js';
import { createReplyChannel, type ReplyReceiver } from './reply-channel.js';
import { ShutdownCoordinator } from './shutdown-coordinator.js';
import { StatsAggregator, type StatsEvent } from './stats-aggregator.js';
import type {
  DispatcherLoad,
  DispatcherOptions,
  DispatcherState,
  DispatcherStats,
  DispatchRequest,
  Outcome,
  Processor,
  ShutdownReport,
  SubmitOptions,
} from './types.js';
import { WorkQueue } from './work-queue.js';
import { WorkerPool } from './worker-pool.js';

type OutcomeListener<R> = (outcome: Outcome<R>) => void | Promise<void>;
type StateListener = (state: DispatcherState) => void | Promise<void>;

type Admission<R> =
  | { kind: 'settled'; outcome: Outcome<R> }
  | { kind: 'admitted'; receiver: ReplyReceiver<Outcome<R>> };

/**
 * Bounded-concurrency dispatcher: admission gate → work queue → worker
 * pool → reply channel, with every outcome credited to the statistics
 * aggregator.
 */
export class Dispatcher<P, R> {
  readonly options: Readonly<DispatcherOptions>;

  private readonly gate: AdmissionGate;
  private readonly queue: WorkQueue<Job<P, R>>;
  private readonly stats = new StatsAggregator();
  private readonly registry: InFlightRegistry<P, R>;
  private readonly pool: WorkerPool<P, R>;
  private readonly coordinator: ShutdownCoordinator<P, R>;
  private readonly events = new EventEmitter();
  private requestSeq = 1;

  constructor(processor: Processor<P, R>, options: DispatcherOptions) {
    this.options = Object.freeze({ ...options });
    this.gate = new AdmissionGate(
      options.admissionLimit,
      options.admissionPolicy
    );
    this.queue = new WorkQueue<Job<P, R>>(options.queueCapacity);
    this.registry = new InFlightRegistry<P, R>({
      gate: this.gate,
      stats: this.stats,
      onSettled: (outcome) => {
        this.emit('outcome', outcome);
      },
      onInvariantViolation: (error) => {
        this.halt(error);
      },
    });
    this.pool = new WorkerPool<P, R>({
      size: options.workerCount,
      queue: this.queue,
      registry: this.registry,
      processor,
    });
    this.coordinator = new ShutdownCoordinator<P, R>({
      gate: this.gate,
      queue: this.queue,
      pool: this.pool,
      registry: this.registry,
      stats: this.stats,
      defaultGracePeriodMs: options.shutdownGracePeriodMs,
      onStateChange: (state) => {
        this.emit('state', state);
      },
    });

    this.pool.start();
    logInfo('Dispatcher started', { ...this.options });
  }

  /**
   * Submits one request and waits for its outcome. Operational failures
   * (rejection, full queue, deadline, processing fault, shutdown abort)
   * come back as the outcome's status; the promise only rejects when
   * `options.signal` abandons the wait, for a permit or for the outcome.
   */
  async submit(payload: P, options: SubmitOptions = {}): Promise<Outcome<R>> {
    const { signal } = options;
    signal?.throwIfAborted();

    const request = this.createRequest(payload, options.timeoutMs);
    this.publish({ type: 'submitted', requestId: request.id });

    const admission = await this.admit(request, signal);
    if (admission.kind === 'settled') {
      signal?.throwIfAborted();
      return admission.outcome;
    }
    return admission.receiver.receive(signal);
  }

  statsSnapshot(): DispatcherStats {
    return this.stats.snapshot();
  }

  shutdown(gracePeriodMs?: number): Promise<ShutdownReport> {
    return this.coordinator.shutdown(gracePeriodMs);
  }

  getState(): DispatcherState {
    return this.coordinator.getState();
  }

  get fatalError(): InvariantViolationError | null {
    return this.coordinator.fatalError;
  }

  getLoad(): DispatcherLoad {
    return {
      state: this.coordinator.getState(),
      inFlight: this.gate.inFlight,
      availablePermits: this.gate.available,
      pendingAdmissions: this.gate.pending,
      queueDepth: this.queue.depth,
      activeWorkers: this.pool.getActiveWorkers(),
    };
  }

  onOutcome(listener: OutcomeListener<R>): () => void {
    return this.subscribe('outcome', listener);
  }

  onStateChange(listener: StateListener): () => void {
    return this.subscribe('state', listener);
  }

  private createRequest(
    payload: P,
    timeoutMs: number | undefined
  ): DispatchRequest<P> {
    const submittedAt = performance.now();
    const effectiveTimeout = resolveTimeout(
      timeoutMs,
      this.options.perRequestTimeoutMs
    );

    return Object.freeze({
      id: this.requestSeq++,
      payload,
      timeoutMs: effectiveTimeout,
      submittedAt,
      deadlineAt:
        effectiveTimeout === undefined
          ? undefined
          : submittedAt + effectiveTimeout,
    });
  }

  private async admit(
    request: DispatchRequest<P>,
    callerSignal: AbortSignal | undefined
  ): Promise<Admission<R>> {
    if (!this.coordinator.isAccepting()) {
      return this.settleUnadmitted(request, new RejectedError('closed'));
    }

    const { timeoutMs, deadlineAt } = request;
    if (deadlineAt !== undefined && deadlineAt <= performance.now()) {
      return this.settleUnadmitted(request, new TimeoutError(timeoutMs ?? 0));
    }

    let permit: Permit;
    try {
      permit = await this.acquirePermit(request, callerSignal);
    } catch (error: unknown) {
      if (callerSignal?.aborted && error === callerSignal.reason) {
        return this.settleUnadmitted(
          request,
          new RejectedError('limit', 'Caller stopped waiting for a permit')
        );
      }
      return this.settleUnadmitted(request, error);
    }

    if (!this.coordinator.isAccepting()) {
      this.registry.releasePermit(permit);
      return this.settleUnadmitted(request, new RejectedError('closed'));
    }

    const [sender, receiver] = createReplyChannel<Outcome<R>>();
    const job = this.registry.track(request, permit, sender);

    try {
      await this.enqueue(job);
    } catch (error: unknown) {
      this.registry.settle(job, errorOutcome<R>(request, error));
    }

    return { kind: 'admitted', receiver };
  }

  /** Waits for a permit until the deadline passes or the caller aborts. */
  private async acquirePermit(
    request: DispatchRequest<P>,
    callerSignal: AbortSignal | undefined
  ): Promise<Permit> {
    const { timeoutMs, deadlineAt } = request;
    const deadline = new AbortController();
    const timer =
      deadlineAt === undefined
        ? undefined
        : createUnrefTimeout(deadlineAt - performance.now(), null);
    void timer?.promise.then(() => {
      deadline.abort(new TimeoutError(timeoutMs ?? 0));
    });

    try {
      return await this.gate.acquire({
        signal: callerSignal
          ? AbortSignal.any([deadline.signal, callerSignal])
          : deadline.signal,
      });
    } finally {
      timer?.cancel();
    }
  }

  private async enqueue(job: Job<P, R>): Promise<void> {
    if (this.options.queueFullPolicy === 'wait') {
      await this.queue.enqueue(job, {
        timeoutMs: this.options.enqueueTimeoutMs,
      });
      return;
    }

    if (!this.queue.tryEnqueue(job)) {
      throw new QueueFullError(this.queue.capacity);
    }
  }

  private settleUnadmitted(
    request: DispatchRequest<P>,
    error: unknown
  ): Admission<R> {
    const outcome = errorOutcome<R>(request, error);

    logDebug('Request settled without admission', {
      requestId: request.id,
      status: outcome.status,
    });
    this.publish({ type: 'completed', outcome });
    this.emit('outcome', outcome);
    return { kind: 'settled', outcome };
  }

  // Submissions after stop are still answered but no longer counted.
  private publish(event: StatsEvent): void {
    if (this.stats.sealed) return;
    this.stats.publish(event);
  }

  private halt(error: InvariantViolationError): void {
    this.coordinator.halt(error);
  }

  private subscribe<T>(
    event: 'outcome' | 'state',
    listener: (value: T) => void | Promise<void>
  ): () => void {
    const wrapped = (value: T): void => {
      try {
        const result = listener(value);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            logError(`Dispatcher ${event} listener failed (async)`, {
              error: String(error),
            });
          });
        }
      } catch (error) {
        logError(`Dispatcher ${event} listener failed`, {
          error: String(error),
        });
      }
    };

    this.events.on(event, wrapped);
    return () => {
      this.events.off(event, wrapped);
    };
  }

  private emit(event: 'outcome' | 'state', value: unknown): void {
    this.events.emit(event, value);
  }
}

// A missing timeout falls back to the default; Infinity or NaN means none.
function resolveTimeout(
  timeoutMs: number | undefined,
  defaultTimeoutMs: number
): number | undefined {
  if (timeoutMs === undefined) {
    return defaultTimeoutMs > 0 ? defaultTimeoutMs : undefined;
  }
  if (Number.isNaN(timeoutMs) || timeoutMs === Number.POSITIVE_INFINITY) {
    return undefined;
  }
  return timeoutMs;
}

export function createDispatcher<P, R>(
  processor: Processor<P, R>,
  options: Partial<DispatcherOptions> = {}
): Dispatcher<P, R> {
  return new Dispatcher(processor, resolveDispatcherOptions(options));
}
