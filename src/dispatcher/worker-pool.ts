import { performance } from 'node:perf_hooks';

import { ProcessingError, TimeoutError } from '../errors/app-error.js';
import { createUnrefTimeout, waitForAbort } from '../lib/timer-utils.js';
import { logDebug, logError, logWarn } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import type { InFlightRegistry, Job } from './in-flight.js';
import { errorOutcome, successOutcome } from './outcome.js';
import type { Processor } from './types.js';
import type { WorkQueue } from './work-queue.js';

export interface WorkerSlot {
  readonly id: number;
  busy: boolean;
  currentRequestId: number | null;
  processed: number;
}

interface WorkerPoolOptions<P, R> {
  size: number;
  queue: WorkQueue<Job<P, R>>;
  registry: InFlightRegistry<P, R>;
  processor: Processor<P, R>;
}

type RaceResult<R> =
  | { kind: 'value'; value: R }
  | { kind: 'error'; error: unknown }
  | { kind: 'deadline' }
  | { kind: 'aborted' };

/**
 * Fixed set of worker loops pulling jobs from the work queue. A loop only
 * exits when the queue reports closed-and-empty.
 */
export class WorkerPool<P, R> {
  private readonly slots: WorkerSlot[] = [];
  private loops: Promise<void>[] = [];
  private started = false;

  constructor(private readonly options: WorkerPoolOptions<P, R>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError('Worker count must be a positive integer');
    }
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    for (let id = 1; id <= this.options.size; id += 1) {
      const slot: WorkerSlot = {
        id,
        busy: false,
        currentRequestId: null,
        processed: 0,
      };
      this.slots.push(slot);
      this.loops.push(this.runWorker(slot));
    }
  }

  getActiveWorkers(): number {
    return this.slots.filter((slot) => slot.busy).length;
  }

  getSlots(): readonly Readonly<WorkerSlot>[] {
    return this.slots.map((slot) => ({ ...slot }));
  }

  /** Resolves once every worker loop has exited. */
  async whenStopped(): Promise<void> {
    await Promise.all(this.loops);
  }

  private async runWorker(slot: WorkerSlot): Promise<void> {
    logDebug('Worker started', { workerId: slot.id });

    for (;;) {
      const job = await this.options.queue.dequeue();
      if (job === null) break;

      try {
        await this.runJob(slot, job);
      } catch (error: unknown) {
        logError('Worker loop caught an unexpected fault', {
          workerId: slot.id,
          requestId: job.request.id,
          error: getErrorMessage(error),
        });
        this.options.registry.settle(
          job,
          errorOutcome<R>(
            job.request,
            new ProcessingError(getErrorMessage(error), { cause: error }),
            slot.id
          )
        );
      } finally {
        slot.busy = false;
        slot.currentRequestId = null;
      }
    }

    logDebug('Worker exited', { workerId: slot.id, processed: slot.processed });
  }

  private async runJob(slot: WorkerSlot, job: Job<P, R>): Promise<void> {
    // Force-aborted while it sat in the queue.
    if (job.settled) return;

    const { request } = job;
    slot.busy = true;
    slot.currentRequestId = request.id;
    slot.processed += 1;

    const remainingMs =
      request.deadlineAt === undefined
        ? undefined
        : request.deadlineAt - performance.now();

    if (remainingMs !== undefined && remainingMs <= 0) {
      this.options.registry.settle(
        job,
        errorOutcome<R>(request, this.deadlineError(job), slot.id)
      );
      return;
    }

    const result = await this.raceProcessing(slot, job, remainingMs);

    switch (result.kind) {
      case 'value':
        this.options.registry.settle(
          job,
          successOutcome(request, result.value, slot.id)
        );
        return;
      case 'error':
        logWarn('Request processing failed', {
          workerId: slot.id,
          requestId: request.id,
          error: getErrorMessage(result.error),
        });
        this.options.registry.settle(
          job,
          errorOutcome<R>(
            request,
            new ProcessingError(getErrorMessage(result.error), {
              cause: result.error,
            }),
            slot.id
          )
        );
        return;
      case 'deadline': {
        const error = this.deadlineError(job);
        job.controller.abort(error);
        logDebug('Request deadline elapsed during processing', {
          workerId: slot.id,
          requestId: request.id,
        });
        this.options.registry.settle(
          job,
          errorOutcome<R>(request, error, slot.id)
        );
        return;
      }
      case 'aborted':
        // Already settled by whoever aborted it.
        return;
    }
  }

  private async raceProcessing(
    slot: WorkerSlot,
    job: Job<P, R>,
    remainingMs: number | undefined
  ): Promise<RaceResult<R>> {
    const { request, controller } = job;

    // The processor may lose the race; its settlement is always observed.
    const processing: Promise<RaceResult<R>> = Promise.resolve()
      .then(() =>
        this.options.processor(request.payload, {
          requestId: request.id,
          workerId: slot.id,
          signal: controller.signal,
        })
      )
      .then(
        (value): RaceResult<R> => ({ kind: 'value', value }),
        (error: unknown): RaceResult<R> => ({ kind: 'error', error })
      );

    const deadline =
      remainingMs === undefined
        ? undefined
        : createUnrefTimeout<RaceResult<R>>(remainingMs, { kind: 'deadline' });
    const aborted = waitForAbort<RaceResult<R>>(controller.signal, {
      kind: 'aborted',
    });

    try {
      return await Promise.race(
        deadline
          ? [processing, deadline.promise, aborted.promise]
          : [processing, aborted.promise]
      );
    } finally {
      deadline?.cancel();
      aborted.dispose();
    }
  }

  private deadlineError(job: Job<P, R>): TimeoutError {
    return new TimeoutError(job.request.timeoutMs ?? 0);
  }
}
