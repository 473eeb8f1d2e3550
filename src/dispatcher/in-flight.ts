import {
  AbortedError,
  InvariantViolationError,
} from '../errors/app-error.js';
import { logDebug } from '../services/logger.js';
import type { AdmissionGate, Permit } from './admission-gate.js';
import { errorOutcome } from './outcome.js';
import type { ReplySender } from './reply-channel.js';
import type { StatsAggregator } from './stats-aggregator.js';
import type { DispatchRequest, Outcome } from './types.js';

export interface Job<P, R> {
  readonly request: DispatchRequest<P>;
  readonly permit: Permit;
  readonly reply: ReplySender<Outcome<R>>;
  /** Aborted on deadline or forced shutdown; handed to the processor. */
  readonly controller: AbortController;
  settled: boolean;
}

interface InFlightRegistryOptions<R> {
  gate: AdmissionGate;
  stats: StatsAggregator;
  onSettled?: (outcome: Outcome<R>) => void;
  onInvariantViolation: (error: InvariantViolationError) => void;
}

/**
 * Tracks every request holding a permit and settles each one exactly
 * once: stats first, then the reply, then the permit.
 */
export class InFlightRegistry<P, R> {
  private readonly jobs = new Map<number, Job<P, R>>();

  constructor(private readonly options: InFlightRegistryOptions<R>) {}

  get size(): number {
    return this.jobs.size;
  }

  track(
    request: DispatchRequest<P>,
    permit: Permit,
    reply: ReplySender<Outcome<R>>
  ): Job<P, R> {
    const job: Job<P, R> = {
      request,
      permit,
      reply,
      controller: new AbortController(),
      settled: false,
    };
    this.jobs.set(request.id, job);
    return job;
  }

  settle(job: Job<P, R>, outcome: Outcome<R>): boolean {
    if (job.settled) return false;
    job.settled = true;
    this.jobs.delete(job.request.id);

    this.options.stats.publish({ type: 'completed', outcome });
    if (!job.reply.send(outcome)) {
      logDebug('Outcome not delivered; caller abandoned the request', {
        requestId: outcome.requestId,
        status: outcome.status,
      });
    }
    this.releasePermit(job.permit);
    this.options.onSettled?.(outcome);
    return true;
  }

  /**
   * Settles every tracked job as aborted and signals its processor.
   * Returns how many were aborted.
   */
  abortAll(error: AbortedError = new AbortedError()): number {
    let aborted = 0;
    for (const job of Array.from(this.jobs.values())) {
      job.controller.abort(error);
      if (this.settle(job, errorOutcome<R>(job.request, error))) aborted += 1;
    }
    return aborted;
  }

  releasePermit(permit: Permit): void {
    try {
      this.options.gate.release(permit);
    } catch (error: unknown) {
      if (!(error instanceof InvariantViolationError)) throw error;
      this.options.onInvariantViolation(error);
    }
  }
}
