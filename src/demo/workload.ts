import { setTimeout as delay } from 'node:timers/promises';

import type { Dispatcher } from '../dispatcher/dispatcher.js';
import type { Outcome, OutcomeStatus, Processor } from '../dispatcher/types.js';
import { ProcessingError } from '../errors/app-error.js';
import { logDebug } from '../services/logger.js';
import { isAbortError } from '../utils/error-utils.js';

export interface SyntheticPayload {
  readonly index: number;
  readonly path: string;
  readonly processingMs: number;
  readonly shouldFail: boolean;
}

export interface SyntheticResponse {
  readonly status: 200;
  readonly body: string;
}

export interface WorkloadShape {
  /** Every n-th request fails; 0 disables failures. */
  failEvery: number;
  baseProcessingMs: number;
  processingStepMs: number;
}

export interface WorkloadOptions extends WorkloadShape {
  requests: number;
  intervalMs: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface WorkloadReport {
  submitted: number;
  stoppedEarly: boolean;
  outcomes: Outcome<SyntheticResponse>[];
  byStatus: Record<OutcomeStatus, number>;
}

const ENDPOINT_COUNT = 5;

export const DEFAULT_WORKLOAD_SHAPE: Readonly<WorkloadShape> = {
  failEvery: 7,
  baseProcessingMs: 100,
  processingStepMs: 50,
};

export function buildSyntheticPayload(
  index: number,
  shape: WorkloadShape = DEFAULT_WORKLOAD_SHAPE
): SyntheticPayload {
  const slot = index % ENDPOINT_COUNT;
  return {
    index,
    path: `/api/endpoint${slot}`,
    processingMs: shape.baseProcessingMs + slot * shape.processingStepMs,
    shouldFail: shape.failEvery > 0 && index % shape.failEvery === 0,
  };
}

export const syntheticProcessor: Processor<
  SyntheticPayload,
  SyntheticResponse
> = async (payload, { signal }) => {
  await delay(payload.processingMs, undefined, { signal });
  if (payload.shouldFail) {
    throw new ProcessingError(`Simulated failure for ${payload.path}`);
  }
  return { status: 200, body: `Response for ${payload.path}` };
};

function emptyTally(): Record<OutcomeStatus, number> {
  return { success: 0, failed: 0, timed_out: 0, rejected: 0, aborted: 0 };
}

/**
 * Submits `requests` synthetic requests, one every `intervalMs`, and
 * collects every outcome. Aborting `signal` stops generation; requests
 * already submitted are still collected.
 */
export async function runWorkload(
  dispatcher: Pick<Dispatcher<SyntheticPayload, SyntheticResponse>, 'submit'>,
  options: WorkloadOptions
): Promise<WorkloadReport> {
  const pending: Promise<Outcome<SyntheticResponse>>[] = [];
  let stoppedEarly = false;

  for (let index = 1; index <= options.requests; index += 1) {
    if (options.signal?.aborted) {
      stoppedEarly = true;
      break;
    }

    const payload = buildSyntheticPayload(index, options);
    logDebug('Submitting synthetic request', { index, path: payload.path });
    pending.push(
      dispatcher.submit(
        payload,
        options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }
      )
    );

    if (index < options.requests && options.intervalMs > 0) {
      try {
        await delay(options.intervalMs, undefined, {
          ...(options.signal ? { signal: options.signal } : {}),
        });
      } catch (error: unknown) {
        if (!isAbortError(error)) throw error;
        stoppedEarly = true;
        break;
      }
    }
  }

  const outcomes = await Promise.all(pending);
  const byStatus = emptyTally();
  for (const outcome of outcomes) {
    byStatus[outcome.status] += 1;
  }

  return { submitted: pending.length, stoppedEarly, outcomes, byStatus };
}
