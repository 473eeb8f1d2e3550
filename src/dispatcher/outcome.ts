import { performance } from 'node:perf_hooks';

import {
  AbortedError,
  QueueFullError,
  RejectedError,
  TimeoutError,
} from '../errors/app-error.js';
import { getErrorMessage, isTimeoutAbortReason } from '../utils/error-utils.js';
import type {
  DispatchRequest,
  Outcome,
  OutcomeError,
  OutcomeStatus,
} from './types.js';

interface OutcomeExtras<R> {
  workerId?: number;
  value?: R;
  error?: OutcomeError;
}

export function createOutcome<R>(
  request: DispatchRequest<unknown>,
  status: OutcomeStatus,
  extras: OutcomeExtras<R> = {}
): Outcome<R> {
  return Object.freeze({
    requestId: request.id,
    status,
    latencyMs: Math.max(0, performance.now() - request.submittedAt),
    ...(extras.workerId !== undefined ? { workerId: extras.workerId } : {}),
    ...(status === 'success' ? { value: extras.value } : {}),
    ...(extras.error ? { error: extras.error } : {}),
  });
}

export function successOutcome<R>(
  request: DispatchRequest<unknown>,
  value: R,
  workerId: number
): Outcome<R> {
  return createOutcome(request, 'success', { value, workerId });
}

export function statusForError(error: unknown): OutcomeStatus {
  if (error instanceof RejectedError || error instanceof QueueFullError) {
    return 'rejected';
  }
  if (error instanceof AbortedError) return 'aborted';
  if (error instanceof TimeoutError || isTimeoutAbortReason(error)) {
    return 'timed_out';
  }
  return 'failed';
}

export function describeError(error: unknown): OutcomeError {
  if (error instanceof RejectedError) {
    return {
      code: error.reason === 'closed' ? 'ADMISSION_CLOSED' : 'ADMISSION_LIMIT',
      message: error.message,
    };
  }
  if (error instanceof QueueFullError) {
    return { code: 'QUEUE_FULL', message: error.message };
  }
  if (error instanceof AbortedError) {
    return { code: 'SHUTDOWN_ABORTED', message: error.message };
  }
  if (error instanceof TimeoutError || isTimeoutAbortReason(error)) {
    return { code: 'DEADLINE_EXCEEDED', message: getErrorMessage(error) };
  }
  return { code: 'PROCESSING_FAILED', message: getErrorMessage(error) };
}

/** Maps an operational error onto the outcome the caller receives. */
export function errorOutcome<R>(
  request: DispatchRequest<unknown>,
  error: unknown,
  workerId?: number
): Outcome<R> {
  return createOutcome<R>(request, statusForError(error), {
    error: describeError(error),
    ...(workerId !== undefined ? { workerId } : {}),
  });
}
