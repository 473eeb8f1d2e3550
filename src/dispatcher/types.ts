import type { DispatcherOptions } from '../config/schema.js';

export type { DispatcherOptions };

export type OutcomeStatus =
  | 'success'
  | 'failed'
  | 'timed_out'
  | 'rejected'
  | 'aborted';

export type OutcomeErrorCode =
  | 'ADMISSION_CLOSED'
  | 'ADMISSION_LIMIT'
  | 'QUEUE_FULL'
  | 'DEADLINE_EXCEEDED'
  | 'PROCESSING_FAILED'
  | 'SHUTDOWN_ABORTED';

export type DispatcherState = 'running' | 'draining' | 'stopped';

export interface DispatchRequest<P> {
  readonly id: number;
  readonly payload: P;
  readonly timeoutMs: number | undefined;
  /** Monotonic clock reading (performance.now) at submission. */
  readonly submittedAt: number;
  readonly deadlineAt: number | undefined;
}

export interface OutcomeError {
  readonly code: OutcomeErrorCode;
  readonly message: string;
}

export interface Outcome<R> {
  readonly requestId: number;
  readonly status: OutcomeStatus;
  readonly latencyMs: number;
  readonly workerId?: number;
  readonly value?: R;
  readonly error?: OutcomeError;
}

export interface DispatcherStats {
  readonly totalSubmitted: number;
  readonly totalSucceeded: number;
  readonly totalFailed: number;
  /** Includes aborted outcomes; see totalAborted for that share. */
  readonly totalTimedOut: number;
  readonly totalRejected: number;
  readonly totalAborted: number;
  readonly cumulativeLatencyMs: number;
  readonly avgLatencyMs: number;
}

export interface ProcessContext {
  readonly requestId: number;
  readonly workerId: number;
  /** Aborted when the deadline fires or shutdown force-aborts the request. */
  readonly signal: AbortSignal;
}

export type Processor<P, R> = (
  payload: P,
  context: ProcessContext
) => Promise<R>;

export interface SubmitOptions {
  /** Relative deadline overriding perRequestTimeoutMs; 0 is already due. */
  timeoutMs?: number;
  /** Abandons the wait for the outcome. The request itself keeps running. */
  signal?: AbortSignal;
}

export interface DispatcherLoad {
  state: DispatcherState;
  inFlight: number;
  availablePermits: number;
  pendingAdmissions: number;
  queueDepth: number;
  activeWorkers: number;
}

export interface ShutdownReport {
  /** True when in-flight work finished inside the grace period. */
  drained: boolean;
  aborted: number;
  stats: DispatcherStats;
}
