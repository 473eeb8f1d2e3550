/**
 * Base application error class with a stable machine-readable code
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid dispatcher options
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR');
    this.details = details;
  }
}

export type RejectReason = 'closed' | 'limit';

/**
 * Admission refused: the gate is closed or at capacity under the reject policy
 */
export class RejectedError extends AppError {
  public readonly reason: RejectReason;

  constructor(reason: RejectReason, message?: string) {
    super(
      message ??
        (reason === 'closed'
          ? 'Dispatcher is not accepting new requests'
          : 'Admission limit reached'),
      reason === 'closed' ? 'ADMISSION_CLOSED' : 'ADMISSION_LIMIT'
    );
    this.reason = reason;
  }
}

export class QueueFullError extends AppError {
  public readonly capacity: number;

  constructor(capacity: number) {
    super(`Work queue is full (capacity ${capacity})`, 'QUEUE_FULL');
    this.capacity = capacity;
  }
}

/**
 * Deadline elapsed before or during processing
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request deadline exceeded after ${timeoutMs}ms`, 'DEADLINE_EXCEEDED');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Forced termination during the shutdown drain
 */
export class AbortedError extends AppError {
  constructor(message = 'Request aborted by dispatcher shutdown') {
    super(message, 'SHUTDOWN_ABORTED');
  }
}

export class ProcessingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROCESSING_FAILED');
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Broken internal accounting. Never operational: the dispatcher halts.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION', false);
  }
}
