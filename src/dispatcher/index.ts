export { AdmissionGate, type Permit } from './admission-gate.js';
export { createDispatcher, Dispatcher } from './dispatcher.js';
export { createReplyChannel } from './reply-channel.js';
export type { ReplyReceiver, ReplySender } from './reply-channel.js';
export { StatsAggregator, type StatsEvent } from './stats-aggregator.js';
export type {
  DispatcherLoad,
  DispatcherOptions,
  DispatcherState,
  DispatcherStats,
  DispatchRequest,
  Outcome,
  OutcomeError,
  OutcomeErrorCode,
  OutcomeStatus,
  ProcessContext,
  Processor,
  ShutdownReport,
  SubmitOptions,
} from './types.js';
export { WorkQueue } from './work-queue.js';
export {
  AbortedError,
  AppError,
  InvariantViolationError,
  ProcessingError,
  QueueFullError,
  RejectedError,
  TimeoutError,
  ValidationError,
} from '../errors/app-error.js';
export {
  dispatcherOptionsSchema,
  resolveDispatcherOptions,
} from '../config/schema.js';
