import { logError } from '../services/logger.js';
import type { DispatcherStats, Outcome, OutcomeStatus } from './types.js';

export type StatsEvent =
  | { type: 'submitted'; requestId: number }
  | { type: 'completed'; outcome: Outcome<unknown> };

interface Counters {
  totalSubmitted: number;
  totalSucceeded: number;
  totalFailed: number;
  totalTimedOut: number;
  totalRejected: number;
  totalAborted: number;
  cumulativeLatencyMs: number;
}

const EMPTY_COUNTERS: Readonly<Counters> = {
  totalSubmitted: 0,
  totalSucceeded: 0,
  totalFailed: 0,
  totalTimedOut: 0,
  totalRejected: 0,
  totalAborted: 0,
  cumulativeLatencyMs: 0,
};

// Aborts count as timeouts too, so the four terminal totals always add up
// to totalSubmitted.
const STATUS_COUNTERS: Readonly<
  Record<OutcomeStatus, readonly (keyof Counters)[]>
> = {
  success: ['totalSucceeded'],
  failed: ['totalFailed'],
  timed_out: ['totalTimedOut'],
  rejected: ['totalRejected'],
  aborted: ['totalTimedOut', 'totalAborted'],
};

function toSnapshot(counters: Readonly<Counters>): DispatcherStats {
  return Object.freeze({
    ...counters,
    avgLatencyMs:
      counters.totalSucceeded > 0
        ? counters.cumulativeLatencyMs / counters.totalSucceeded
        : 0,
  });
}

/**
 * Sole owner of the dispatcher's counters. Every update arrives as an
 * event and is applied whole, so a snapshot always reflects a prefix of
 * the published events.
 */
export class StatsAggregator {
  private counters: Readonly<Counters> = EMPTY_COUNTERS;
  private sealedSnapshot: DispatcherStats | null = null;

  get sealed(): boolean {
    return this.sealedSnapshot !== null;
  }

  publish(event: StatsEvent): boolean {
    if (this.sealedSnapshot) {
      logError('Statistics event published after the final snapshot', {
        event: event.type,
        requestId:
          event.type === 'submitted'
            ? event.requestId
            : event.outcome.requestId,
      });
      return false;
    }

    this.counters = applyEvent(this.counters, event);
    return true;
  }

  snapshot(): DispatcherStats {
    return this.sealedSnapshot ?? toSnapshot(this.counters);
  }

  /** Freezes the counters; later events are dropped. */
  seal(): DispatcherStats {
    this.sealedSnapshot ??= toSnapshot(this.counters);
    return this.sealedSnapshot;
  }
}

function applyEvent(
  counters: Readonly<Counters>,
  event: StatsEvent
): Readonly<Counters> {
  const next: Counters = { ...counters };

  if (event.type === 'submitted') {
    next.totalSubmitted += 1;
    return next;
  }

  const { outcome } = event;
  for (const key of STATUS_COUNTERS[outcome.status]) {
    next[key] += 1;
  }
  if (outcome.status === 'success') {
    next.cumulativeLatencyMs += outcome.latencyMs;
  }
  return next;
}
