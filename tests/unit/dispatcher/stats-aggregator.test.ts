import { describe, expect, test } from 'vitest';

import { StatsAggregator } from '../../../src/dispatcher/stats-aggregator.js';
import type { Outcome, OutcomeStatus } from '../../../src/dispatcher/types.js';

function outcome(
  requestId: number,
  status: OutcomeStatus,
  latencyMs = 10
): Outcome<unknown> {
  return { requestId, status, latencyMs };
}

describe('StatsAggregator', () => {
  test('starts at zero', () => {
    const stats = new StatsAggregator();

    expect(stats.snapshot()).toEqual({
      totalSubmitted: 0,
      totalSucceeded: 0,
      totalFailed: 0,
      totalTimedOut: 0,
      totalRejected: 0,
      totalAborted: 0,
      cumulativeLatencyMs: 0,
      avgLatencyMs: 0,
    });
  });

  test('counts each terminal status once', () => {
    const stats = new StatsAggregator();
    const statuses: OutcomeStatus[] = [
      'success',
      'failed',
      'timed_out',
      'rejected',
      'aborted',
    ];

    statuses.forEach((status, index) => {
      stats.publish({ type: 'submitted', requestId: index + 1 });
      stats.publish({ type: 'completed', outcome: outcome(index + 1, status) });
    });

    const snapshot = stats.snapshot();
    expect(snapshot.totalSubmitted).toBe(5);
    expect(snapshot.totalSucceeded).toBe(1);
    expect(snapshot.totalFailed).toBe(1);
    expect(snapshot.totalTimedOut).toBe(2);
    expect(snapshot.totalRejected).toBe(1);
    expect(snapshot.totalAborted).toBe(1);
    expect(
      snapshot.totalSucceeded +
        snapshot.totalFailed +
        snapshot.totalTimedOut +
        snapshot.totalRejected
    ).toBe(snapshot.totalSubmitted);
  });

  test('averages latency over successes only', () => {
    const stats = new StatsAggregator();
    stats.publish({ type: 'completed', outcome: outcome(1, 'success', 10) });
    stats.publish({ type: 'completed', outcome: outcome(2, 'success', 30) });
    stats.publish({ type: 'completed', outcome: outcome(3, 'failed', 500) });

    const snapshot = stats.snapshot();
    expect(snapshot.cumulativeLatencyMs).toBe(40);
    expect(snapshot.avgLatencyMs).toBe(20);
  });

  test('snapshots are frozen and unaffected by later events', () => {
    const stats = new StatsAggregator();
    stats.publish({ type: 'submitted', requestId: 1 });
    const before = stats.snapshot();

    stats.publish({ type: 'submitted', requestId: 2 });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.totalSubmitted).toBe(1);
    expect(stats.snapshot().totalSubmitted).toBe(2);
  });

  test('seal fixes the final snapshot and drops later events', () => {
    const stats = new StatsAggregator();
    stats.publish({ type: 'submitted', requestId: 1 });

    const sealed = stats.seal();

    expect(stats.sealed).toBe(true);
    expect(stats.publish({ type: 'submitted', requestId: 2 })).toBe(false);
    expect(stats.snapshot()).toBe(sealed);
    expect(stats.seal()).toBe(sealed);
    expect(sealed.totalSubmitted).toBe(1);
  });
});
