import { describe, expect, it, vi } from 'vitest';

import type {
  DispatcherLoad,
  DispatcherStats,
} from '../src/dispatcher/types.js';
import {
  type LoadSample,
  type MonitoredDispatcher,
  sampleLoad,
  startMonitor,
} from '../src/monitor.js';

const load: DispatcherLoad = {
  state: 'running',
  inFlight: 2,
  availablePermits: 1,
  pendingAdmissions: 0,
  queueDepth: 3,
  activeWorkers: 2,
};

const stats: DispatcherStats = {
  totalSubmitted: 9,
  totalSucceeded: 4,
  totalFailed: 1,
  totalTimedOut: 0,
  totalRejected: 0,
  totalAborted: 0,
  cumulativeLatencyMs: 402,
  avgLatencyMs: 100.5,
};

const dispatcher: MonitoredDispatcher = {
  getLoad: () => load,
  statsSnapshot: () => stats,
};

describe('sampleLoad', () => {
  it('combines load with headline statistics', () => {
    expect(sampleLoad(dispatcher)).toEqual({
      state: 'running',
      inFlight: 2,
      availablePermits: 1,
      pendingAdmissions: 0,
      queueDepth: 3,
      activeWorkers: 2,
      submitted: 9,
      succeeded: 4,
      avgLatencyMs: 101,
    });
  });
});

describe('startMonitor', () => {
  it('samples on every tick until aborted', async () => {
    const controller = new AbortController();
    const samples: LoadSample[] = [];

    startMonitor(dispatcher, {
      signal: controller.signal,
      intervalMs: 5,
      onSample: (sample) => {
        samples.push(sample);
      },
    });
    await vi.waitFor(() => {
      expect(samples.length).toBeGreaterThanOrEqual(1);
    });
    controller.abort();

    expect(samples[0]?.queueDepth).toBe(3);
    expect(samples[0]?.submitted).toBe(9);
  });
});
