import { setTimeout as delay } from 'node:timers/promises';

import { describe, expect, test } from 'vitest';

import { AdmissionGate } from '../../../src/dispatcher/admission-gate.js';
import {
  InFlightRegistry,
  type Job,
} from '../../../src/dispatcher/in-flight.js';
import { createReplyChannel } from '../../../src/dispatcher/reply-channel.js';
import {
  ShutdownCoordinator,
} from '../../../src/dispatcher/shutdown-coordinator.js';
import { StatsAggregator } from '../../../src/dispatcher/stats-aggregator.js';
import type {
  DispatcherState,
  Outcome,
} from '../../../src/dispatcher/types.js';
import { WorkQueue } from '../../../src/dispatcher/work-queue.js';
import { WorkerPool } from '../../../src/dispatcher/worker-pool.js';
import { InvariantViolationError } from '../../../src/errors/app-error.js';

function createParts(processingMs: number) {
  const gate = new AdmissionGate(4);
  const stats = new StatsAggregator();
  const queue = new WorkQueue<Job<number, number>>(4);
  const states: DispatcherState[] = [];
  let coordinator: ShutdownCoordinator<number, number> | undefined;
  const registry = new InFlightRegistry<number, number>({
    gate,
    stats,
    onInvariantViolation: (error) => {
      coordinator?.halt(error);
    },
  });
  const pool = new WorkerPool<number, number>({
    size: 2,
    queue,
    registry,
    processor: async (value, { signal }) => {
      await delay(processingMs, undefined, { signal });
      return value;
    },
  });
  coordinator = new ShutdownCoordinator<number, number>({
    gate,
    queue,
    pool,
    registry,
    stats,
    defaultGracePeriodMs: 1000,
    onStateChange: (state) => {
      states.push(state);
    },
  });
  pool.start();

  const admit = async (id: number) => {
    const [sender, receiver] = createReplyChannel<Outcome<number>>();
    const job = registry.track(
      {
        id,
        payload: id,
        timeoutMs: undefined,
        submittedAt: performance.now(),
        deadlineAt: undefined,
      },
      await gate.acquire(),
      sender
    );
    queue.tryEnqueue(job);
    return { job, receiver };
  };

  return { gate, stats, queue, registry, pool, coordinator, states, admit };
}

describe('ShutdownCoordinator', () => {
  test('starts running and accepting', () => {
    const { coordinator } = createParts(5);

    expect(coordinator.getState()).toBe('running');
    expect(coordinator.isAccepting()).toBe(true);
    expect(coordinator.fatalError).toBeNull();
  });

  test('uses the default grace period', async () => {
    const { coordinator, admit, states } = createParts(20);
    const { receiver } = await admit(1);

    const report = await coordinator.shutdown();

    expect(report.drained).toBe(true);
    expect((await receiver.receive()).status).toBe('success');
    expect(states).toEqual(['draining', 'stopped']);
  });

  test('halts on an invariant violation', async () => {
    const { coordinator, registry, admit, gate, stats } = createParts(10_000);
    const { job, receiver } = await admit(1);
    await delay(5);

    // A permit released twice breaks the accounting.
    registry.releasePermit(job.permit);
    registry.releasePermit(job.permit);

    expect(coordinator.fatalError).toBeInstanceOf(InvariantViolationError);
    expect(coordinator.getState()).toBe('stopped');
    expect(coordinator.isAccepting()).toBe(false);
    expect(gate.isClosed).toBe(true);
    expect(stats.sealed).toBe(true);

    const outcome = await receiver.receive();
    expect(outcome.status).toBe('aborted');
    expect(outcome.error?.message).toBe(
      'Request aborted because the dispatcher halted'
    );

    const report = await coordinator.shutdown();
    expect(report.drained).toBe(false);
    expect(report.aborted).toBe(1);
  });

  test('a halt during the drain ends the wait', async () => {
    const { coordinator, registry, admit } = createParts(10_000);
    const { job } = await admit(1);
    await delay(5);

    const pending = coordinator.shutdown(5000);
    registry.releasePermit(job.permit);
    registry.releasePermit(job.permit);
    const report = await pending;

    expect(report.drained).toBe(false);
    expect(coordinator.getState()).toBe('stopped');
  });
});
