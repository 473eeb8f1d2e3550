import {
  AbortedError,
  type InvariantViolationError,
} from '../errors/app-error.js';
import { createUnrefTimeout, waitForAbort } from '../lib/timer-utils.js';
import { logError, logInfo, logWarn } from '../services/logger.js';
import type { AdmissionGate } from './admission-gate.js';
import type { InFlightRegistry, Job } from './in-flight.js';
import type { StatsAggregator } from './stats-aggregator.js';
import type { DispatcherState, ShutdownReport } from './types.js';
import type { WorkQueue } from './work-queue.js';
import type { WorkerPool } from './worker-pool.js';

interface ShutdownCoordinatorOptions<P, R> {
  gate: AdmissionGate;
  queue: WorkQueue<Job<P, R>>;
  pool: WorkerPool<P, R>;
  registry: InFlightRegistry<P, R>;
  stats: StatsAggregator;
  defaultGracePeriodMs: number;
  onStateChange?: (state: DispatcherState) => void;
}

/**
 * Drives running → draining → stopped. Draining closes admission and the
 * queue, lets admitted work finish for up to the grace period, then
 * aborts whatever is left.
 */
export class ShutdownCoordinator<P, R> {
  private state: DispatcherState = 'running';
  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private fatal: InvariantViolationError | null = null;
  private readonly haltController = new AbortController();

  constructor(private readonly options: ShutdownCoordinatorOptions<P, R>) {}

  getState(): DispatcherState {
    return this.state;
  }

  get fatalError(): InvariantViolationError | null {
    return this.fatal;
  }

  isAccepting(): boolean {
    return this.state === 'running';
  }

  shutdown(gracePeriodMs?: number): Promise<ShutdownReport> {
    this.shutdownPromise ??= this.runShutdown(
      gracePeriodMs ?? this.options.defaultGracePeriodMs
    );
    return this.shutdownPromise;
  }

  /**
   * Stops immediately after a broken invariant. Permit accounting can no
   * longer be trusted, so nothing waits on the gate.
   */
  halt(error: InvariantViolationError): void {
    if (this.fatal) return;
    this.fatal = error;
    this.haltController.abort(error);
    logError('Dispatcher halted after an invariant violation', error);

    const { gate, queue, registry, stats } = this.options;
    if (this.state === 'running') this.transition('draining');
    gate.close();
    queue.close();
    const aborted = registry.abortAll(
      new AbortedError('Request aborted because the dispatcher halted')
    );
    queue.drain();
    stats.seal();
    this.transition('stopped');
    logWarn('Dispatcher stopped after halt', { aborted });

    this.shutdownPromise ??= Promise.resolve({
      drained: false,
      aborted,
      stats: stats.snapshot(),
    });
  }

  private async runShutdown(gracePeriodMs: number): Promise<ShutdownReport> {
    const { gate, queue, pool, registry, stats } = this.options;

    logInfo('Dispatcher draining', {
      gracePeriodMs,
      inFlight: gate.inFlight,
      queueDepth: queue.depth,
    });
    this.transition('draining');
    gate.close();
    queue.close();

    const drained = await this.awaitDrain(gracePeriodMs);
    let aborted = 0;
    if (!drained) {
      aborted = registry.abortAll();
      queue.drain();
      logWarn('Grace period elapsed; aborted in-flight requests', {
        gracePeriodMs,
        aborted,
      });
      // Submitters that already hold a permit release it once they see
      // the closed queue.
      await this.unlessHalted(gate.whenIdle());
    }

    await pool.whenStopped();
    const finalStats = stats.seal();
    this.transition('stopped');
    logInfo('Dispatcher stopped', { drained, aborted, ...finalStats });

    return { drained, aborted, stats: finalStats };
  }

  private async awaitDrain(gracePeriodMs: number): Promise<boolean> {
    const { gate } = this.options;
    if (gate.inFlight === 0) return true;
    if (gracePeriodMs <= 0) return false;

    const grace = createUnrefTimeout(gracePeriodMs, false);
    try {
      return await Promise.race([
        this.unlessHalted(gate.whenIdle()).then(() => this.fatal === null),
        grace.promise,
      ]);
    } finally {
      grace.cancel();
    }
  }

  private async unlessHalted(waiting: Promise<void>): Promise<void> {
    const halted = waitForAbort(this.haltController.signal, undefined);
    try {
      await Promise.race([waiting, halted.promise]);
    } finally {
      halted.dispose();
    }
  }

  private transition(next: DispatcherState): void {
    if (this.state === next || this.state === 'stopped') return;
    this.state = next;
    this.options.onStateChange?.(next);
  }
}
