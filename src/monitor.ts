import { config } from './config/index.js';
import type { DispatcherLoad, DispatcherStats } from './dispatcher/types.js';
import { startAbortableIntervalLoop } from './lib/timer-utils.js';
import { logError, logInfo } from './services/logger.js';
import { getErrorMessage } from './utils/error-utils.js';

export interface MonitoredDispatcher {
  getLoad(): DispatcherLoad;
  statsSnapshot(): DispatcherStats;
}

interface MonitorOptions {
  signal: AbortSignal;
  intervalMs?: number;
  onSample?: (sample: LoadSample) => void;
}

export interface LoadSample extends DispatcherLoad {
  submitted: number;
  succeeded: number;
  avgLatencyMs: number;
}

export function sampleLoad(dispatcher: MonitoredDispatcher): LoadSample {
  const stats = dispatcher.statsSnapshot();
  return {
    ...dispatcher.getLoad(),
    submitted: stats.totalSubmitted,
    succeeded: stats.totalSucceeded,
    avgLatencyMs: Math.round(stats.avgLatencyMs),
  };
}

/** Logs a load sample every interval until `signal` aborts. */
export function startMonitor(
  dispatcher: MonitoredDispatcher,
  options: MonitorOptions
): void {
  startAbortableIntervalLoop(
    options.intervalMs ?? config.monitor.intervalMs,
    null,
    {
      signal: options.signal,
      onTick: () => {
        const sample = sampleLoad(dispatcher);
        logInfo('Dispatcher load', { ...sample });
        options.onSample?.(sample);
      },
      onError: (error) => {
        logError('Dispatcher monitor failed', {
          error: getErrorMessage(error),
        });
      },
    }
  );
}
