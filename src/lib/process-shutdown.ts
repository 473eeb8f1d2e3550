import { logError, logInfo } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

interface Shutdownable {
  shutdown(gracePeriodMs?: number): Promise<unknown>;
}

interface ShutdownHandlerOptions {
  onShutdown?: () => void;
  forceExitAfterMs?: number;
}

/**
 * Builds a signal handler that drains the dispatcher once. A second signal
 * while draining exits the process.
 */
export function createShutdownHandler(
  target: Shutdownable,
  options: ShutdownHandlerOptions = {}
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logError(`${signal} received again, exiting immediately`);
      process.exit(1);
    }
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);
    options.onShutdown?.();

    if (options.forceExitAfterMs !== undefined) {
      setTimeout(() => {
        logError('Forced shutdown after timeout');
        process.exit(1);
      }, options.forceExitAfterMs).unref();
    }

    try {
      await target.shutdown();
    } catch (error: unknown) {
      logError('Shutdown failed', { error: getErrorMessage(error) });
      process.exitCode = 1;
    }
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): () => void {
  const onSigint = (): void => {
    void shutdown('SIGINT');
  };
  const onSigterm = (): void => {
    void shutdown('SIGTERM');
  };
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  return () => {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };
}
