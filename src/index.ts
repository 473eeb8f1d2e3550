#!/usr/bin/env node
import { parseCliArgs, renderCliUsage } from './cli.js';
import { config } from './config/index.js';
import { renderStatsSummary } from './demo/report.js';
import {
  DEFAULT_WORKLOAD_SHAPE,
  runWorkload,
  syntheticProcessor,
} from './demo/workload.js';
import { createDispatcher } from './dispatcher/dispatcher.js';
import type { DispatcherOptions } from './dispatcher/types.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './lib/process-shutdown.js';
import { startMonitor } from './monitor.js';
import { logError } from './services/logger.js';
import { toError } from './utils/error-utils.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = toError(reason);
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
  process.exitCode = 1;
} else if (parsed.values.help) {
  process.stdout.write(renderCliUsage());
} else if (parsed.values.version) {
  process.stdout.write(`${config.app.name} ${config.app.version}\n`);
} else {
  const { values } = parsed;
  const overrides: Partial<DispatcherOptions> = {
    ...(values.workerCount !== undefined
      ? { workerCount: values.workerCount }
      : {}),
    ...(values.admissionLimit !== undefined
      ? { admissionLimit: values.admissionLimit }
      : {}),
    ...(values.queueCapacity !== undefined
      ? { queueCapacity: values.queueCapacity }
      : {}),
    ...(values.timeoutMs !== undefined
      ? { perRequestTimeoutMs: values.timeoutMs }
      : {}),
    ...(values.graceMs !== undefined
      ? { shutdownGracePeriodMs: values.graceMs }
      : {}),
  };

  try {
    const dispatcher = createDispatcher(syntheticProcessor, overrides);
    const stopController = new AbortController();
    const unregister = registerSignalHandlers(
      createShutdownHandler(dispatcher, {
        onShutdown: () => {
          stopController.abort();
        },
        forceExitAfterMs: dispatcher.options.shutdownGracePeriodMs + 10_000,
      })
    );

    startMonitor(dispatcher, { signal: stopController.signal });

    await runWorkload(dispatcher, {
      ...DEFAULT_WORKLOAD_SHAPE,
      requests: values.requests,
      intervalMs: values.intervalMs,
      failEvery: values.failEvery,
      signal: stopController.signal,
    });

    const report = await dispatcher.shutdown();
    stopController.abort();
    unregister();

    process.stdout.write(renderStatsSummary(report.stats));
    if (dispatcher.fatalError) process.exitCode = 1;
  } catch (error: unknown) {
    const failure = toError(error);
    logError('Dispatcher demo failed', failure);
    process.stderr.write(`${failure.message}\n`);
    process.exitCode = 1;
  }
}
