import { parseArgs } from 'node:util';

import { getErrorMessage } from './utils/error-utils.js';

export interface CliValues {
  readonly help: boolean;
  readonly version: boolean;
  readonly requests: number;
  readonly intervalMs: number;
  readonly failEvery: number;
  readonly workerCount?: number;
  readonly admissionLimit?: number;
  readonly queueCapacity?: number;
  readonly timeoutMs?: number;
  readonly graceMs?: number;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

type CliParseResult = CliParseSuccess | CliParseFailure;

const DEFAULT_REQUESTS = 20;
const DEFAULT_INTERVAL_MS = 50;
const DEFAULT_FAIL_EVERY = 7;

const usageLines = [
  'Task dispatcher demo',
  '',
  'Runs a synthetic workload through a bounded worker pool and prints',
  'the final statistics. Ctrl+C starts a graceful shutdown.',
  '',
  'Usage:',
  '  task-dispatcher [options]',
  '',
  'Options:',
  '  --requests, -n <count>    Requests to submit (default 20).',
  '  --interval <ms>           Delay between submissions (default 50).',
  '  --fail-every <n>          Fail every n-th request, 0 = never (default 7).',
  '  --workers, -w <count>     Worker loops in the pool.',
  '  --admission-limit <count> Maximum in-flight requests.',
  '  --queue-capacity <count>  Bound on queued requests.',
  '  --timeout <ms>            Per-request deadline, 0 = none.',
  '  --grace <ms>              Shutdown grace period.',
  '  --help, -h                Show this help message.',
  '  --version, -v             Show version.',
  '',
] as const;

const optionSchema = {
  requests: { type: 'string', short: 'n' },
  interval: { type: 'string' },
  'fail-every': { type: 'string' },
  workers: { type: 'string', short: 'w' },
  'admission-limit': { type: 'string' },
  'queue-capacity': { type: 'string' },
  timeout: { type: 'string' },
  grace: { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

interface ParsedValues {
  readonly requests?: string;
  readonly interval?: string;
  readonly 'fail-every'?: string;
  readonly workers?: string;
  readonly 'admission-limit'?: string;
  readonly 'queue-capacity'?: string;
  readonly timeout?: string;
  readonly grace?: string;
  readonly help?: boolean;
  readonly version?: boolean;
}

class CliValueError extends Error {
  override name = 'CliValueError';
}

function readInteger(
  raw: string | undefined,
  flag: string,
  min: number
): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new CliValueError(`Invalid value for --${flag}: "${raw}"`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (value < min) {
    throw new CliValueError(`--${flag} must be at least ${min}`);
  }
  return value;
}

function buildCliValues(values: ParsedValues): CliValues {
  const workerCount = readInteger(values.workers, 'workers', 1);
  const admissionLimit = readInteger(
    values['admission-limit'],
    'admission-limit',
    1
  );
  const queueCapacity = readInteger(
    values['queue-capacity'],
    'queue-capacity',
    1
  );
  const timeoutMs = readInteger(values.timeout, 'timeout', 0);
  const graceMs = readInteger(values.grace, 'grace', 0);

  return {
    help: values.help === true,
    version: values.version === true,
    requests: readInteger(values.requests, 'requests', 1) ?? DEFAULT_REQUESTS,
    intervalMs:
      readInteger(values.interval, 'interval', 0) ?? DEFAULT_INTERVAL_MS,
    failEvery:
      readInteger(values['fail-every'], 'fail-every', 0) ?? DEFAULT_FAIL_EVERY,
    ...(workerCount !== undefined ? { workerCount } : {}),
    ...(admissionLimit !== undefined ? { admissionLimit } : {}),
    ...(queueCapacity !== undefined ? { queueCapacity } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(graceMs !== undefined ? { graceMs } : {}),
  };
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    });

    return {
      ok: true,
      values: buildCliValues(values),
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}
