import { readFileSync } from 'node:fs';
import process from 'node:process';

import { getErrorMessage } from '../utils/error-utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type AdmissionPolicy = 'wait' | 'reject';
export type QueueFullPolicy = 'reject' | 'wait';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

class ConfigError extends Error {
  override name = 'ConfigError';
}

function isMissingEnvFileError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  const code: unknown = Reflect.get(error, 'code');
  return code === 'ENOENT' || code === 'ERR_ENV_FILE_NOT_FOUND';
}

function loadEnvFileIfAvailable(): void {
  if (typeof process.loadEnvFile !== 'function') return;
  try {
    process.loadEnvFile();
  } catch (error) {
    if (isMissingEnvFileError(error)) return;
    throw error;
  }
}

loadEnvFileIfAvailable();
const { env } = process;

function parseIntegerValue(
  envValue: string | undefined,
  min?: number,
  max?: number
): number | null {
  if (!envValue) return null;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return null;
  if (min !== undefined && parsed < min) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  return parseIntegerValue(envValue, min, max) ?? defaultValue;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;
  return envValue.trim().toLowerCase() !== 'false';
}

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.trim().toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function parseAdmissionPolicy(
  envValue: string | undefined
): AdmissionPolicy {
  if (!envValue) return 'wait';
  const normalized = envValue.trim().toLowerCase();
  if (normalized === 'reject' || normalized === 'fail-fast') return 'reject';
  return 'wait';
}

export function parseQueueFullPolicy(
  envValue: string | undefined
): QueueFullPolicy {
  if (!envValue) return 'reject';
  const normalized = envValue.trim().toLowerCase();
  if (normalized === 'wait' || normalized === 'block') return 'wait';
  return 'reject';
}

function readOptionalPath(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function hasPackageJsonVersion(value: unknown): value is { version: string } {
  if (typeof value !== 'object' || value === null) return false;
  return typeof Reflect.get(value, 'version') === 'string';
}

// src/config and dist/config both sit two levels below the package root.
function readPackageVersion(): string {
  const packageJsonUrl = new URL('../../package.json', import.meta.url);

  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(packageJsonUrl, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read package.json at ${packageJsonUrl.pathname}: ${getErrorMessage(error)}`,
      { cause: error }
    );
  }
  if (!hasPackageJsonVersion(packageJson)) {
    throw new ConfigError(
      `package.json version is missing at ${packageJsonUrl.pathname}`
    );
  }
  return packageJson.version;
}

export const config = {
  app: {
    name: 'task-dispatcher',
    version: readPackageVersion(),
  },
  dispatcher: {
    workerCount: parseInteger(env['DISPATCHER_WORKER_COUNT'], 4, 1, 1024),
    queueCapacity: parseInteger(env['DISPATCHER_QUEUE_CAPACITY'], 100, 1),
    admissionLimit: parseInteger(env['DISPATCHER_ADMISSION_LIMIT'], 3, 1),
    perRequestTimeoutMs: parseInteger(
      env['DISPATCHER_REQUEST_TIMEOUT_MS'],
      10_000,
      0
    ),
    shutdownGracePeriodMs: parseInteger(
      env['DISPATCHER_SHUTDOWN_GRACE_MS'],
      5_000,
      0
    ),
    admissionPolicy: parseAdmissionPolicy(env['DISPATCHER_ADMISSION_POLICY']),
    queueFullPolicy: parseQueueFullPolicy(env['DISPATCHER_QUEUE_POLICY']),
    enqueueTimeoutMs: parseInteger(
      env['DISPATCHER_ENQUEUE_TIMEOUT_MS'],
      1_000,
      0
    ),
  },
  monitor: {
    intervalMs: parseInteger(env['MONITOR_INTERVAL_MS'], 2_000, 100),
  },
  logging: {
    level: parseLogLevel(env['LOG_LEVEL']),
    enabled: parseBoolean(env['LOG_ENABLED'], true),
    dir: readOptionalPath(env['LOG_DIR']),
  },
};
