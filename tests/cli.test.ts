import { describe, expect, it } from 'vitest';

import { type CliValues, parseCliArgs, renderCliUsage } from '../src/cli.js';

function expectParseSuccess(args: readonly string[]): CliValues {
  const result = parseCliArgs(args);
  if (!result.ok) {
    throw new Error(`Expected parse success, got: ${result.message}`);
  }
  return result.values;
}

function expectParseError(args: readonly string[]): string {
  const result = parseCliArgs(args);
  if (result.ok) {
    throw new Error('Expected parse error but parsing succeeded');
  }
  return result.message;
}

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(expectParseSuccess([])).toEqual({
      help: false,
      version: false,
      requests: 20,
      intervalMs: 50,
      failEvery: 7,
    });
  });

  it('parses dispatcher and workload flags', () => {
    expect(
      expectParseSuccess([
        '-n',
        '5',
        '--interval',
        '0',
        '--fail-every',
        '0',
        '-w',
        '2',
        '--admission-limit',
        '3',
        '--queue-capacity',
        '10',
        '--timeout',
        '250',
        '--grace',
        '100',
      ])
    ).toEqual({
      help: false,
      version: false,
      requests: 5,
      intervalMs: 0,
      failEvery: 0,
      workerCount: 2,
      admissionLimit: 3,
      queueCapacity: 10,
      timeoutMs: 250,
      graceMs: 100,
    });
  });

  it('parses short-form help and version', () => {
    expect(expectParseSuccess(['-h']).help).toBe(true);
    expect(expectParseSuccess(['-v']).version).toBe(true);
  });

  it('rejects non-numeric values', () => {
    expect(expectParseError(['--workers', 'many'])).toBe(
      'Invalid value for --workers: "many"'
    );
  });

  it('rejects values below the minimum', () => {
    expect(expectParseError(['--requests', '0'])).toBe(
      '--requests must be at least 1'
    );
    expect(expectParseError(['--queue-capacity', '0'])).toBe(
      '--queue-capacity must be at least 1'
    );
  });

  it('rejects unknown options', () => {
    expect(expectParseError(['--unknown'])).toMatch(/unknown option/i);
  });

  it('rejects positional arguments', () => {
    expect(expectParseError(['run'])).toMatch(
      /unexpected argument|positional/i
    );
  });
});

describe('renderCliUsage', () => {
  it('lists short and long options', () => {
    const usage = renderCliUsage();

    expect(usage).toContain('--requests, -n <count>');
    expect(usage).toContain('--workers, -w <count>');
    expect(usage).toContain('--help, -h');
    expect(usage).toContain('--version, -v');
    expect(usage.endsWith('\n')).toBe(true);
  });
});
