import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../src/interfaces/cli/args.js';

describe('parseCliArgs', () => {
  it('parses an export id with defaults', () => {
    expect(parseCliArgs(['demo'])).toEqual({
      kind: 'run',
      args: { exportId: 'demo', verbose: false },
    });
  });

  it('parses every option', () => {
    const parsed = parseCliArgs([
      '--url',
      'http://localhost:9000',
      '-o',
      'report.json',
      '-c',
      '8',
      '--timeout',
      '30000',
      '--retries',
      '2',
      '-v',
      'small',
    ]);

    expect(parsed).toEqual({
      kind: 'run',
      args: {
        exportId: 'small',
        url: 'http://localhost:9000',
        outfile: 'report.json',
        verbose: true,
        concurrency: 8,
        timeoutMs: 30_000,
        retries: 2,
      },
    });
  });

  it('returns help for -h even without an export id', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('rejects an unknown export id', () => {
    expect(parseCliArgs(['unknown'])).toEqual({
      kind: 'invalid',
      message: 'exportId must be one of: demo, small, large',
    });
  });

  it('requires exactly one export id', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'invalid', message: 'expected exactly one exportId, got 0' });
    expect(parseCliArgs(['demo', 'small'])).toEqual({
      kind: 'invalid',
      message: 'expected exactly one exportId, got 2',
    });
  });

  it('rejects unknown flags', () => {
    expect(parseCliArgs(['--fast', 'demo']).kind).toBe('invalid');
  });

  it('rejects out-of-range numbers', () => {
    expect(parseCliArgs(['-c', '0', 'demo']).kind).toBe('invalid');
    expect(parseCliArgs(['--retries', '6', 'demo']).kind).toBe('invalid');
    expect(parseCliArgs(['--timeout', 'soon', 'demo']).kind).toBe('invalid');
  });

  it('rejects a malformed url', () => {
    expect(parseCliArgs(['-u', 'not a url', 'demo']).kind).toBe('invalid');
  });
});
