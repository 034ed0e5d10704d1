import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../../src/interfaces/cli/run.js';
import type { CliIo } from '../../src/interfaces/cli/run.js';
import { USAGE } from '../../src/interfaces/cli/args.js';
import { buildMockServer } from '../../src/interfaces/http/server.js';
import { buildExports, generateCsv } from '../../src/infrastructure/mock/synthetic-export.js';
import type { LogLevel } from '../../src/infrastructure/config.js';
import { formatReport, parseRow, toReport } from '../../src/application/index.js';
import { Aggregate } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';
import { fetchToInject } from './fetch-to-inject.js';

const registry = buildExports({
  demo: {
    minRows: 50,
    maxRows: 100,
    eventTypes: ['bp_sys', 'bp_dia'],
    downloads: 2,
    patientPool: ['P001', 'P002', 'P003'],
    startTime: new Date('2025-08-26T00:00:00Z'),
    stepMs: 7_000,
  },
});

function expectedOutput(): string {
  const agg = new Aggregate();
  for (const download of registry.get('demo')?.downloads.values() ?? []) {
    for (const line of [...generateCsv(download)].join('').split('\n')) {
      const row = parseRow(line, { allowHeader: true });
      if (row.kind === 'record') agg.increment(row.record.patient_id, row.record.event_type);
    }
  }
  return formatReport(toReport(agg));
}

function fakeIo(env: NodeJS.ProcessEnv = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = fakeLogger();
  const writeFile = vi.fn(async (_path: string, _content: string) => {});
  const createLogger = vi.fn((_level: LogLevel) => log);
  const io: CliIo = {
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    env,
    writeFile,
    createLogger,
  };
  return { io, stdout, stderr, log, writeFile, createLogger };
}

describe('runCli', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildMockServer({ registry });
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('prints usage for --help', async () => {
    const { io, stdout } = fakeIo();
    expect(await runCli(['--help'], io)).toBe(EXIT_OK);
    expect(stdout.join('')).toBe(USAGE);
  });

  it('exits with a usage error for an invalid export id', async () => {
    const { io, stdout, stderr } = fakeIo();

    expect(await runCli(['unknown'], io)).toBe(EXIT_USAGE);
    expect(stderr.join('')).toBe(`error: exportId must be one of: demo, small, large\n\n${USAGE}`);
    expect(stdout).toEqual([]);
  });

  it('exits with a usage error for an invalid environment', async () => {
    const { io, stderr, createLogger } = fakeIo({ EXPORT_CONCURRENCY: 'many' });

    expect(await runCli(['demo'], io)).toBe(EXIT_USAGE);
    expect(stderr.join('')).toMatch(/^error: Invalid environment: EXPORT_CONCURRENCY: /);
    expect(createLogger).not.toHaveBeenCalled();
  });

  it('writes the report to stdout', async () => {
    vi.stubGlobal('fetch', fetchToInject(app));
    const { io, stdout, log, createLogger } = fakeIo({ LOG_LEVEL: 'warn' });

    expect(await runCli(['-u', 'http://mock.test', 'demo'], io)).toBe(EXIT_OK);

    expect(stdout.join('')).toBe(expectedOutput());
    expect(createLogger).toHaveBeenCalledWith('warn');
    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ exportId: 'demo', downloads: 2, succeeded: 2, failed: 0, skippedRows: 0 }),
      'Export completed',
    );
  });

  it('writes the report to --outfile instead of stdout', async () => {
    vi.stubGlobal('fetch', fetchToInject(app));
    const { io, stdout, writeFile, createLogger } = fakeIo();

    expect(await runCli(['-u', 'http://mock.test', '-o', 'out/report.json', '-v', 'demo'], io)).toBe(EXIT_OK);

    expect(stdout).toEqual([]);
    expect(writeFile).toHaveBeenCalledWith('out/report.json', expectedOutput());
    expect(createLogger).toHaveBeenCalledWith('debug');
  });

  it('still prints a report when a download fails, and warns', async () => {
    const firstId = [...(registry.get('demo')?.downloads.keys() ?? [])][0];
    vi.stubGlobal(
      'fetch',
      fetchToInject(app, (url) =>
        url.pathname === `/api/export/demo/${firstId}/data`
          ? new Response('unavailable', { status: 503, statusText: 'Service Unavailable' })
          : undefined,
      ),
    );
    const { io, stdout, log } = fakeIo();

    expect(await runCli(['-u', 'http://mock.test', 'demo'], io)).toBe(EXIT_OK);

    expect(stdout.join('').startsWith('{\n  "patients": {')).toBe(true);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ succeeded: 1, failed: 1 }),
      'Export completed with warnings',
    );
  });

  it('exits non-zero without a report when the export is unknown to the service', async () => {
    vi.stubGlobal('fetch', fetchToInject(app));
    const { io, stdout, log } = fakeIo();

    expect(await runCli(['-u', 'http://mock.test', 'small'], io)).toBe(EXIT_FAILURE);

    expect(stdout).toEqual([]);
    expect(log.error).toHaveBeenCalledWith({ exportId: 'small', reason: 'not one of [demo]' }, 'Export not found');
  });

  it('exits non-zero when the run is aborted', async () => {
    vi.stubGlobal('fetch', fetchToInject(app));
    const controller = new AbortController();
    controller.abort(new Error('Interrupted'));
    const { io, stdout, log } = fakeIo();

    expect(await runCli(['-u', 'http://mock.test', 'demo'], { ...io, signal: controller.signal })).toBe(
      EXIT_FAILURE,
    );

    expect(stdout).toEqual([]);
    expect(log.fatal).toHaveBeenCalledWith(
      expect.objectContaining({ exportId: 'demo' }),
      'Export run failed',
    );
  });
});
