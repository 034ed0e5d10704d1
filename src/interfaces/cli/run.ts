import type { Logger } from 'pino';
import { ExportNotFoundError } from '../../domain/index.js';
import { DownloadOrchestrator, formatReport, runExportPipeline } from '../../application/index.js';
import type { ExportPipelineResult } from '../../application/index.js';
import { ConfigError, ExportApiClient, loadConfig } from '../../infrastructure/index.js';
import type { AppConfig, LogLevel } from '../../infrastructure/index.js';
import { parseCliArgs, USAGE } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Process-level collaborators, injected so the CLI runs in tests. */
export interface CliIo {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  env: NodeJS.ProcessEnv;
  writeFile(path: string, content: string): Promise<void>;
  createLogger(level: LogLevel): Logger;
  signal?: AbortSignal | undefined;
}

/**
 * Runs one CLI invocation and resolves to its exit code.
 *
 * stdout receives only the JSON report. Diagnostics and errors go to
 * the logger; usage errors to stderr.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const cli = parseCliArgs(argv);
  if (cli.kind === 'help') {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (cli.kind === 'invalid') {
    io.stderr.write(`error: ${cli.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      io.stderr.write(`error: ${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const { args } = cli;
  const log = io.createLogger(args.verbose ? 'debug' : config.logLevel);
  const client = new ExportApiClient(args.url ?? config.apiUrl, log);
  const orchestrator = new DownloadOrchestrator(client, client, {
    concurrency: args.concurrency ?? config.concurrency,
    timeoutMs: args.timeoutMs ?? config.partitionTimeoutMs,
    retry: {
      retries: args.retries ?? config.partitionRetries,
      backoffMs: config.retryBackoffMs,
    },
    log,
  });

  const startedAt = Date.now();
  let result: ExportPipelineResult;
  try {
    result = await runExportPipeline(orchestrator, args.exportId, io.signal);
  } catch (err: unknown) {
    if (err instanceof ExportNotFoundError) {
      log.error({ exportId: err.exportId, reason: err.reason }, 'Export not found');
    } else {
      log.fatal({ err, exportId: args.exportId }, 'Export run failed');
    }
    return EXIT_FAILURE;
  }

  const output = formatReport(result.report);
  if (args.outfile) {
    await io.writeFile(args.outfile, output);
    log.info({ outfile: args.outfile }, 'Report written');
  } else {
    io.stdout.write(output);
  }

  const { diagnostics } = result;
  const summary = { ...diagnostics, durationMs: Date.now() - startedAt };
  if (diagnostics.failed > 0 || diagnostics.skippedRows > 0 || diagnostics.incomplete.length > 0) {
    log.warn(summary, 'Export completed with warnings');
  } else {
    log.info(summary, 'Export completed');
  }

  return EXIT_OK;
}
