#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import { createLogger } from './infrastructure/index.js';
import { runCli } from './interfaces/cli/run.js';

/**
 * Aggregates a remote export into per-patient event counts.
 *
 * SIGINT / SIGTERM abort in-flight downloads; the run then exits
 * non-zero without printing a report.
 */
const ac = new AbortController();

function shutdown(): void {
  ac.abort(new Error('Interrupted'));
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    writeFile: (path, content) => writeFile(path, content, 'utf-8'),
    createLogger,
    signal: ac.signal,
  });
  process.exitCode = code;
}

main().catch((err: unknown) => {
  console.error('Fatal: export-summary crashed', err);
  process.exit(1);
});
