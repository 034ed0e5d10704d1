import { parseArgs } from 'node:util';
import { z } from 'zod';
import { concurrencySchema, retriesSchema, timeoutSchema } from '../../infrastructure/config.js';

/** Export ids the CLI accepts. */
export const EXPORT_IDS = ['demo', 'small', 'large'] as const;
export type ExportId = (typeof EXPORT_IDS)[number];

export interface CliArgs {
  exportId: ExportId;
  url?: string | undefined;
  outfile?: string | undefined;
  verbose: boolean;
  concurrency?: number | undefined;
  timeoutMs?: number | undefined;
  retries?: number | undefined;
}

export type ParsedCli =
  | { readonly kind: 'run'; readonly args: CliArgs }
  | { readonly kind: 'help' }
  | { readonly kind: 'invalid'; readonly message: string };

export const USAGE = `Usage: export-summary [options] <exportId>

Fetches every download of an export and prints per-patient event counts as JSON.

Arguments:
  exportId               one of: ${EXPORT_IDS.join(', ')}

Options:
  -u, --url <url>        export service base URL (env EXPORT_API_URL)
  -o, --outfile <path>   write the report to a file instead of stdout
  -c, --concurrency <n>  downloads processed in parallel (env EXPORT_CONCURRENCY)
      --timeout <ms>     per-download timeout (env PARTITION_TIMEOUT_MS)
      --retries <n>      extra attempts per failed download (env PARTITION_RETRIES)
  -v, --verbose          debug logging on stderr
  -h, --help             show this help
`;

const argsSchema = z.object({
  exportId: z.enum(EXPORT_IDS, {
    errorMap: () => ({ message: `exportId must be one of: ${EXPORT_IDS.join(', ')}` }),
  }),
  url: z.string().url().optional(),
  outfile: z.string().min(1).optional(),
  verbose: z.boolean(),
  concurrency: concurrencySchema.optional(),
  timeoutMs: timeoutSchema.optional(),
  retries: retriesSchema.optional(),
});

/**
 * Parses argv (without the node and script entries).
 * Returns a discriminated result so the entry point owns exit codes.
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  let tokens: ReturnType<typeof readArgv>;
  try {
    tokens = readArgv(argv);
  } catch (err: unknown) {
    return { kind: 'invalid', message: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = tokens;
  if (values.help) return { kind: 'help' };
  if (positionals.length !== 1) {
    return { kind: 'invalid', message: `expected exactly one exportId, got ${positionals.length}` };
  }

  const parsed = argsSchema.safeParse({
    exportId: positionals[0],
    url: values.url,
    outfile: values.outfile,
    verbose: values.verbose ?? false,
    concurrency: values.concurrency,
    timeoutMs: values.timeout,
    retries: values.retries,
  });

  if (!parsed.success) {
    return { kind: 'invalid', message: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { kind: 'run', args: parsed.data };
}

function readArgv(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      url: { type: 'string', short: 'u' },
      outfile: { type: 'string', short: 'o' },
      concurrency: { type: 'string', short: 'c' },
      timeout: { type: 'string' },
      retries: { type: 'string' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}
