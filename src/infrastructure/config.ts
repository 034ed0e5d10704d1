import { availableParallelism } from 'node:os';
import { z } from 'zod';

/**
 * Runtime configuration shared by the CLI and the mock server.
 */
export interface AppConfig {
  apiUrl: string;
  logLevel: LogLevel;
  concurrency: number;
  partitionTimeoutMs: number;
  partitionRetries: number;
  retryBackoffMs: number;
  mockServer: { host: string; port: number };
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CONFIG: AppConfig = {
  apiUrl: 'http://127.0.0.1:8000',
  logLevel: 'info',
  concurrency: Math.min(4, availableParallelism()),
  partitionTimeoutMs: 600_000,
  partitionRetries: 0,
  retryBackoffMs: 500,
  mockServer: { host: '0.0.0.0', port: 8000 },
};

/** Bounds shared with the CLI flag validation. */
export const concurrencySchema = z.coerce.number().int().min(1).max(64);
export const timeoutSchema = z.coerce.number().int().positive();
export const retriesSchema = z.coerce.number().int().min(0).max(5);

const envSchema = z.object({
  EXPORT_API_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  EXPORT_CONCURRENCY: concurrencySchema.optional(),
  PARTITION_TIMEOUT_MS: timeoutSchema.optional(),
  PARTITION_RETRIES: retriesSchema.optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).optional(),
  MOCK_SERVER_HOST: z.string().min(1).optional(),
  MOCK_SERVER_PORT: z.coerce.number().int().min(0).max(65_535).optional(),
});

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/**
 * Loads configuration from environment variables, merged over
 * DEFAULT_CONFIG. Empty strings count as unset.
 *
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  const e = parsed.data;
  return {
    apiUrl: e.EXPORT_API_URL ?? DEFAULT_CONFIG.apiUrl,
    logLevel: e.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    concurrency: e.EXPORT_CONCURRENCY ?? DEFAULT_CONFIG.concurrency,
    partitionTimeoutMs: e.PARTITION_TIMEOUT_MS ?? DEFAULT_CONFIG.partitionTimeoutMs,
    partitionRetries: e.PARTITION_RETRIES ?? DEFAULT_CONFIG.partitionRetries,
    retryBackoffMs: e.RETRY_BACKOFF_MS ?? DEFAULT_CONFIG.retryBackoffMs,
    mockServer: {
      host: e.MOCK_SERVER_HOST ?? DEFAULT_CONFIG.mockServer.host,
      port: e.MOCK_SERVER_PORT ?? DEFAULT_CONFIG.mockServer.port,
    },
  };
}
