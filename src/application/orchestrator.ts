import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { Aggregate, ExportNotFoundError, PartitionFetchError } from '../domain/index.js';
import type { DownloadDescriptor } from '../domain/index.js';
import { readPartition, toPartitionError } from './partition-reader.js';
import type { PartitionResult, PartitionStats } from './partition-reader.js';
import { runBounded } from './worker-pool.js';

/** Enumerates the downloads of an export. Rejects when the export is unknown. */
export interface ExportDiscovery {
  listDownloads(exportId: string, signal?: AbortSignal): Promise<DownloadDescriptor[]>;
}

/** Opens the CSV byte stream of one download. */
export interface PartitionSource {
  open(descriptor: DownloadDescriptor, signal: AbortSignal): Promise<AsyncIterable<Uint8Array>>;
}

/** Extra attempts per partition after the first; `retries: 0` disables retrying. */
export interface RetryPolicy {
  readonly retries: number;
  readonly backoffMs: number;
}

export type PartitionState = 'pending' | 'fetching' | 'succeeded' | 'failed';

export type PartitionOutcome =
  | {
      readonly state: 'succeeded';
      readonly descriptor: DownloadDescriptor;
      readonly attempts: number;
      readonly stats: PartitionStats;
      /** False when the data lines read differ from `descriptor.expected_rows`. */
      readonly complete: boolean;
    }
  | {
      readonly state: 'failed';
      readonly descriptor: DownloadDescriptor;
      readonly attempts: number;
      readonly error: PartitionFetchError;
    };

export interface ExportRunResult {
  readonly exportId: string;
  /** Sealed merge of every succeeded partition. */
  readonly aggregate: Aggregate;
  /** One outcome per discovered download, in discovery order. */
  readonly outcomes: readonly PartitionOutcome[];
}

export interface OrchestratorOptions {
  readonly concurrency: number;
  readonly timeoutMs: number;
  readonly retry?: RetryPolicy | undefined;
  readonly log: Logger;
  /** Observes every partition state transition. */
  readonly onPartitionState?: ((descriptor: DownloadDescriptor, state: PartitionState) => void) | undefined;
}

const NO_RETRY: RetryPolicy = { retries: 0, backoffMs: 0 };

type ProcessResult =
  | { ok: true; attempts: number; result: PartitionResult; complete: boolean }
  | { ok: false; attempts: number; error: PartitionFetchError };

/**
 * Discovers the downloads of an export, reads them through a bounded
 * worker pool and merges the per-partition aggregates.
 *
 * Merging is single-writer: each worker returns its sealed aggregate to
 * the event loop, where it is absorbed synchronously into the run
 * aggregate. Node runs those callbacks one at a time, so no two merges
 * interleave, and since merge is associative and commutative the
 * completion order does not affect the result.
 *
 * Failed partitions are reported in the outcomes and excluded from the
 * merge. Only a discovery failure or an aborted run rejects.
 */
export class DownloadOrchestrator {
  private readonly retry: RetryPolicy;

  constructor(
    private readonly discovery: ExportDiscovery,
    private readonly source: PartitionSource,
    private readonly options: OrchestratorOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be positive, got ${options.timeoutMs}`);
    }
    this.retry = options.retry ?? NO_RETRY;
  }

  async run(exportId: string, signal?: AbortSignal): Promise<ExportRunResult> {
    const { log } = this.options;
    const descriptors = await this.discover(exportId, signal);

    log.info(
      { exportId, downloads: descriptors.length, concurrency: this.options.concurrency },
      'Downloads discovered',
    );

    const merged = new Aggregate();
    const outcomes: PartitionOutcome[] = [];
    const byIndex = new Map<number, PartitionOutcome>();

    for (const descriptor of descriptors) {
      this.transition(descriptor, 'pending');
    }

    await runBounded(
      descriptors,
      this.options.concurrency,
      async (descriptor, index) => {
        const outcome = await this.process(descriptor, signal);
        if (outcome.ok) {
          // Single writer: synchronous, never interleaved with another merge.
          merged.absorb(outcome.result.aggregate);
          byIndex.set(index, {
            state: 'succeeded',
            descriptor,
            attempts: outcome.attempts,
            complete: outcome.complete,
            stats: {
              rows: outcome.result.rows,
              skippedRows: outcome.result.skippedRows,
              headerLines: outcome.result.headerLines,
            },
          });
        } else {
          byIndex.set(index, {
            state: 'failed',
            descriptor,
            attempts: outcome.attempts,
            error: outcome.error,
          });
        }
      },
      signal,
    );

    if (signal?.aborted) {
      // Partial results of an aborted run are discarded.
      throw new Error(`Export run "${exportId}" aborted`, { cause: signal.reason });
    }

    descriptors.forEach((_, index) => {
      const outcome = byIndex.get(index);
      if (outcome) outcomes.push(outcome);
    });

    return { exportId, aggregate: merged.seal(), outcomes };
  }

  private async discover(exportId: string, signal?: AbortSignal): Promise<DownloadDescriptor[]> {
    try {
      return await this.discovery.listDownloads(exportId, signal);
    } catch (err: unknown) {
      if (err instanceof ExportNotFoundError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ExportNotFoundError(exportId, message, { cause: err });
    }
  }

  /**
   * Drives one descriptor through Pending → Fetching → Succeeded | Failed.
   * A retried attempt goes back to Pending and starts from scratch; the
   * partial aggregate of the failed attempt is dropped.
   */
  private async process(descriptor: DownloadDescriptor, signal?: AbortSignal): Promise<ProcessResult> {
    const { log } = this.options;

    for (let attempt = 1; ; attempt++) {
      this.transition(descriptor, 'fetching');
      log.debug({ download_id: descriptor.download_id, attempt }, 'Fetching download');

      const settled = await this.attempt(descriptor, signal).then(
        (result) => ({ ok: true as const, result }),
        (err: unknown) => ({ ok: false as const, error: toPartitionError(descriptor, err) }),
      );

      if (settled.ok) {
        const { result } = settled;
        this.transition(descriptor, 'succeeded');
        log.debug(
          {
            download_id: descriptor.download_id,
            rows: result.rows,
            skippedRows: result.skippedRows,
          },
          'Download processed',
        );
        return { ok: true, attempts: attempt, result, complete: this.checkComplete(descriptor, result) };
      }

      const { error } = settled;
      const canRetry = attempt <= this.retry.retries && error.reason !== 'aborted' && !signal?.aborted;
      if (!canRetry) {
        return this.fail(descriptor, attempt, error);
      }

      this.transition(descriptor, 'pending');
      log.warn(
        { download_id: descriptor.download_id, reason: error.reason, attempt },
        'Download attempt failed, retrying',
      );
      try {
        await delay(this.retry.backoffMs * attempt, undefined, { signal });
      } catch (err: unknown) {
        // The run was aborted during the backoff.
        return this.fail(descriptor, attempt, toPartitionError(descriptor, err, signal));
      }
    }
  }

  private fail(descriptor: DownloadDescriptor, attempts: number, error: PartitionFetchError): ProcessResult {
    this.transition(descriptor, 'failed');
    this.options.log.warn(
      { err: error, download_id: descriptor.download_id, reason: error.reason, attempts },
      'Download failed',
    );
    return { ok: false, attempts, error };
  }

  /**
   * Compares the data lines read against the row count the service
   * announced. A short body still counts, but is logged and flagged.
   */
  private checkComplete(descriptor: DownloadDescriptor, result: PartitionResult): boolean {
    const expected = descriptor.expected_rows;
    if (expected === undefined) return true;

    const received = result.rows + result.skippedRows;
    if (received === expected) return true;

    this.options.log.warn(
      { download_id: descriptor.download_id, expected_rows: expected, received_rows: received },
      'Download row count differs from the announced count',
    );
    return false;
  }

  /** One fetch-and-parse bounded by the per-partition timeout. */
  private async attempt(descriptor: DownloadDescriptor, runSignal?: AbortSignal): Promise<PartitionResult> {
    const controller = new AbortController();
    const onRunAbort = (): void => controller.abort(runSignal?.reason);
    if (runSignal?.aborted) {
      onRunAbort();
    } else {
      runSignal?.addEventListener('abort', onRunAbort, { once: true });
    }

    const timer = setTimeout(() => {
      const reason = new Error(`no completion within ${this.options.timeoutMs} ms`);
      reason.name = 'TimeoutError';
      controller.abort(reason);
    }, this.options.timeoutMs);

    try {
      const stream = await this.source.open(descriptor, controller.signal);
      return await readPartition(stream, descriptor, {
        log: this.options.log,
        signal: controller.signal,
      });
    } catch (err: unknown) {
      throw toPartitionError(descriptor, err, controller.signal);
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
  }

  private transition(descriptor: DownloadDescriptor, state: PartitionState): void {
    this.options.onPartitionState?.(descriptor, state);
  }
}
