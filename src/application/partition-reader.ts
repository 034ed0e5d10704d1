import type { Logger } from 'pino';
import { Aggregate, PartitionFetchError } from '../domain/index.js';
import type { DownloadDescriptor, PartitionFailureReason } from '../domain/index.js';
import { LineSplitter, DEFAULT_MAX_LINE_LENGTH } from './line-splitter.js';
import { parseRow } from './row-parser.js';

// Malformed rows logged per partition; the rest are only counted.
const MAX_LOGGED_MALFORMED = 5;

/** Row counters collected while reading one partition. */
export interface PartitionStats {
  readonly rows: number;
  readonly skippedRows: number;
  readonly headerLines: number;
}

export interface PartitionResult extends PartitionStats {
  readonly descriptor: DownloadDescriptor;
  /** Sealed counts for this partition alone. */
  readonly aggregate: Aggregate;
}

export interface ReadPartitionOptions {
  log?: Pick<Logger, 'debug'> | undefined;
  signal?: AbortSignal | undefined;
  maxLineLength?: number | undefined;
}

/**
 * Streams one partition through the row parser into a fresh Aggregate.
 *
 * Chunks are consumed as they arrive and never buffered whole. Malformed
 * rows are counted in `skippedRows` and never abort the partition; any
 * failure of the stream itself surfaces as a PartitionFetchError tagged
 * with the descriptor.
 */
export async function readPartition(
  source: AsyncIterable<Uint8Array>,
  descriptor: DownloadDescriptor,
  options: ReadPartitionOptions = {},
): Promise<PartitionResult> {
  const { log, signal } = options;
  const splitter = new LineSplitter(options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH);
  const aggregate = new Aggregate();

  let lineNumber = 0;
  let rows = 0;
  let skippedRows = 0;
  let headerLines = 0;
  let sawContent = false;

  const handleLine = (line: string): void => {
    lineNumber++;
    // Only the first non-blank line may be a header.
    const parsed = parseRow(line, { allowHeader: !sawContent });

    switch (parsed.kind) {
      case 'blank':
        return;
      case 'header':
        headerLines++;
        break;
      case 'record':
        aggregate.increment(parsed.record.patient_id, parsed.record.event_type);
        rows++;
        break;
      case 'malformed':
        skippedRows++;
        if (skippedRows <= MAX_LOGGED_MALFORMED) {
          log?.debug(
            { download_id: descriptor.download_id, line: lineNumber, reason: parsed.error.reason },
            'Skipping malformed row',
          );
        }
        break;
    }
    sawContent = true;
  };

  try {
    for await (const chunk of source) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      for (const line of splitter.push(chunk)) handleLine(line);
    }
    for (const line of splitter.end()) handleLine(line);
  } catch (err: unknown) {
    throw toPartitionError(descriptor, err, signal);
  }

  skippedRows += splitter.droppedLines;

  return {
    descriptor,
    aggregate: aggregate.seal(),
    rows,
    skippedRows,
    headerLines,
  };
}

/**
 * Normalises anything thrown while fetching or reading a partition.
 *
 * An aborted `signal` wins over the thrown value: a `TimeoutError`
 * reason maps to `timeout`, anything else to `aborted`.
 */
export function toPartitionError(
  descriptor: DownloadDescriptor,
  err: unknown,
  signal?: AbortSignal,
): PartitionFetchError {
  if (err instanceof PartitionFetchError) return err;

  let reason: PartitionFailureReason = 'transport';
  if (signal?.aborted) {
    reason = isTimeout(signal.reason) ? 'timeout' : 'aborted';
  } else if (isTimeout(err)) {
    reason = 'timeout';
  }

  const message = err instanceof Error ? err.message : String(err);
  return new PartitionFetchError(descriptor, reason, message, { cause: err });
}

function isTimeout(value: unknown): boolean {
  return value instanceof Error && value.name === 'TimeoutError';
}
