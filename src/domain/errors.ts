import type { DownloadDescriptor } from './event.js';

/**
 * Discovery failed: the export id is unknown to the service or its
 * downloads could not be enumerated. Fatal to a run.
 */
export class ExportNotFoundError extends Error {
  override readonly name = 'ExportNotFoundError';

  constructor(
    readonly exportId: string,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Export "${exportId}" not found: ${reason}`, options);
  }
}

export type PartitionFailureReason = 'http' | 'transport' | 'timeout' | 'aborted';

/**
 * A single partition could not be fetched or read to the end.
 * The run continues without it.
 */
export class PartitionFetchError extends Error {
  override readonly name = 'PartitionFetchError';

  constructor(
    readonly descriptor: DownloadDescriptor,
    readonly reason: PartitionFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Download ${descriptor.download_id} failed (${reason}): ${message}`, options);
  }
}

/**
 * A CSV line that cannot be decoded into an EventRecord.
 *
 * Returned by the row parser rather than thrown; the partition reader
 * counts it and moves on.
 */
export class MalformedRowError extends Error {
  override readonly name = 'MalformedRowError';

  constructor(
    readonly line: string,
    readonly reason: string,
  ) {
    super(`Malformed row (${reason})`);
  }
}
