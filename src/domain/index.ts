export type { EventRecord, DownloadDescriptor } from './event.js';
export { EVENT_COLUMNS } from './event.js';
export { Aggregate } from './aggregate.js';
export type { AggregateSnapshot } from './aggregate.js';
export { ExportNotFoundError, PartitionFetchError, MalformedRowError } from './errors.js';
export type { PartitionFailureReason } from './errors.js';
