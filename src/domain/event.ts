/**
 * Core domain types for patient event exports.
 *
 * These types describe the data as it flows from a remote export
 * through the aggregation pipeline. They carry no framework dependencies.
 */

/**
 * One decoded CSV row.
 *
 * Constructed per row and discarded once counted. `event_time` is
 * carried as read; `value` must be numeric. Neither reaches the report.
 */
export interface EventRecord {
  readonly patient_id: string;
  readonly event_time: string;
  readonly event_type: string;
  readonly value: number;
}

/** Column order of every export partition. */
export const EVENT_COLUMNS = ['patient_id', 'event_time', 'event_type', 'value'] as const;

/**
 * Identifies one fetchable partition of an export.
 *
 * Time ranges of descriptors belonging to the same export never overlap;
 * that is guaranteed by the export service and not re-checked here.
 */
export interface DownloadDescriptor {
  readonly export_id: string;
  readonly download_id: string;
  readonly url: string;
  readonly start_time: string; // ISO-8601
  readonly end_time: string; // ISO-8601
  /** Row count announced by the service, if it reported one. */
  readonly expected_rows?: number | undefined;
}
