import type { Aggregate, AggregateSnapshot, PartitionFailureReason } from '../domain/index.js';
import type { DownloadOrchestrator, ExportRunResult } from './orchestrator.js';

/** Final report: per-patient counts by event type, plus totals by event type. */
export type ExportReport = AggregateSnapshot;

export interface PartitionFailureSummary {
  download_id: string;
  reason: PartitionFailureReason;
  message: string;
}

/** A partition whose data lines differ from the row count the service announced. */
export interface IncompletePartitionSummary {
  download_id: string;
  expected_rows: number;
  received_rows: number;
}

/** Counters for the diagnostic channel; never part of the report itself. */
export interface RunDiagnostics {
  exportId: string;
  downloads: number;
  succeeded: number;
  failed: number;
  rows: number;
  skippedRows: number;
  headerLines: number;
  failures: PartitionFailureSummary[];
  incomplete: IncompletePartitionSummary[];
}

export interface ExportPipelineResult {
  report: ExportReport;
  diagnostics: RunDiagnostics;
}

/** Converts a merged aggregate into the report shape, keys sorted. */
export function toReport(aggregate: Aggregate): ExportReport {
  return aggregate.toSnapshot();
}

/** Pretty-printed JSON, two-space indent, newline-terminated. */
export function formatReport(report: ExportReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function summarizeRun(run: ExportRunResult): RunDiagnostics {
  const diagnostics: RunDiagnostics = {
    exportId: run.exportId,
    downloads: run.outcomes.length,
    succeeded: 0,
    failed: 0,
    rows: 0,
    skippedRows: 0,
    headerLines: 0,
    failures: [],
    incomplete: [],
  };

  for (const outcome of run.outcomes) {
    if (outcome.state === 'succeeded') {
      diagnostics.succeeded++;
      diagnostics.rows += outcome.stats.rows;
      diagnostics.skippedRows += outcome.stats.skippedRows;
      diagnostics.headerLines += outcome.stats.headerLines;
      const expected = outcome.descriptor.expected_rows;
      if (!outcome.complete && expected !== undefined) {
        diagnostics.incomplete.push({
          download_id: outcome.descriptor.download_id,
          expected_rows: expected,
          received_rows: outcome.stats.rows + outcome.stats.skippedRows,
        });
      }
    } else {
      diagnostics.failed++;
      diagnostics.failures.push({
        download_id: outcome.descriptor.download_id,
        reason: outcome.error.reason,
        message: outcome.error.message,
      });
    }
  }

  return diagnostics;
}

/**
 * Use case: aggregate one export into its report.
 *
 * Partial failures still produce a report for the partitions that
 * succeeded; the failures travel back in `diagnostics` for the caller
 * to surface. Discovery failures reject with ExportNotFoundError.
 */
export async function runExportPipeline(
  orchestrator: DownloadOrchestrator,
  exportId: string,
  signal?: AbortSignal,
): Promise<ExportPipelineResult> {
  const run = await orchestrator.run(exportId, signal);
  return {
    report: toReport(run.aggregate),
    diagnostics: summarizeRun(run),
  };
}
