export { parseRow } from './row-parser.js';
export type { ParsedRow, ParseRowOptions } from './row-parser.js';
export { LineSplitter, DEFAULT_MAX_LINE_LENGTH } from './line-splitter.js';
export { readPartition, toPartitionError } from './partition-reader.js';
export type { PartitionResult, PartitionStats, ReadPartitionOptions } from './partition-reader.js';
export { runBounded } from './worker-pool.js';
export { DownloadOrchestrator } from './orchestrator.js';
export type {
  ExportDiscovery,
  PartitionSource,
  RetryPolicy,
  PartitionState,
  PartitionOutcome,
  ExportRunResult,
  OrchestratorOptions,
} from './orchestrator.js';
export { toReport, formatReport, summarizeRun, runExportPipeline } from './export-pipeline.js';
export type {
  ExportReport,
  RunDiagnostics,
  PartitionFailureSummary,
  IncompletePartitionSummary,
  ExportPipelineResult,
} from './export-pipeline.js';
