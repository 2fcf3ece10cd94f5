/**
 * Derived latency/throughput/error statistics for one group of records
 */
export interface SummaryRow {
  provider: string;
  op: string;
  p50_ms: number;
  p95_ms: number;
  p99_ms: number;
  avg_ms: number;
  /** Mean of per-record throughput, not total bytes over total time */
  MBps: number;
  /** 0–100 */
  error_rate_pct: number;
  samples: number;
}

/**
 * Per-provider rows are additionally split by iteration
 */
export interface IterationSummaryRow extends SummaryRow {
  iteration: number;
}

export interface AggregateOptions {
  /** Directory holding `<provider>.ndjson` files and the manifest */
  dataPath: string;
  /** Defaults to `<dataPath>/manifest.json` */
  manifestPath?: string;
  /** Where tables are written; defaults to dataPath */
  outputDir?: string;
}

export interface AggregateResult {
  /** SHA-256 of manifest.json, linking the numbers to the dataset */
  manifestHash: string;
  /** Providers with at least one valid record, sorted */
  providers: string[];
  providerTables: string[];
  consolidatedTable: string;
  summary: SummaryRow[];
  /** Event files that held no valid record */
  skippedFiles: string[];
  /** Lines dropped as malformed across all files */
  droppedRecords: number;
}

export interface ErrorCount {
  provider: string;
  op: string;
  exit_code: number;
  count: number;
  /** Most frequent error message in the group, empty when none */
  error: string;
}

export interface ErrorSummary {
  counts: ErrorCount[];
  topErrors: Record<string, Array<{ error: string; count: number }>>;
}
