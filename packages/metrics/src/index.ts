export type {
  SummaryRow,
  IterationSummaryRow,
  AggregateOptions,
  AggregateResult,
  ErrorCount,
  ErrorSummary,
} from './types.js';
export {
  eventRecordSchema,
  recordThroughput,
  summarize,
  summarizeByOperation,
  summarizeByIteration,
  validateRecords,
  aggregateMetrics,
} from './aggregator.js';
export type { ValidEventRecord } from './aggregator.js';
export { summarizeErrors, writeErrorCsv } from './triage.js';
export { toCsv, writeCsv } from './csv.js';
