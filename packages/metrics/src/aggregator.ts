import { createHash } from 'node:crypto';
import { readFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { AggregationError, mean, percentile } from '@objbench/core';
import { writeCsv } from './csv.js';
import { listEventFiles, providerFromFile, readNdjson } from './ndjson.js';
import type { AggregateOptions, AggregateResult, IterationSummaryRow, SummaryRow } from './types.js';

/**
 * Fields a record needs to take part in aggregation; anything else is kept but unused
 */
export const eventRecordSchema = z
  .object({
    provider: z.string().min(1),
    op: z.string().min(1),
    iteration: z.number().int(),
    duration_ms: z.number().finite(),
    bytes: z.number().finite(),
    exit_code: z.number().int(),
  })
  .passthrough();

export type ValidEventRecord = z.infer<typeof eventRecordSchema>;

const SUMMARY_COLUMNS = [
  'provider',
  'op',
  'p50_ms',
  'p95_ms',
  'p99_ms',
  'avg_ms',
  'MBps',
  'error_rate_pct',
  'samples',
] as const satisfies ReadonlyArray<keyof SummaryRow>;

const ITERATION_COLUMNS = [
  'op',
  'iteration',
  'p50_ms',
  'p95_ms',
  'p99_ms',
  'avg_ms',
  'MBps',
  'error_rate_pct',
  'samples',
  'provider',
] as const satisfies ReadonlyArray<keyof IterationSummaryRow>;

/**
 * Throughput of one record in MB/s (1 MB = 1e6 bytes).
 * A non-positive duration counts as 0.
 */
export function recordThroughput(record: Pick<ValidEventRecord, 'bytes' | 'duration_ms'>): number {
  if (record.duration_ms <= 0) return 0;
  return record.bytes / 1e6 / (record.duration_ms / 1000);
}

/**
 * Summarize one group; the group must not be empty
 */
export function summarize(provider: string, op: string, records: readonly ValidEventRecord[]): SummaryRow {
  const durations = records.map(r => r.duration_ms).sort((a, b) => a - b);
  const failures = records.filter(r => r.exit_code !== 0).length;

  return {
    provider,
    op,
    p50_ms: percentile(durations, 50),
    p95_ms: percentile(durations, 95),
    p99_ms: percentile(durations, 99),
    avg_ms: mean(durations),
    MBps: mean(records.map(recordThroughput)),
    error_rate_pct: (failures / records.length) * 100,
    samples: records.length,
  };
}

function groupBy<K, V>(items: readonly V[], keyOf: (item: V) => K): Map<K, V[]> {
  const groups = new Map<K, V[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Rows grouped by (provider, op), sorted by provider then op
 */
export function summarizeByOperation(records: readonly ValidEventRecord[]): SummaryRow[] {
  const groups = groupBy(records, r => JSON.stringify([r.provider, r.op]));
  const rows: SummaryRow[] = [];
  for (const group of groups.values()) {
    const first = group[0];
    if (first) rows.push(summarize(first.provider, first.op, group));
  }
  return rows.sort((a, b) => compare(a.provider, b.provider) || compare(a.op, b.op));
}

/**
 * Rows grouped by (op, iteration) for a single provider table
 */
export function summarizeByIteration(provider: string, records: readonly ValidEventRecord[]): IterationSummaryRow[] {
  const groups = groupBy(records, r => JSON.stringify([r.op, r.iteration]));
  const rows: IterationSummaryRow[] = [];
  for (const group of groups.values()) {
    const first = group[0];
    if (first) rows.push({ ...summarize(provider, first.op, group), iteration: first.iteration });
  }
  return rows.sort((a, b) => compare(a.op, b.op) || a.iteration - b.iteration);
}

/**
 * Split raw lines into valid records and a count of dropped ones
 */
export function validateRecords(raw: ReadonlyArray<Record<string, unknown> | null>): {
  records: ValidEventRecord[];
  dropped: number;
} {
  const records: ValidEventRecord[] = [];
  let dropped = 0;
  for (const item of raw) {
    const parsed = item === null ? null : eventRecordSchema.safeParse(item);
    if (parsed?.success) {
      records.push(parsed.data);
    } else {
      dropped++;
    }
  }
  return { records, dropped };
}

function tableName(provider: string): string {
  return `metrics_${provider.replace(/[^A-Za-z0-9._-]/g, '_')}.csv`;
}

/**
 * Aggregate every `<provider>.ndjson` under dataPath into per-provider and
 * consolidated summary tables.
 */
export async function aggregateMetrics(options: AggregateOptions): Promise<AggregateResult> {
  const { dataPath } = options;
  const manifestFile = options.manifestPath ?? join(dataPath, 'manifest.json');
  const outputDir = options.outputDir ?? dataPath;

  let manifestContent: Buffer;
  try {
    manifestContent = await readFile(manifestFile);
  } catch {
    throw new AggregationError(`Manifest not found at ${manifestFile}`, dataPath);
  }
  const manifestHash = createHash('sha256').update(manifestContent).digest('hex');

  const files = await listEventFiles(dataPath);
  if (files.length === 0) {
    throw new AggregationError(`No NDJSON metrics in ${dataPath}`, dataPath);
  }

  await mkdir(outputDir, { recursive: true });

  const all: ValidEventRecord[] = [];
  const providerTables: string[] = [];
  const skippedFiles: string[] = [];
  let droppedRecords = 0;

  for (const file of files) {
    const { records, dropped } = validateRecords(await readNdjson(file));
    droppedRecords += dropped;

    if (records.length === 0) {
      console.warn(`Skipping ${file}: no valid records`);
      skippedFiles.push(file);
      continue;
    }

    const provider = providerFromFile(file);
    const tablePath = join(outputDir, tableName(provider));
    await writeCsv(tablePath, summarizeByIteration(provider, records), ITERATION_COLUMNS);
    providerTables.push(tablePath);
    all.push(...records);
  }

  if (all.length === 0) {
    throw new AggregationError('NDJSON present but contained no valid rows', dataPath);
  }

  const summary = summarizeByOperation(all);
  const consolidatedTable = join(outputDir, 'consolidated_metrics.csv');
  await writeCsv(consolidatedTable, summary, SUMMARY_COLUMNS);

  return {
    manifestHash,
    providers: [...new Set(all.map(r => r.provider))].sort(compare),
    providerTables,
    consolidatedTable,
    summary,
    skippedFiles,
    droppedRecords,
  };
}
