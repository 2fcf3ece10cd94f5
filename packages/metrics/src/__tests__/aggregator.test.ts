import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AggregationError } from '@objbench/core';
import {
  aggregateMetrics,
  recordThroughput,
  summarizeByIteration,
  summarizeByOperation,
  validateRecords,
  type ValidEventRecord,
} from '../aggregator.js';

const rec = (overrides: Partial<ValidEventRecord>): ValidEventRecord => ({
  provider: 'x',
  op: 'PUT',
  iteration: 1,
  attempt: 1,
  duration_ms: 100,
  bytes: 1_000_000,
  exit_code: 0,
  error: '',
  ...overrides,
});

const ndjson = (lines: unknown[]): string =>
  lines.map(l => (typeof l === 'string' ? l : JSON.stringify(l))).join('\n') + '\n';

const threePuts = [
  rec({ duration_ms: 100, exit_code: 0 }),
  rec({ duration_ms: 200, exit_code: 0 }),
  rec({ duration_ms: 300, exit_code: 1, error: 'connection reset' }),
];

describe('summarizeByOperation', () => {
  it('computes percentiles, mean throughput and error rate', () => {
    const [row] = summarizeByOperation(threePuts);

    expect(row).toBeDefined();
    expect(row?.provider).toBe('x');
    expect(row?.op).toBe('PUT');
    expect(row?.samples).toBe(3);
    expect(row?.avg_ms).toBe(200);
    expect(row?.p50_ms).toBe(200);
    expect(row?.p95_ms).toBeCloseTo(290, 9);
    expect(row?.p99_ms).toBeCloseTo(298, 9);
    expect(row?.error_rate_pct).toBeCloseTo(100 / 3, 9);
    // mean of 10, 5 and 3.333… MB/s
    expect(row?.MBps).toBeCloseTo((10 + 5 + 10 / 3) / 3, 9);
  });

  it('groups by provider and op in sorted order', () => {
    const rows = summarizeByOperation([
      rec({ provider: 'y', op: 'GET' }),
      rec({ provider: 'x', op: 'PUT' }),
      rec({ provider: 'x', op: 'GET' }),
      rec({ provider: 'x', op: 'GET', duration_ms: 300 }),
    ]);

    expect(rows.map(r => [r.provider, r.op, r.samples])).toEqual([
      ['x', 'GET', 2],
      ['x', 'PUT', 1],
      ['y', 'GET', 1],
    ]);
  });
});

describe('summarizeByIteration', () => {
  it('splits by op and iteration, keeping warmup as iteration 0', () => {
    const rows = summarizeByIteration('x', [
      rec({ op: 'PUT', iteration: 1 }),
      rec({ op: 'GET', iteration: 2 }),
      rec({ op: 'GET', iteration: 1 }),
      rec({ op: 'PUT', iteration: 0 }),
    ]);

    expect(rows.map(r => [r.op, r.iteration])).toEqual([
      ['GET', 1],
      ['GET', 2],
      ['PUT', 0],
      ['PUT', 1],
    ]);
  });
});

describe('validateRecords', () => {
  it('drops lines missing a required field', () => {
    const withoutExit: Record<string, unknown> = { ...rec({}) };
    delete withoutExit.exit_code;

    const { records, dropped } = validateRecords([{ ...rec({}) }, withoutExit, null]);
    expect(records).toHaveLength(1);
    expect(dropped).toBe(2);
  });

  it('drops records with mistyped fields', () => {
    const { records } = validateRecords([{ ...rec({}), duration_ms: '12' }]);
    expect(records).toHaveLength(0);
  });
});

describe('recordThroughput', () => {
  it('uses decimal megabytes per second', () => {
    expect(recordThroughput({ bytes: 2_000_000, duration_ms: 500 })).toBe(4);
  });

  it('treats a zero duration as no throughput', () => {
    expect(recordThroughput({ bytes: 1_000_000, duration_ms: 0 })).toBe(0);
  });
});

describe('aggregateMetrics', () => {
  let dataPath: string;
  const manifestContent = '{"seed":1,"files":[]}\n';

  beforeEach(async () => {
    dataPath = await mkdtemp(join(tmpdir(), 'aggregate-test-'));
    await writeFile(join(dataPath, 'manifest.json'), manifestContent);
  });

  afterEach(async () => {
    await rm(dataPath, { recursive: true, force: true });
  });

  it('writes per-provider and consolidated tables', async () => {
    await writeFile(join(dataPath, 'x.ndjson'), ndjson(threePuts));

    const result = await aggregateMetrics({ dataPath });

    expect(result.manifestHash).toBe(createHash('sha256').update(manifestContent).digest('hex'));
    expect(result.providers).toEqual(['x']);
    expect(result.providerTables).toEqual([join(dataPath, 'metrics_x.csv')]);
    expect(result.consolidatedTable).toBe(join(dataPath, 'consolidated_metrics.csv'));

    expect(await readFile(result.consolidatedTable, 'utf8')).toBe(
      'provider,op,p50_ms,p95_ms,p99_ms,avg_ms,MBps,error_rate_pct,samples\n' +
        'x,PUT,200,290,298,200,6.111,33.333,3\n'
    );
    expect(await readFile(join(dataPath, 'metrics_x.csv'), 'utf8')).toBe(
      'op,iteration,p50_ms,p95_ms,p99_ms,avg_ms,MBps,error_rate_pct,samples,provider\n' +
        'PUT,1,200,290,298,200,6.111,33.333,3,x\n'
    );
  });

  it('drops malformed lines without abandoning the file', async () => {
    const { exit_code: _omitted, ...missingExit } = rec({ duration_ms: 999 });
    await writeFile(
      join(dataPath, 'x.ndjson'),
      ndjson([rec({ duration_ms: 150 }), missingExit, '{"provider":"x","op":"PU'])
    );

    const result = await aggregateMetrics({ dataPath });

    expect(result.summary).toHaveLength(1);
    expect(result.summary[0]?.samples).toBe(1);
    expect(result.summary[0]?.avg_ms).toBe(150);
    expect(result.droppedRecords).toBe(2);
  });

  it('skips a provider file with no valid records', async () => {
    await writeFile(join(dataPath, 'x.ndjson'), ndjson(threePuts));
    await writeFile(join(dataPath, 'y.ndjson'), ndjson(['not json', { provider: 'y' }]));

    const result = await aggregateMetrics({ dataPath });

    expect(result.providers).toEqual(['x']);
    expect(result.skippedFiles).toEqual([join(dataPath, 'y.ndjson')]);
    expect(result.providerTables).toEqual([join(dataPath, 'metrics_x.csv')]);
  });

  it('keeps providers isolated in the consolidated summary', async () => {
    await writeFile(join(dataPath, 'x.ndjson'), ndjson(threePuts));
    await writeFile(
      join(dataPath, 'y.ndjson'),
      ndjson([rec({ provider: 'y', duration_ms: 50 }), rec({ provider: 'y', duration_ms: 70 })])
    );

    const result = await aggregateMetrics({ dataPath });

    expect(result.providers).toEqual(['x', 'y']);
    expect(result.summary.map(r => [r.provider, r.samples, r.avg_ms])).toEqual([
      ['x', 3, 200],
      ['y', 2, 60],
    ]);
  });

  it('fails when no file yields a valid record', async () => {
    await writeFile(join(dataPath, 'x.ndjson'), ndjson(['{}', 'garbage']));

    await expect(aggregateMetrics({ dataPath })).rejects.toThrow(AggregationError);
    await expect(aggregateMetrics({ dataPath })).rejects.toThrow('contained no valid rows');
  });

  it('fails without event files', async () => {
    await expect(aggregateMetrics({ dataPath })).rejects.toThrow('No NDJSON metrics');
  });

  it('fails without a manifest', async () => {
    await rm(join(dataPath, 'manifest.json'));
    await writeFile(join(dataPath, 'x.ndjson'), ndjson(threePuts));

    await expect(aggregateMetrics({ dataPath })).rejects.toThrow('Manifest not found');
  });
});
