import { writeCsv } from './csv.js';
import { listEventFiles, providerFromFile, readNdjson } from './ndjson.js';
import type { ErrorCount, ErrorSummary } from './types.js';

interface LooseRecord {
  provider: string;
  op: string;
  exit_code: number;
  error: string;
}

function loosen(raw: Record<string, unknown>, fallbackProvider: string): LooseRecord {
  const exit = Number(raw.exit_code ?? 0);
  return {
    provider: typeof raw.provider === 'string' ? raw.provider : fallbackProvider,
    op: typeof raw.op === 'string' ? raw.op : '?',
    exit_code: Number.isFinite(exit) ? Math.trunc(exit) : 0,
    error: typeof raw.error === 'string' ? raw.error : '',
  };
}

function mostCommon(values: readonly string[]): Array<{ error: string; count: number }> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([error, count]) => ({ error, count }))
    .sort((a, b) => b.count - a.count || (a.error < b.error ? -1 : a.error > b.error ? 1 : 0));
}

/**
 * Count records by (provider, op, exit_code) and rank error messages per provider.
 *
 * Unlike aggregation this accepts incomplete records, defaulting what is missing.
 */
export async function summarizeErrors(
  dataPath: string,
  options: { provider?: string | undefined; top?: number } = {}
): Promise<ErrorSummary> {
  const top = options.top ?? 20;
  const records: LooseRecord[] = [];

  for (const file of await listEventFiles(dataPath)) {
    const stem = providerFromFile(file);
    if (options.provider && stem !== options.provider) continue;
    for (const raw of await readNdjson(file)) {
      if (raw) records.push(loosen(raw, stem));
    }
  }

  const groups = new Map<string, { key: Omit<ErrorCount, 'count' | 'error'>; errors: string[]; count: number }>();
  for (const r of records) {
    const id = JSON.stringify([r.provider, r.op, r.exit_code]);
    const group = groups.get(id) ?? {
      key: { provider: r.provider, op: r.op, exit_code: r.exit_code },
      errors: [],
      count: 0,
    };
    group.count++;
    if (r.error) group.errors.push(r.error);
    groups.set(id, group);
  }

  const counts: ErrorCount[] = [...groups.values()]
    .map(g => ({ ...g.key, count: g.count, error: mostCommon(g.errors)[0]?.error ?? '' }))
    .sort((a, b) =>
      a.provider.localeCompare(b.provider) || a.op.localeCompare(b.op) || a.exit_code - b.exit_code
    );

  const topErrors: ErrorSummary['topErrors'] = {};
  const byProvider = new Map<string, string[]>();
  for (const r of records) {
    if (!r.error) continue;
    const list = byProvider.get(r.provider) ?? [];
    list.push(r.error);
    byProvider.set(r.provider, list);
  }
  for (const [provider, errors] of byProvider) {
    topErrors[provider] = mostCommon(errors).slice(0, top);
  }

  return { counts, topErrors };
}

export async function writeErrorCsv(path: string, summary: ErrorSummary): Promise<void> {
  await writeCsv(path, summary.counts, ['provider', 'op', 'exit_code', 'count', 'error']);
}
