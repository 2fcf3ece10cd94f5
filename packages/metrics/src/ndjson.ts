import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

/**
 * Sorted paths of every `*.ndjson` file directly under `dir`
 */
export async function listEventFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(e => e.isFile() && e.name.endsWith('.ndjson'))
    .map(e => join(dir, e.name))
    .sort();
}

export function providerFromFile(path: string): string {
  return basename(path, '.ndjson');
}

/**
 * Parse each non-empty line; lines that are not JSON objects come back as null
 */
export async function readNdjson(path: string): Promise<Array<Record<string, unknown> | null>> {
  const content = await readFile(path, 'utf8');
  const out: Array<Record<string, unknown> | null> = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    try {
      const value: unknown = JSON.parse(trimmed);
      out.push(isRecord(value) ? value : null);
    } catch {
      // Truncated line from an interrupted run
      out.push(null);
    }
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
