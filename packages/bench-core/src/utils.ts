import { randomBytes } from 'node:crypto';
import type { LatencyStats } from './types.js';

/**
 * Generate a unique, timestamp-derived run ID
 *
 * The result is lowercase and slash-free so it can be used as an object key prefix.
 */
export function generateRunId(prefix = 'run', now: Date = new Date()): string {
  const timestamp = now
    .toISOString()
    .replace(/[-:]/g, '')
    .replace(/\.\d{3}/, '')
    .toLowerCase();
  const random = randomBytes(4).toString('hex');
  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Percentile of an ascending-sorted array using linear interpolation
 * between closest ranks (rank = p * (n - 1)).
 */
export function percentile(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) {
    throw new Error('Cannot calculate percentile of empty array');
  }

  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (n - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const lower = sorted[lo] ?? 0;
  const upper = sorted[hi] ?? lower;
  return lower + (upper - lower) * (rank - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('Cannot calculate mean of empty array');
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Calculate statistics from an array of numbers
 */
export function calculateStats(values: readonly number[]): LatencyStats {
  if (values.length === 0) {
    throw new Error('Cannot calculate stats on empty array');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;

  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / n;

  return {
    mean: avg,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    min: sorted[0] ?? 0,
    max: sorted[n - 1] ?? 0,
    stdDev: Math.sqrt(variance),
  };
}

/**
 * Format milliseconds to human-readable string
 */
export function formatMs(ms: number): string {
  if (ms < 1) {
    return `${(ms * 1000).toFixed(2)}µs`;
  }
  if (ms < 1000) {
    return `${ms.toFixed(2)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

/**
 * Keep the last `maxChars` characters of a process stream
 */
export function tail(text: string, maxChars = 4096): string {
  return text.length > maxChars ? text.slice(text.length - maxChars) : text;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
