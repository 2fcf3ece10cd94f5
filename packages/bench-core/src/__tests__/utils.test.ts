import { describe, it, expect } from 'vitest';
import { calculateStats, formatBytes, formatMs, generateRunId, percentile, tail } from '../utils.js';

describe('percentile', () => {
  it('returns the middle value for an odd-sized median', () => {
    expect(percentile([100, 200, 300], 50)).toBe(200);
  });

  it('interpolates linearly between closest ranks', () => {
    // rank = 0.95 * 3 = 2.85 → 3 + 0.85 * (4 - 3)
    expect(percentile([1, 2, 3, 4], 95)).toBeCloseTo(3.85, 10);
    expect(percentile([10, 20], 50)).toBe(15);
  });

  it('returns the only value for a single sample', () => {
    expect(percentile([42], 99)).toBe(42);
  });

  it('throws on empty input', () => {
    expect(() => percentile([], 50)).toThrow('empty');
  });
});

describe('calculateStats', () => {
  it('summarizes unsorted samples', () => {
    const stats = calculateStats([300, 100, 200]);
    expect(stats.mean).toBe(200);
    expect(stats.p50).toBe(200);
    expect(stats.min).toBe(100);
    expect(stats.max).toBe(300);
    expect(stats.p99).toBeCloseTo(298, 10);
  });
});

describe('generateRunId', () => {
  it('derives a lowercase key-safe id from the timestamp', () => {
    const id = generateRunId('run', new Date('2026-10-19T10:15:00.123Z'));
    expect(id).toMatch(/^run-20261019t101500z-[0-9a-f]{8}$/);
  });

  it('produces distinct ids for the same instant', () => {
    const now = new Date('2026-10-19T10:15:00.000Z');
    expect(generateRunId('run', now)).not.toBe(generateRunId('run', now));
  });
});

describe('formatting', () => {
  it('formats durations by magnitude', () => {
    expect(formatMs(0.5)).toBe('500.00µs');
    expect(formatMs(12.5)).toBe('12.50ms');
    expect(formatMs(1500)).toBe('1.50s');
  });

  it('formats byte counts with binary units', () => {
    expect(formatBytes(512)).toBe('512.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.00 MB');
  });

  it('keeps only the tail of long output', () => {
    expect(tail('abcdef', 3)).toBe('def');
    expect(tail('abc', 10)).toBe('abc');
  });
});
