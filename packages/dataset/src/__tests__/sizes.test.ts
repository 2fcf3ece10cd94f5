import { describe, it, expect } from 'vitest';
import { ConfigError, DatasetError, SeededRandom } from '@objbench/core';
import { generateFileSizes } from '../sizes.js';
import type { DatasetParams } from '../types.js';

const MIB = 1024 * 1024;

const params = (overrides: Partial<DatasetParams>): DatasetParams => ({
  seed: 42,
  totalSizeGb: 0.01,
  fileCount: 5,
  minFileSizeMb: 1,
  maxFileSizeMb: 4,
  sizeDistribution: 'fixed',
  directoryDepth: 2,
  filesPerDirectory: 10,
  ...overrides,
});

const sum = (values: number[]): number => values.reduce((a, b) => a + b, 0);

describe('generateFileSizes', () => {
  describe('fixed', () => {
    it('gives every file the same in-bounds size', () => {
      const sizes = generateFileSizes(params({ fileCount: 4 }), new SeededRandom(42));
      expect(sizes).toEqual([2684354, 2684354, 2684354, 2684354]);
    });

    it('clamps to the per-file bounds', () => {
      const sizes = generateFileSizes(
        params({ totalSizeGb: 1, fileCount: 2, maxFileSizeMb: 2 }),
        new SeededRandom(42)
      );
      expect(sizes).toEqual([2 * MIB, 2 * MIB]);
    });
  });

  describe('random', () => {
    it('keeps every size within bounds and hits the total exactly', () => {
      const sizes = generateFileSizes(params({ sizeDistribution: 'random' }), new SeededRandom(42));
      expect(sizes).toHaveLength(5);
      for (const size of sizes) {
        expect(size).toBeGreaterThanOrEqual(MIB);
        expect(size).toBeLessThanOrEqual(4 * MIB);
      }
      expect(sum(sizes)).toBe(Math.floor(0.01 * 1024 * MIB));
    });

    it('is reproducible for a seed', () => {
      const a = generateFileSizes(params({ sizeDistribution: 'random' }), new SeededRandom(7));
      const b = generateFileSizes(params({ sizeDistribution: 'random' }), new SeededRandom(7));
      const c = generateFileSizes(params({ sizeDistribution: 'random' }), new SeededRandom(8));
      expect(a).toEqual(b);
      expect(a).not.toEqual(c);
    });
  });

  describe('mixed', () => {
    it('scales down and re-clamps to the minimum', () => {
      const sizes = generateFileSizes(
        params({ sizeDistribution: 'mixed', fileCount: 10, maxFileSizeMb: 3 }),
        new SeededRandom(42)
      );
      expect(sizes).toHaveLength(10);
      expect([...new Set(sizes)].sort((a, b) => a - b)).toEqual([MIB, 1431655, 2147483]);
      expect(sizes.filter(s => s === MIB)).toHaveLength(6);
      expect(sizes.filter(s => s === 1431655)).toHaveLength(3);
    });

    it('scales up toward the target with at least two distinct sizes', () => {
      const sizes = generateFileSizes(
        params({ sizeDistribution: 'mixed', fileCount: 3, maxFileSizeMb: 3 }),
        new SeededRandom(42)
      );
      const target = Math.floor(0.01 * 1024 * MIB);
      expect(new Set(sizes).size).toBeGreaterThanOrEqual(2);
      expect(target - sum(sizes)).toBeGreaterThanOrEqual(0);
      expect(target - sum(sizes)).toBeLessThanOrEqual(3);
    });

    it('shuffles the buckets by seed', () => {
      const a = generateFileSizes(
        params({ sizeDistribution: 'mixed', fileCount: 20, totalSizeGb: 0.05 }),
        new SeededRandom(1)
      );
      const b = generateFileSizes(
        params({ sizeDistribution: 'mixed', fileCount: 20, totalSizeGb: 0.05 }),
        new SeededRandom(1)
      );
      expect(a).toEqual(b);
    });
  });

  it('rejects an unknown distribution', () => {
    expect(() => generateFileSizes(params({ sizeDistribution: 'zipf' }), new SeededRandom(1))).toThrow(ConfigError);
    expect(() => generateFileSizes(params({ sizeDistribution: 'zipf' }), new SeededRandom(1))).toThrow(
      'Unknown distribution: zipf'
    );
  });

  it('rejects a total too small for file_count minimum-size files', () => {
    const tight = params({
      sizeDistribution: 'random',
      totalSizeGb: 0.001,
      fileCount: 4,
      minFileSizeMb: 1,
      maxFileSizeMb: 2,
    });

    expect(() => generateFileSizes(tight, new SeededRandom(1))).toThrow(DatasetError);
    expect(() => generateFileSizes(tight, new SeededRandom(1))).toThrow(
      'Infeasible dataset: 4 files of at least 1 MiB need 4194304 bytes but total_size_gb allows 1073741'
    );
  });

  it('accepts a total exactly at the minimum floor', () => {
    const sizes = generateFileSizes(
      params({ sizeDistribution: 'random', totalSizeGb: 4 / 1024, fileCount: 4, minFileSizeMb: 1, maxFileSizeMb: 2 }),
      new SeededRandom(1)
    );
    expect(sizes).toEqual([MIB, MIB, MIB, MIB]);
  });

  it('lists every invalid parameter', () => {
    try {
      generateFileSizes(params({ fileCount: 0, maxFileSizeMb: 0.5 }), new SeededRandom(1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          'file_count must be a positive integer (got 0)',
          'max_file_size_mb must be >= min_file_size_mb (got 0.5)',
        ]);
      }
    }
  });
});
