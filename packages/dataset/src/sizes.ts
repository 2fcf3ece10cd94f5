import { ConfigError, DatasetError, type SeededRandom } from '@objbench/core';
import { SIZE_DISTRIBUTIONS, type DatasetParams, type SizeDistribution } from './types.js';

const MIB = 1024 * 1024;
const GIB = 1024 * MIB;

function isSizeDistribution(value: string): value is SizeDistribution {
  return (SIZE_DISTRIBUTIONS as readonly string[]).includes(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function validateParams(params: DatasetParams): void {
  const issues: string[] = [];
  if (!Number.isInteger(params.fileCount) || params.fileCount < 1) {
    issues.push(`file_count must be a positive integer (got ${params.fileCount})`);
  }
  if (!(params.minFileSizeMb > 0)) {
    issues.push(`min_file_size_mb must be positive (got ${params.minFileSizeMb})`);
  }
  if (!(params.maxFileSizeMb >= params.minFileSizeMb)) {
    issues.push(`max_file_size_mb must be >= min_file_size_mb (got ${params.maxFileSizeMb})`);
  }
  if (!(params.totalSizeGb > 0)) {
    issues.push(`total_size_gb must be positive (got ${params.totalSizeGb})`);
  }
  if (!Number.isInteger(params.directoryDepth) || params.directoryDepth < 0) {
    issues.push(`directory_depth must be a non-negative integer (got ${params.directoryDepth})`);
  }
  if (!Number.isInteger(params.filesPerDirectory) || params.filesPerDirectory < 1) {
    issues.push(`files_per_directory must be a positive integer (got ${params.filesPerDirectory})`);
  }
  if (!isSizeDistribution(params.sizeDistribution)) {
    issues.push(`Unknown distribution: ${params.sizeDistribution} (expected ${SIZE_DISTRIBUTIONS.join(', ')})`);
  }
  if (issues.length > 0) {
    throw new ConfigError('Invalid dataset parameters', issues);
  }

  // Every file gets at least min bytes, so the floor must fit in the total
  const floorBytes = params.fileCount * Math.floor(params.minFileSizeMb * MIB);
  const totalBytes = Math.floor(params.totalSizeGb * GIB);
  if (floorBytes > totalBytes) {
    throw new DatasetError(
      `Infeasible dataset: ${params.fileCount} files of at least ${params.minFileSizeMb} MiB ` +
        `need ${floorBytes} bytes but total_size_gb allows ${totalBytes}`
    );
  }
}

function fixedSizes(count: number, total: number, min: number, max: number): number[] {
  const size = clamp(Math.floor(total / count), min, max);
  return Array.from({ length: count }, () => size);
}

function randomSizes(count: number, total: number, min: number, max: number, rng: SeededRandom): number[] {
  const sizes: number[] = [];
  let remaining = total;

  for (let i = 0; i < count - 1; i++) {
    // Keep the remaining budget reachable by the files still to come
    const filesAfter = count - i - 1;
    const maxAllowed = Math.min(max, remaining - filesAfter * min);
    const minAllowed = Math.min(Math.max(min, remaining - filesAfter * max), maxAllowed);

    const size = rng.int(minAllowed, maxAllowed);
    sizes.push(size);
    remaining -= size;
  }

  sizes.push(clamp(remaining, min, max));
  return sizes;
}

function mixedSizes(count: number, total: number, min: number, max: number, rng: SeededRandom): number[] {
  const medium = Math.floor((min + max) / 2);
  const nSmall = Math.floor(count * 0.6);
  const nMedium = Math.floor(count * 0.3);
  const nLarge = count - nSmall - nMedium;

  const sizes = rng.shuffle([
    ...Array.from({ length: nSmall }, () => min),
    ...Array.from({ length: nMedium }, () => medium),
    ...Array.from({ length: nLarge }, () => max),
  ]);

  const current = sizes.reduce((sum, s) => sum + s, 0);
  const factor = total / current;
  if (current < total) {
    return sizes.map(s => Math.floor(s * factor));
  }
  if (current > total) {
    return sizes.map(s => Math.max(min, Math.floor(s * factor)));
  }
  return sizes;
}

/**
 * Per-file sizes in bytes for a distribution.
 *
 * The same params and a generator in the same state always give the same sizes.
 */
export function generateFileSizes(params: DatasetParams, rng: SeededRandom): number[] {
  validateParams(params);

  const total = Math.floor(params.totalSizeGb * GIB);
  const min = Math.floor(params.minFileSizeMb * MIB);
  const max = Math.floor(params.maxFileSizeMb * MIB);
  const count = params.fileCount;

  let sizes: number[];
  switch (params.sizeDistribution) {
    case 'fixed':
      sizes = fixedSizes(count, total, min, max);
      break;
    case 'random':
      sizes = randomSizes(count, total, min, max, rng);
      break;
    case 'mixed':
      sizes = mixedSizes(count, total, min, max, rng);
      break;
    default:
      throw new ConfigError(`Unknown distribution: ${params.sizeDistribution}`);
  }

  return sizes;
}
