import { createHash } from 'node:crypto';
import { access, mkdir, open, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { SeededRandom, formatBytes } from '@objbench/core';
import { manifestPath, readManifest, writeManifest } from './manifest.js';
import { generateFileSizes, validateParams } from './sizes.js';
import { verifyDataset } from './verify.js';
import type { DatasetParams, EnsureResult, Manifest } from './types.js';

/** Content is produced and written in fixed 1 MiB chunks */
export const CHUNK_SIZE = 1024 * 1024;

export interface GenerateOptions {
  /** Log every file as it is written */
  verbose?: boolean;
}

/**
 * Relative POSIX path of file `index`.
 *
 * Files are sharded `filesPerDirectory` at a time; shard `d` nests
 * `min(directoryDepth, d + 1)` levels deep.
 */
export function placeFile(seed: number, index: number, directoryDepth: number, filesPerDirectory: number): string {
  const dirIndex = Math.floor(index / filesPerDirectory);
  const levels = Math.min(directoryDepth, dirIndex + 1);

  const parts: string[] = [];
  for (let depth = 0; depth < levels; depth++) {
    parts.push(`dir_${seed}_${dirIndex}_${depth}`);
  }
  parts.push(`file_${seed}_${String(index).padStart(6, '0')}.bin`);
  return parts.join('/');
}

/**
 * Write `size` pseudo-random bytes to `filePath` and return their SHA-256.
 *
 * Content depends only on (seed + index, size), never on generation order.
 */
export async function generateFile(filePath: string, size: number, seed: number, index: number): Promise<string> {
  const rng = new SeededRandom(seed + index);
  const hash = createHash('sha256');

  await mkdir(dirname(filePath), { recursive: true });
  const handle = await open(filePath, 'w');
  try {
    let written = 0;
    const chunk = Buffer.allocUnsafe(Math.min(CHUNK_SIZE, size));
    while (written < size) {
      const length = Math.min(CHUNK_SIZE, size - written);
      const view = chunk.subarray(0, length);
      rng.fill(view);
      hash.update(view);
      await handle.write(view, 0, length);
      written += length;
    }
  } finally {
    await handle.close();
  }

  return hash.digest('hex');
}

/**
 * Generate every file and the manifest under `root`, unconditionally
 */
export async function generateDataset(
  params: DatasetParams,
  root: string,
  options: GenerateOptions = {}
): Promise<Manifest> {
  validateParams(params);

  const sizes = generateFileSizes(params, new SeededRandom(params.seed));
  await mkdir(root, { recursive: true });

  const total = sizes.reduce((sum, s) => sum + s, 0);
  console.log(
    `Generating dataset: ${sizes.length} files, ${formatBytes(total)} ` +
      `(seed=${params.seed}, distribution=${params.sizeDistribution}) in ${root}`
  );

  const manifest: Manifest = {
    seed: params.seed,
    total_size_gb: params.totalSizeGb,
    file_count: params.fileCount,
    distribution: params.sizeDistribution,
    min_file_size_mb: params.minFileSizeMb,
    max_file_size_mb: params.maxFileSizeMb,
    directory_depth: params.directoryDepth,
    files_per_directory: params.filesPerDirectory,
    files: [],
  };

  for (const [index, size] of sizes.entries()) {
    const path = placeFile(params.seed, index, params.directoryDepth, params.filesPerDirectory);
    const checksum = await generateFile(join(root, path), size, params.seed, index);
    manifest.files.push({ path, size, checksum });

    if (options.verbose) {
      console.log(`  [${index + 1}/${sizes.length}] ${path} ${formatBytes(size)}`);
    }
  }

  await writeManifest(manifestPath(root), manifest);
  console.log(`Dataset generation complete: ${manifestPath(root)}`);
  return manifest;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function removeListedFiles(manifest: Manifest, root: string): Promise<void> {
  for (const file of manifest.files) {
    await rm(join(root, file.path), { force: true });
  }
}

/**
 * Reuse the dataset under `root` when its manifest matches the seed and
 * verifies; otherwise regenerate it. `force` always regenerates.
 */
export async function ensureDataset(
  params: DatasetParams,
  root: string,
  options: GenerateOptions & { force?: boolean } = {}
): Promise<EnsureResult> {
  validateParams(params);
  const path = manifestPath(root);

  if (!(await exists(path))) {
    return { manifest: await generateDataset(params, root, options), action: 'generated', reason: 'no manifest' };
  }

  let existing: Manifest | null = null;
  try {
    existing = await readManifest(path);
  } catch (err) {
    console.warn(`Ignoring unreadable manifest: ${err instanceof Error ? err.message : String(err)}`);
  }

  let reason: string;
  if (options.force) {
    reason = 'forced';
  } else if (existing === null) {
    reason = 'unreadable manifest';
  } else if (existing.seed !== params.seed) {
    reason = `seed changed (${existing.seed} -> ${params.seed})`;
    console.log(`Seed changed, regenerating dataset (old=${existing.seed}, new=${params.seed})`);
  } else {
    console.log(`Dataset with seed ${params.seed} exists, verifying integrity`);
    if (await verifyDataset(existing, root)) {
      console.log('Using existing dataset');
      return { manifest: existing, action: 'reused', reason: 'verified' };
    }
    reason = 'verification failed';
    console.warn('Verification failed, regenerating dataset');
  }

  if (existing) {
    await removeListedFiles(existing, root);
  }
  return { manifest: await generateDataset(params, root, options), action: 'generated', reason };
}
