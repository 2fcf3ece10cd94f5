export const SIZE_DISTRIBUTIONS = ['fixed', 'random', 'mixed'] as const;

export type SizeDistribution = (typeof SIZE_DISTRIBUTIONS)[number];

/**
 * Parameters that fully determine a generated dataset
 */
export interface DatasetParams {
  /** Seed for every random choice */
  seed: number;
  /** Target aggregate size in GiB */
  totalSizeGb: number;
  /** Number of files */
  fileCount: number;
  /** Lower per-file bound in MiB */
  minFileSizeMb: number;
  /** Upper per-file bound in MiB */
  maxFileSizeMb: number;
  /** One of SIZE_DISTRIBUTIONS; anything else is rejected */
  sizeDistribution: string;
  /** Maximum directory nesting */
  directoryDepth: number;
  /** Files sharing one directory */
  filesPerDirectory: number;
}

export interface ManifestFile {
  /** Relative POSIX path under the dataset root */
  path: string;
  size: number;
  /** SHA-256 hex digest */
  checksum: string;
}

/**
 * On-disk description of a generated dataset (manifest.json)
 */
export interface Manifest {
  seed: number;
  total_size_gb: number;
  file_count: number;
  distribution: string;
  min_file_size_mb: number;
  max_file_size_mb: number;
  directory_depth: number;
  files_per_directory: number;
  files: ManifestFile[];
}

export type VerifyResult =
  | { ok: true; files: number; bytes: number }
  | {
      ok: false;
      path: string;
      reason: 'missing' | 'size' | 'checksum';
      expected: string | number;
      actual: string | number | null;
    };

export type EnsureAction = 'generated' | 'reused';

export interface EnsureResult {
  manifest: Manifest;
  action: EnsureAction;
  /** Why the dataset was (re)generated or reused */
  reason: string;
}
