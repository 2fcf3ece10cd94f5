export type {
  SizeDistribution,
  DatasetParams,
  Manifest,
  ManifestFile,
  VerifyResult,
  EnsureAction,
  EnsureResult,
} from './types.js';
export { SIZE_DISTRIBUTIONS } from './types.js';

export { generateFileSizes, validateParams } from './sizes.js';
export { CHUNK_SIZE, placeFile, generateFile, generateDataset, ensureDataset } from './generator.js';
export type { GenerateOptions } from './generator.js';
export {
  MANIFEST_FILENAME,
  manifestSchema,
  manifestPath,
  readManifest,
  writeManifest,
  sha256File,
  totalBytes,
} from './manifest.js';
export { checkDataset, verifyDataset } from './verify.js';
