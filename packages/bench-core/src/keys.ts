import { isAbsolute, relative, sep } from 'node:path';

function trimPrefix(runPrefix: string): string {
  const trimmed = runPrefix.replace(/\/+$/, '');
  if (trimmed === '') {
    throw new Error('Run prefix must not be empty');
  }
  return trimmed;
}

/**
 * Map a manifest-relative POSIX path to its object key under a run prefix
 */
export function objectKeyFromRelative(runPrefix: string, relativePath: string): string {
  const normalized = relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
  if (normalized === '' || normalized.startsWith('/') || normalized.split('/').includes('..')) {
    throw new Error(`Path is not inside the dataset root: ${relativePath}`);
  }
  return `${trimPrefix(runPrefix)}/${normalized}`;
}

/**
 * Map a local dataset file to its object key: `<runPrefix>/<path relative to root>`.
 *
 * Distinct files under the root map to distinct keys, and the mapping only
 * depends on its inputs, so it is stable across process restarts.
 */
export function objectKey(runPrefix: string, datasetRoot: string, localFilePath: string): string {
  const rel = relative(datasetRoot, localFilePath);
  if (rel === '' || isAbsolute(rel) || rel.split(sep).includes('..')) {
    throw new Error(`Path is not inside the dataset root: ${localFilePath}`);
  }
  return objectKeyFromRelative(runPrefix, rel.split(sep).join('/'));
}

/**
 * Prefix form used for LIST, GET and DELETE of a whole run
 */
export function runScope(runPrefix: string): string {
  return `${trimPrefix(runPrefix)}/`;
}
