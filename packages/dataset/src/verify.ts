import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { sha256File } from './manifest.js';
import type { Manifest, VerifyResult } from './types.js';

/**
 * Check every manifest entry against the files under `root`.
 * Stops at the first missing file, size mismatch or checksum mismatch.
 */
export async function checkDataset(manifest: Manifest, root: string): Promise<VerifyResult> {
  let bytes = 0;

  for (const file of manifest.files) {
    const filePath = join(root, file.path);

    let size: number;
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        return { ok: false, path: file.path, reason: 'missing', expected: file.size, actual: null };
      }
      size = info.size;
    } catch {
      return { ok: false, path: file.path, reason: 'missing', expected: file.size, actual: null };
    }

    if (size !== file.size) {
      return { ok: false, path: file.path, reason: 'size', expected: file.size, actual: size };
    }

    const checksum = await sha256File(filePath);
    if (checksum !== file.checksum) {
      return { ok: false, path: file.path, reason: 'checksum', expected: file.checksum, actual: checksum };
    }

    bytes += size;
  }

  return { ok: true, files: manifest.files.length, bytes };
}

/**
 * Boolean form of checkDataset that logs the first mismatch
 */
export async function verifyDataset(manifest: Manifest, root: string): Promise<boolean> {
  const result = await checkDataset(manifest, root);
  if (!result.ok) {
    console.warn(
      `Dataset verification failed: ${result.reason} mismatch at ${result.path} ` +
        `(expected ${result.expected}, actual ${result.actual ?? 'none'})`
    );
    return false;
  }
  return true;
}
