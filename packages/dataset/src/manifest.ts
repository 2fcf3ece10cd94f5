import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { DatasetError } from '@objbench/core';
import type { Manifest } from './types.js';

export const MANIFEST_FILENAME = 'manifest.json';

const relativePathSchema = z
  .string()
  .min(1)
  .refine(p => !p.startsWith('/') && !p.includes('\\') && !p.split('/').includes('..'), {
    message: 'must be a relative POSIX path inside the dataset root',
  });

export const manifestSchema = z.object({
  seed: z.number().int(),
  total_size_gb: z.number().positive(),
  file_count: z.number().int().positive(),
  distribution: z.string(),
  min_file_size_mb: z.number().positive(),
  max_file_size_mb: z.number().positive(),
  directory_depth: z.number().int().nonnegative(),
  files_per_directory: z.number().int().positive(),
  files: z
    .array(
      z.object({
        path: relativePathSchema,
        size: z.number().int().positive(),
        checksum: z.string().regex(/^[0-9a-f]{64}$/, 'must be a SHA-256 hex digest'),
      }),
    )
    .superRefine((files, ctx) => {
      const seen = new Set<string>();
      files.forEach((file, index) => {
        if (seen.has(file.path)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate path: ${file.path}`,
            path: [index, 'path'],
          });
        }
        seen.add(file.path);
      });
    }),
});

export function manifestPath(root: string): string {
  return join(root, MANIFEST_FILENAME);
}

/**
 * Parse and validate manifest.json
 */
export async function readManifest(path: string): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new DatasetError(`Cannot read manifest: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new DatasetError(`Invalid manifest: ${issues.join('; ')}`, path);
  }
  return result.data;
}

export async function writeManifest(path: string, manifest: Manifest): Promise<void> {
  await writeFile(path, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
}

/**
 * SHA-256 hex digest of a file's contents
 */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function totalBytes(manifest: Manifest): number {
  return manifest.files.reduce((sum, f) => sum + f.size, 0);
}
