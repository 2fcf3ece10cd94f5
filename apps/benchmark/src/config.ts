import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, OPERATION_KINDS } from '@objbench/core';
import { SIZE_DISTRIBUTIONS } from '@objbench/dataset';
import type { BenchmarkConfig, DatasetConfig, ProviderConfig, TestConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'objbench.yaml';

const operationSchema = z.enum(OPERATION_KINDS);

const datasetSchema = z
  .object({
    seed: z.number().int(),
    total_size_gb: z.number().positive(),
    file_count: z.number().int().positive(),
    min_file_size_mb: z.number().positive(),
    max_file_size_mb: z.number().positive(),
    size_distribution: z.enum(SIZE_DISTRIBUTIONS).default('random'),
    directory_depth: z.number().int().nonnegative().default(1),
    files_per_directory: z.number().int().positive().default(100),
    data_path: z.string().min(1).default('./data'),
  })
  .superRefine((dataset, ctx) => {
    if (dataset.max_file_size_mb < dataset.min_file_size_mb) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'max_file_size_mb must be >= min_file_size_mb',
        path: ['max_file_size_mb'],
      });
    }
  });

/**
 * Provider ids name event logs and mc aliases, so they stay filename-safe
 */
const providerIdSchema = z
  .string()
  .min(1, 'Missing provider id')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Provider id may only contain letters, numbers, dots, dashes and underscores');

const providerSchema = z
  .object({
    id: providerIdSchema,
    endpoint: z.string().url('endpoint must be a URL'),
    region: z.string().min(1).default('us-east-1'),
    credential_namespace: z.string().min(1, 'Missing credential_namespace'),
    bucket: z.string().min(1).optional(),
    bucket_prefix: z.string().min(1).optional(),
    insecure_ssl: z.boolean().default(false),
    profile: z.string().min(1).optional(),
  })
  .superRefine((provider, ctx) => {
    if (provider.bucket === undefined && provider.bucket_prefix === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Either bucket or bucket_prefix is required',
        path: ['bucket'],
      });
    }
  });

const testSchema = z
  .object({
    iterations: z.number().int().positive().default(3),
    operations: z.array(operationSchema).min(1).default([...OPERATION_KINDS]),
    warmup_operations: z.number().int().nonnegative().default(0),
    retry_attempts: z.number().int().nonnegative().default(2),
    retry_backoff_seconds: z.number().nonnegative().default(1),
    timeout_seconds: z.number().positive().default(300),
    cleanup_after_run: z.boolean().default(true),
    verify_checksums: z.boolean().default(false),
    head_sample_size: z.number().int().positive().default(5),
    non_fatal_operations: z.array(operationSchema).optional(),
    key_prefix: z.string().optional(),
  })
  .default({});

export const configSchema = z
  .object({
    dataset: datasetSchema,
    provider: providerSchema.optional(),
    providers: z.array(providerSchema).optional(),
    test: testSchema,
  })
  .superRefine((config, ctx) => {
    if (config.provider === undefined && config.providers === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing provider or providers section',
        path: ['providers'],
      });
      return;
    }
    if (config.provider !== undefined && config.providers !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Use either provider or providers, not both',
        path: ['provider'],
      });
      return;
    }

    const seen = new Set<string>();
    for (const [index, provider] of (config.providers ?? []).entries()) {
      if (seen.has(provider.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate provider id: ${provider.id}`,
          path: ['providers', index, 'id'],
        });
      }
      seen.add(provider.id);
    }
  });

export type RawConfig = z.infer<typeof configSchema>;
type RawProvider = z.infer<typeof providerSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Bucket for a provider: explicit name, or `<bucket_prefix>-<id>` lowercased
 */
export function bucketName(provider: Pick<RawProvider, 'id' | 'bucket' | 'bucket_prefix'>): string {
  if (provider.bucket !== undefined) return provider.bucket;
  return `${provider.bucket_prefix ?? ''}-${provider.id}`.toLowerCase();
}

function toProvider(raw: RawProvider): ProviderConfig {
  return {
    id: raw.id,
    endpoint: raw.endpoint,
    region: raw.region,
    credentialNamespace: raw.credential_namespace,
    bucket: bucketName(raw),
    insecureSsl: raw.insecure_ssl,
    profile: raw.profile,
  };
}

function toDataset(raw: RawConfig['dataset'], baseDir: string): DatasetConfig {
  return {
    seed: raw.seed,
    totalSizeGb: raw.total_size_gb,
    fileCount: raw.file_count,
    minFileSizeMb: raw.min_file_size_mb,
    maxFileSizeMb: raw.max_file_size_mb,
    sizeDistribution: raw.size_distribution,
    directoryDepth: raw.directory_depth,
    filesPerDirectory: raw.files_per_directory,
    dataPath: resolve(baseDir, raw.data_path),
  };
}

function toTest(raw: RawConfig['test']): TestConfig {
  return {
    iterations: raw.iterations,
    operations: raw.operations,
    warmupOperations: raw.warmup_operations,
    retryAttempts: raw.retry_attempts,
    retryBackoffSeconds: raw.retry_backoff_seconds,
    timeoutSeconds: raw.timeout_seconds,
    cleanupAfterRun: raw.cleanup_after_run,
    verifyChecksums: raw.verify_checksums,
    headSampleSize: raw.head_sample_size,
    nonFatalOperations: raw.non_fatal_operations,
    keyPrefix: raw.key_prefix,
  };
}

/**
 * Validate a parsed config document. Relative data paths resolve against `baseDir`.
 */
export function parseConfig(content: unknown, baseDir: string = process.cwd()): BenchmarkConfig {
  const result = configSchema.safeParse(content);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }

  const raw = result.data;
  const providers = raw.providers ?? (raw.provider ? [raw.provider] : []);

  return {
    dataset: toDataset(raw.dataset, baseDir),
    providers: providers.map(toProvider),
    test: toTest(raw.test),
  };
}

/**
 * Read and validate a YAML config file
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_FILE): Promise<BenchmarkConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}`, [err instanceof Error ? err.message : String(err)]);
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}`, [err instanceof Error ? err.message : String(err)]);
  }

  return parseConfig(document, process.cwd());
}

/**
 * Pick providers by id in the order requested; no ids selects all of them
 */
export function selectProviders(config: BenchmarkConfig, ids: readonly string[] = []): ProviderConfig[] {
  if (ids.length === 0) return config.providers;

  const known = new Map(config.providers.map(p => [p.id, p]));
  const selected: ProviderConfig[] = [];
  const unknown: string[] = [];

  for (const id of ids) {
    const provider = known.get(id);
    if (provider) {
      selected.push(provider);
    } else {
      unknown.push(id);
    }
  }

  if (unknown.length > 0) {
    const available = [...known.keys()].join(', ') || 'none';
    throw new ConfigError(
      'Unknown provider id',
      unknown.map(id => `'${id}' is not defined (available: ${available})`)
    );
  }

  return selected;
}
