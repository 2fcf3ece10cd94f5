import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { CredentialResolver, formatBytes } from '@objbench/core';
import { ensureDataset, totalBytes } from '@objbench/dataset';
import { aggregateMetrics, summarizeErrors, writeErrorCsv } from '@objbench/metrics';
import { McStorageProvider } from '@objbench/storage-mc';
import { DEFAULT_CONFIG_FILE, loadConfig, selectProviders } from './config.js';
import { printSummaryTable, runAll } from './runner.js';
import type { BenchmarkConfig, RunnerDeps } from './types.js';

interface GenerateCommandOptions {
  config: string;
  dataPath?: string;
  force?: boolean;
  verbose?: boolean;
}

interface RunCommandOptions {
  config: string;
  provider?: string[];
  profile?: string;
  env?: string;
  iterations?: string;
  parallelProviders?: boolean;
  verbose?: boolean;
}

interface MetricsCommandOptions {
  config: string;
  dataPath?: string;
}

interface ErrorsCommandOptions {
  dataPath: string;
  provider?: string;
  top: string;
  csv?: string;
}

interface ListProvidersCommandOptions {
  config: string;
}

function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer (got ${value})`);
  }
  return parsed;
}

function withDataPath(config: BenchmarkConfig, dataPath: string | undefined): BenchmarkConfig {
  return dataPath ? { ...config, dataset: { ...config.dataset, dataPath } } : config;
}

/**
 * Build the objbench command tree. Storage and credential wiring can be
 * replaced for tests.
 */
export function createProgram(overrides: Partial<Pick<RunnerDeps, 'storage' | 'resolveCredentials'>> = {}): Command {
  const program = new Command();

  program
    .name('objbench')
    .description('Benchmark S3-compatible object storage with a reproducible dataset')
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate (or reuse) the deterministic dataset described by the config')
    .option('-c, --config <file>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('-d, --data-path <dir>', 'Dataset directory (overrides dataset.data_path)')
    .option('-f, --force', 'Regenerate even when the existing dataset verifies')
    .option('-v, --verbose', 'Log every generated file')
    .action(async (options: GenerateCommandOptions) => {
      const config = withDataPath(await loadConfig(options.config), options.dataPath);
      const result = await ensureDataset(config.dataset, config.dataset.dataPath, {
        force: options.force ?? false,
        verbose: options.verbose ?? false,
      });

      console.log(
        `Dataset ${result.action} (${result.reason}): ${result.manifest.files.length} files, ` +
          `${formatBytes(totalBytes(result.manifest))} in ${config.dataset.dataPath}`
      );
    });

  program
    .command('run')
    .description('Run the benchmark against one or more providers')
    .option('-c, --config <file>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('-p, --provider <id...>', 'Provider ids to run (default: all)')
    .option('--profile <name>', 'Shared credentials profile')
    .option('-e, --env <file>', 'Load environment variables from a dotenv file first')
    .option('-i, --iterations <n>', 'Override test.iterations')
    .option('--parallel-providers', 'Run providers concurrently')
    .option('-v, --verbose', 'Log every attempt')
    .action(async (options: RunCommandOptions) => {
      if (options.env) {
        const loaded = loadDotenv({ path: options.env });
        if (loaded.error) {
          throw new Error(`Cannot load env file ${options.env}: ${loaded.error.message}`);
        }
      }

      let config = await loadConfig(options.config);
      if (options.iterations !== undefined) {
        config = { ...config, test: { ...config.test, iterations: parsePositiveInt(options.iterations, '--iterations') } };
      }
      const providers = selectProviders(config, options.provider);

      console.log('Object Storage Benchmark');
      console.log('========================\n');
      console.log('Configuration:');
      console.log(`  Providers: ${providers.map(p => p.id).join(', ')}`);
      console.log(`  Iterations: ${config.test.iterations}`);
      console.log(`  Warmup: ${config.test.warmupOperations}`);
      console.log(`  Operations: ${config.test.operations.join(', ')}`);
      console.log(`  Mode: ${options.parallelProviders ? 'parallel' : 'sequential'}`);
      console.log('');

      await ensureDataset(config.dataset, config.dataset.dataPath, { verbose: options.verbose ?? false });

      const deps: RunnerDeps = {
        storage: overrides.storage ?? new McStorageProvider(),
        resolveCredentials:
          overrides.resolveCredentials ?? (request => new CredentialResolver().resolve(request)),
      };

      const outcomes = await runAll(config, providers, deps, {
        parallel: options.parallelProviders ?? false,
        profile: options.profile,
        verbose: options.verbose ?? false,
      });
      printSummaryTable(outcomes, config.test.operations);

      const failed = outcomes.filter(o => o.status === 'failed');
      if (failed.length > 0) {
        throw new Error(`${failed.length} of ${outcomes.length} provider run(s) failed`);
      }
    });

  program
    .command('metrics')
    .description('Aggregate event logs into per-provider and consolidated CSV tables')
    .option('-c, --config <file>', 'Config file providing dataset.data_path', DEFAULT_CONFIG_FILE)
    .option('-d, --data-path <dir>', 'Directory holding manifest.json and *.ndjson')
    .action(async (options: MetricsCommandOptions) => {
      const dataPath = options.dataPath ?? (await loadConfig(options.config)).dataset.dataPath;
      const result = await aggregateMetrics({ dataPath });

      console.log(`Manifest sha256: ${result.manifestHash}`);
      console.log(`Providers: ${result.providers.join(', ')}`);
      if (result.droppedRecords > 0) {
        console.log(`Dropped ${result.droppedRecords} malformed record(s)`);
      }
      for (const table of result.providerTables) {
        console.log(`Wrote ${table}`);
      }
      console.log(`Wrote ${result.consolidatedTable}`);
      console.log('');
      for (const row of result.summary) {
        console.log(
          `${row.provider.padEnd(16)} ${row.op.padEnd(7)} p50=${row.p50_ms.toFixed(2)}ms ` +
            `p95=${row.p95_ms.toFixed(2)}ms MBps=${row.MBps.toFixed(2)} ` +
            `errors=${row.error_rate_pct.toFixed(1)}% n=${row.samples}`
        );
      }
    });

  program
    .command('errors')
    .description('Summarize failed attempts by provider, operation and exit code')
    .option('-d, --data-path <dir>', 'Directory holding *.ndjson', './data')
    .option('-p, --provider <id>', 'Only this provider')
    .option('-t, --top <n>', 'Most frequent messages to show per provider', '20')
    .option('--csv <file>', 'Also write the counts as CSV')
    .action(async (options: ErrorsCommandOptions) => {
      const summary = await summarizeErrors(options.dataPath, {
        provider: options.provider,
        top: parsePositiveInt(options.top, '--top'),
      });

      console.log('=== Counts by provider / op / exit_code ===\n');
      for (const row of summary.counts) {
        console.log(`${row.provider.padEnd(16)} ${row.op.padEnd(7)} exit=${String(row.exit_code).padEnd(4)} ${row.count}`);
      }

      for (const [provider, errors] of Object.entries(summary.topErrors)) {
        console.log(`\n=== Top errors: ${provider} ===`);
        for (const { error, count } of errors) {
          console.log(`${String(count).padStart(6)}  ${error.split('\n')[0] ?? ''}`);
        }
      }

      if (options.csv) {
        await writeErrorCsv(options.csv, summary);
        console.log(`\nWrote ${options.csv}`);
      }
    });

  program
    .command('list-providers')
    .description('List configured providers and the storage CLI status')
    .option('-c, --config <file>', 'Config file', DEFAULT_CONFIG_FILE)
    .action(async (options: ListProvidersCommandOptions) => {
      const config = await loadConfig(options.config);
      const storage = overrides.storage ?? new McStorageProvider();
      const info = await storage.getInfo();

      console.log(`Storage client: ${info.name}`);
      console.log(`  Available: ${await storage.isAvailable()}`);
      console.log(`  Version: ${info.version}`);
      console.log(`  Features: ${info.features.join(', ') || 'none'}`);
      console.log('');

      console.log('Configured Providers:\n');
      for (const provider of config.providers) {
        console.log(`${provider.id}:`);
        console.log(`  Endpoint: ${provider.endpoint}`);
        console.log(`  Region: ${provider.region}`);
        console.log(`  Bucket: ${provider.bucket}`);
        const ns = provider.credentialNamespace.toUpperCase();
        console.log(`  Credentials: ${ns}_ACCESS_KEY / ${ns}_SECRET_KEY`);
        console.log(`  Insecure SSL: ${provider.insecureSsl}`);
        console.log('');
      }
    });

  return program;
}
