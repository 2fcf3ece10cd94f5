import { mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EventLog,
  OperationError,
  calculateStats,
  formatMs,
  generateRunId,
  runScope,
  sleep,
  type Credentials,
  type EventRecord,
  type IStorageClient,
  type LatencyStats,
  type OperationKind,
  type StorageCallOptions,
  type StorageResult,
} from '@objbench/core';
import { manifestPath, readManifest, type Manifest } from '@objbench/dataset';
import { attemptError, normalizeResult, withAttempts, type AttemptPolicy } from './attempt.js';
import { handlerFor, isFatal } from './operations/index.js';
import type {
  BenchmarkConfig,
  OperationCall,
  OperationContext,
  ProviderConfig,
  ProviderOutcome,
  RunEventLog,
  RunOptions,
  RunReport,
  RunState,
  RunnerDeps,
  TestConfig,
} from './types.js';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Uninitialized: ['ConfigLoaded', 'Failed'],
  ConfigLoaded: ['CredentialsResolved', 'Failed'],
  CredentialsResolved: ['BucketEnsured', 'Failed'],
  BucketEnsured: ['Warmed', 'Failed'],
  Warmed: ['Running', 'Failed'],
  Running: ['Cleaned', 'Failed'],
  Cleaned: ['TornDown', 'Failed'],
  Failed: ['TornDown'],
  TornDown: [],
};

const BUCKET_PRESENT = /already (exists|own)/i;

/**
 * Bucket creation responses that mean the bucket is usable
 */
export function bucketAlreadyPresent(result: StorageResult): boolean {
  return BUCKET_PRESENT.test(result.stderr) || BUCKET_PRESENT.test(result.stdout);
}

/**
 * Key prefix for a run: the run id, nested under keyPrefix when set
 */
export function runPrefixFor(runId: string, keyPrefix?: string): string {
  const parent = (keyPrefix ?? '').replace(/^\/+|\/+$/g, '');
  return parent ? `${parent}/${runId}` : runId;
}

async function openNdjsonLog(path: string): Promise<RunEventLog> {
  const log = new EventLog(path);
  await log.open();
  return log;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one provider through bucket setup, warmup, the measured iterations
 * and teardown, writing one event record per attempt.
 *
 * A runner is single-use; create one per provider run.
 */
export class BenchmarkRunner {
  readonly runId: string;
  readonly runPrefix: string;
  private readonly config: BenchmarkConfig;
  private readonly provider: ProviderConfig;
  private readonly deps: RunnerDeps;
  private readonly options: RunOptions;
  private readonly scratchDir: string;
  private readonly pause: (ms: number) => Promise<void>;

  private current: RunState = 'Uninitialized';
  private manifest: Manifest | null = null;
  private client: IStorageClient | null = null;
  private log: RunEventLog | null = null;
  private records = 0;
  private failedAttempts = 0;
  private lastOperation: OperationKind | null = null;
  private prefixRemoved = false;
  private readonly samples = new Map<OperationKind, number[]>();

  constructor(config: BenchmarkConfig, provider: ProviderConfig, deps: RunnerDeps, options: RunOptions = {}) {
    this.config = config;
    this.provider = provider;
    this.deps = deps;
    this.options = options;
    this.runId = deps.generateRunId?.() ?? generateRunId();
    this.runPrefix = runPrefixFor(this.runId, config.test.keyPrefix);
    this.scratchDir = join(deps.scratchRoot ?? tmpdir(), `objbench-${this.runId}`);
    this.pause = deps.sleep ?? sleep;
  }

  get state(): RunState {
    return this.current;
  }

  get eventLogPath(): string {
    return join(this.config.dataset.dataPath, `${this.provider.id}.ndjson`);
  }

  private get test(): TestConfig {
    return this.config.test;
  }

  private get callOptions(): StorageCallOptions {
    return { timeoutMs: this.test.timeoutSeconds * 1000 };
  }

  private get policy(): AttemptPolicy {
    return {
      retryAttempts: this.test.retryAttempts,
      retryBackoffSeconds: this.test.retryBackoffSeconds,
      timeoutSeconds: this.test.timeoutSeconds,
    };
  }

  private transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal state transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    if (this.options.verbose) {
      console.log(`  [${this.provider.id}] state: ${next}`);
    }
  }

  async run(): Promise<RunReport> {
    if (this.current !== 'Uninitialized') {
      throw new Error(`Runner for ${this.provider.id} was already used (state: ${this.current})`);
    }

    console.log(`\n=== Benchmarking: ${this.provider.id} ===\n`);
    console.log(`  Run: ${this.runId} | Bucket: ${this.provider.bucket} | Prefix: ${this.runPrefix}`);

    try {
      await this.loadDataset();
      const credentials = this.resolveCredentials();
      await this.connect(credentials);
      await this.warmup();
      await this.measure();
      await this.removeRunPrefix();
      this.transition('Cleaned');
    } catch (err) {
      this.transition('Failed');
      console.error(`  Run failed in ${this.provider.id}: ${messageOf(err)}`);
      await this.teardown();
      throw err;
    }

    await this.teardown();
    return this.report();
  }

  private async loadDataset(): Promise<void> {
    this.manifest = await readManifest(manifestPath(this.config.dataset.dataPath));
    this.transition('ConfigLoaded');
  }

  private resolveCredentials(): Credentials {
    const credentials = this.deps.resolveCredentials({
      namespace: this.provider.credentialNamespace,
      profile: this.options.profile ?? this.provider.profile,
    });
    this.transition('CredentialsResolved');
    return credentials;
  }

  private async connect(credentials: Credentials): Promise<void> {
    const client = await this.deps.storage.create(
      {
        id: this.provider.id,
        endpoint: this.provider.endpoint,
        region: this.provider.region,
        bucket: this.provider.bucket,
        insecureSsl: this.provider.insecureSsl,
      },
      credentials
    );
    this.client = client;

    await mkdir(this.scratchDir, { recursive: true });
    this.log = await (this.deps.openEventLog ?? openNdjsonLog)(this.eventLogPath);

    const outcome = await withAttempts(() => client.createBucket(this.callOptions), this.policy, {
      sleep: this.pause,
      isSuccess: result => result.exitCode === 0 || bucketAlreadyPresent(result),
    });
    if (!outcome.ok) {
      throw new OperationError(
        `Cannot create bucket ${client.bucket}: ${attemptError(outcome.last, this.test.timeoutSeconds)}`,
        'CREATE_BUCKET',
        0,
        outcome.attempts,
        outcome.last.exitCode
      );
    }

    console.log(`  Bucket ready: ${client.bucket}`);
    this.transition('BucketEnsured');
  }

  private async warmup(): Promise<void> {
    for (let i = 0; i < this.test.warmupOperations; i++) {
      await this.execute('PUT', 0);
      await this.execute('DELETE', 0);
    }
    if (this.test.warmupOperations > 0) {
      console.log(`  Warmup complete (${this.test.warmupOperations} PUT/DELETE cycles)`);
    }
    this.transition('Warmed');
  }

  private async measure(): Promise<void> {
    this.transition('Running');

    for (let iteration = 1; iteration <= this.test.iterations; iteration++) {
      for (const kind of this.test.operations) {
        await this.execute(kind, iteration);
      }
      console.log(`  [${iteration}/${this.test.iterations}] ${this.test.operations.join(' -> ')}`);
    }
  }

  private operationContext(): OperationContext {
    if (!this.client || !this.manifest) {
      throw new Error(`Runner for ${this.provider.id} is not connected`);
    }
    return {
      client: this.client,
      manifest: this.manifest,
      dataPath: this.config.dataset.dataPath,
      runPrefix: this.runPrefix,
      scratchDir: this.scratchDir,
      test: this.test,
    };
  }

  private async execute(kind: OperationKind, iteration: number): Promise<void> {
    const fatal = isFatal(kind, this.test.nonFatalOperations);

    for (const call of handlerFor(kind).plan(this.operationContext())) {
      const outcome = await withAttempts(() => call.invoke(this.callOptions), this.policy, {
        sleep: this.pause,
        onAttempt: (attempt, result, startedAt) => this.record(kind, iteration, attempt, call, result, startedAt),
      });

      if (outcome.ok) {
        if (iteration > 0) {
          const values = this.samples.get(kind) ?? [];
          values.push(outcome.last.durationMs);
          this.samples.set(kind, values);
        }
        await this.afterCall(kind, call);
        continue;
      }

      const message =
        `${kind} ${call.key} failed after ${outcome.attempts} attempt(s) in iteration ${iteration}: ` +
        attemptError(outcome.last, this.test.timeoutSeconds);
      if (fatal) {
        throw new OperationError(message, kind, iteration, outcome.attempts, outcome.last.exitCode);
      }
      console.warn(`  ${message} (non-fatal, continuing)`);
    }

    this.lastOperation = kind;
  }

  /**
   * Post-success work such as verifying and purging a download. Failures are
   * logged and never fail the operation.
   */
  private async afterCall(kind: OperationKind, call: OperationCall): Promise<void> {
    if (!call.after) return;
    try {
      await call.after();
    } catch (err) {
      console.warn(`  ${kind} ${call.key} post-processing failed: ${messageOf(err)}`);
    }
  }

  private async record(
    kind: OperationKind,
    iteration: number,
    attempt: number,
    call: OperationCall,
    result: StorageResult,
    startedAt: Date
  ): Promise<void> {
    if (!this.log) {
      throw new Error(`Event log not open for ${this.provider.id}`);
    }

    const record: EventRecord = {
      provider: this.provider.id,
      run_id: this.runId,
      op: kind,
      iteration,
      attempt,
      key: call.key,
      duration_ms: Number(result.durationMs.toFixed(3)),
      exit_code: result.exitCode,
      bytes: call.bytes,
      error: attemptError(result, this.test.timeoutSeconds),
      timestamp: startedAt.toISOString(),
    };
    await this.log.append(record);
    this.records++;
    if (result.exitCode !== 0) this.failedAttempts++;

    if (this.options.verbose) {
      const label = iteration === 0 ? 'warmup' : `#${iteration}`;
      console.log(`    ${kind} ${label} attempt ${attempt}: ${formatMs(result.durationMs)} exit=${result.exitCode}`);
    }
  }

  /**
   * Best-effort, unrecorded removal of the run prefix when cleanup is on
   * and the last executed operation was not DELETE
   */
  private async removeRunPrefix(): Promise<void> {
    const client = this.client;
    if (!client || this.prefixRemoved || !this.test.cleanupAfterRun || this.lastOperation === 'DELETE') {
      return;
    }

    try {
      const result = normalizeResult(await client.deletePrefix(runScope(this.runPrefix), this.callOptions));
      if (result.exitCode === 0) {
        this.prefixRemoved = true;
      } else {
        console.warn(`  Cleanup of ${this.runPrefix} failed: ${attemptError(result, this.test.timeoutSeconds)}`);
      }
    } catch (err) {
      console.warn(`  Cleanup of ${this.runPrefix} failed: ${messageOf(err)}`);
    }
  }

  private async teardown(): Promise<void> {
    if (this.current === 'Failed') {
      await this.removeRunPrefix();
    }

    try {
      await rm(this.scratchDir, { recursive: true, force: true });
    } catch (err) {
      console.warn(`  Failed to purge scratch directory ${this.scratchDir}: ${messageOf(err)}`);
    }

    if (this.log) {
      const log = this.log;
      this.log = null;
      try {
        await log.close();
      } catch (err) {
        console.warn(`  Failed to close event log ${this.eventLogPath}: ${messageOf(err)}`);
      }
    }

    this.transition('TornDown');
  }

  /**
   * Counters and latency stats gathered so far
   */
  report(): RunReport {
    const latencies: Partial<Record<OperationKind, LatencyStats>> = {};
    for (const [kind, values] of this.samples) {
      if (values.length > 0) latencies[kind] = calculateStats(values);
    }

    return {
      provider: this.provider.id,
      runId: this.runId,
      runPrefix: this.runPrefix,
      bucket: this.provider.bucket,
      records: this.records,
      failedAttempts: this.failedAttempts,
      latencies,
    };
  }
}

/**
 * Run every selected provider, one at a time unless `parallel` is set.
 * A failed provider does not stop the others.
 */
export async function runAll(
  config: BenchmarkConfig,
  providers: readonly ProviderConfig[],
  deps: RunnerDeps,
  options: RunOptions & { parallel?: boolean } = {}
): Promise<ProviderOutcome[]> {
  const runOne = async (provider: ProviderConfig): Promise<ProviderOutcome> => {
    const runner = new BenchmarkRunner(config, provider, deps, options);
    try {
      return { provider: provider.id, status: 'completed', report: await runner.run() };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      return { provider: provider.id, status: 'failed', error, report: runner.report() };
    }
  };

  if (options.parallel) {
    return Promise.all(providers.map(runOne));
  }

  const outcomes: ProviderOutcome[] = [];
  for (const provider of providers) {
    outcomes.push(await runOne(provider));
  }
  return outcomes;
}

/**
 * Mean latency per operation and provider, then one status line per provider
 */
export function printSummaryTable(outcomes: readonly ProviderOutcome[], operations: readonly OperationKind[]): void {
  console.log('\n=== Summary ===\n');

  const header = ['Operation', ...outcomes.map(o => o.provider)].map(h => h.padEnd(20)).join(' | ');
  console.log(header);
  console.log('-'.repeat(header.length));

  for (const kind of operations) {
    const row = [kind.padEnd(20)];
    for (const outcome of outcomes) {
      const stats = outcome.report.latencies[kind];
      row.push((stats ? formatMs(stats.mean) : 'N/A').padEnd(20));
    }
    console.log(row.join(' | '));
  }

  console.log('');
  for (const outcome of outcomes) {
    const { report } = outcome;
    const status = outcome.status === 'completed' ? 'completed' : `failed: ${outcome.error.message}`;
    console.log(`${outcome.provider}: ${status} (${report.records} records, ${report.failedAttempts} failed attempts)`);
  }
}
