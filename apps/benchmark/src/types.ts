import type {
  IStorageClient,
  IStorageProvider,
  LatencyStats,
  OperationKind,
  StorageCallOptions,
  StorageResult,
  CredentialResolverFn,
  EventSink,
} from '@objbench/core';
import type { DatasetParams, Manifest } from '@objbench/dataset';

export interface DatasetConfig extends DatasetParams {
  /** Dataset root; manifest, event logs and tables live here too */
  dataPath: string;
}

export interface ProviderConfig {
  id: string;
  endpoint: string;
  region: string;
  /** Prefix of the <NS>_ACCESS_KEY / <NS>_SECRET_KEY variables */
  credentialNamespace: string;
  /** Resolved bucket name */
  bucket: string;
  insecureSsl: boolean;
  profile?: string | undefined;
}

export interface TestConfig {
  /** Measured iterations */
  iterations: number;
  /** Execution order within an iteration */
  operations: OperationKind[];
  /** PUT + DELETE cycles recorded as iteration 0 */
  warmupOperations: number;
  /** Retries after the first attempt */
  retryAttempts: number;
  retryBackoffSeconds: number;
  timeoutSeconds: number;
  cleanupAfterRun: boolean;
  verifyChecksums: boolean;
  headSampleSize: number;
  /** Replaces the default fatality table when set */
  nonFatalOperations?: OperationKind[] | undefined;
  /** Parent prefix for every run prefix */
  keyPrefix?: string | undefined;
}

export interface BenchmarkConfig {
  dataset: DatasetConfig;
  providers: ProviderConfig[];
  test: TestConfig;
}

export type RunState =
  | 'Uninitialized'
  | 'ConfigLoaded'
  | 'CredentialsResolved'
  | 'BucketEnsured'
  | 'Warmed'
  | 'Running'
  | 'Cleaned'
  | 'TornDown'
  | 'Failed';

/**
 * Event sink owned by one provider run
 */
export interface RunEventLog extends EventSink {
  close(): Promise<void>;
}

export interface RunnerDeps {
  storage: IStorageProvider;
  resolveCredentials: CredentialResolverFn;
  /** Open the event log for a provider; defaults to an fsynced NDJSON file */
  openEventLog?: (path: string) => Promise<RunEventLog>;
  /** Backoff sleep; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Parent of the per-run scratch directory; defaults to the OS temp dir */
  scratchRoot?: string;
  /** Run id generator */
  generateRunId?: () => string;
}

export interface RunOptions {
  /** Shared credentials profile, overrides the provider's */
  profile?: string | undefined;
  verbose?: boolean;
}

/**
 * What a handler needs to plan its storage calls
 */
export interface OperationContext {
  client: IStorageClient;
  manifest: Manifest;
  dataPath: string;
  runPrefix: string;
  scratchDir: string;
  test: TestConfig;
}

/**
 * One storage call with its own attempt loop and event records
 */
export interface OperationCall {
  /** Object key or prefix the call targets */
  key: string;
  /** Payload bytes recorded for every attempt */
  bytes: number;
  invoke(options: StorageCallOptions): Promise<StorageResult>;
  /** Runs once after a successful attempt */
  after?(): Promise<void>;
}

export interface OperationHandler {
  kind: OperationKind;
  description: string;
  /** Whether exhausting the attempts aborts the run */
  defaultFatal: boolean;
  plan(ctx: OperationContext): OperationCall[];
}

export interface RunReport {
  provider: string;
  runId: string;
  runPrefix: string;
  bucket: string;
  /** Event records written */
  records: number;
  /** Failed attempts across all operations */
  failedAttempts: number;
  /** Latency of successful measured attempts */
  latencies: Partial<Record<OperationKind, LatencyStats>>;
}

export type ProviderOutcome =
  | { provider: string; status: 'completed'; report: RunReport }
  | { provider: string; status: 'failed'; error: Error; report: RunReport };
