/**
 * Storage operations measured by the harness, in default execution order
 */
export const OPERATION_KINDS = ['PUT', 'LIST', 'HEAD', 'GET', 'DELETE'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}

/**
 * Connection details for one S3-compatible endpoint
 */
export interface StorageTarget {
  /** Provider identifier (also names the event log) */
  id: string;
  /** Endpoint URL, e.g. https://s3.eu-central-1.example.com */
  endpoint: string;
  /** Region passed to the endpoint */
  region: string;
  /** Bucket every run writes under */
  bucket: string;
  /** Skip TLS certificate verification */
  insecureSsl: boolean;
}

/**
 * Resolved access/secret pair for a provider
 */
export interface Credentials {
  accessKey: string;
  secretKey: string;
  sessionToken?: string;
}

/**
 * Per-call options for storage invocations
 */
export interface StorageCallOptions {
  /** Hard ceiling for this single invocation */
  timeoutMs: number;
}

/** Exit code reported for an invocation killed by its timeout */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * Outcome of a single storage invocation
 */
export interface StorageResult {
  /** 0 on success, provider-defined otherwise */
  exitCode: number;
  /** Tail of standard output */
  stdout: string;
  /** Tail of standard error */
  stderr: string;
  /** Wall-clock time of this invocation only */
  durationMs: number;
  /** True when the call was killed after timeoutMs */
  timedOut: boolean;
}

/**
 * Storage client bound to one target and credential pair
 */
export interface IStorageClient {
  /** Provider identifier */
  readonly provider: string;
  /** Bucket this client operates on */
  readonly bucket: string;

  /**
   * Create the bucket if it does not exist yet
   */
  createBucket(options: StorageCallOptions): Promise<StorageResult>;

  /**
   * Upload a local directory tree under a key prefix
   */
  uploadTree(
    localDir: string,
    prefix: string,
    options: StorageCallOptions & { exclude?: string[] }
  ): Promise<StorageResult>;

  /**
   * Download every object under a prefix into a local directory
   */
  downloadTree(prefix: string, localDir: string, options: StorageCallOptions): Promise<StorageResult>;

  /**
   * Enumerate objects under a prefix
   */
  listPrefix(prefix: string, options: StorageCallOptions): Promise<StorageResult>;

  /**
   * Fetch metadata for a single object
   */
  statObject(key: string, options: StorageCallOptions): Promise<StorageResult>;

  /**
   * Remove every object under a prefix
   */
  deletePrefix(prefix: string, options: StorageCallOptions): Promise<StorageResult>;
}

/**
 * Factory for storage clients of one kind
 */
export interface IStorageProvider {
  /** Provider implementation name */
  readonly name: string;

  /**
   * Create a client for a target
   */
  create(target: StorageTarget, credentials: Credentials): Promise<IStorageClient>;

  /**
   * Check if the underlying tool is available on this system
   */
  isAvailable(): Promise<boolean>;

  /**
   * Get implementation info
   */
  getInfo(): Promise<ProviderInfo>;
}

export interface ProviderInfo {
  name: string;
  version: string;
  features: string[];
}

/**
 * One observation of a single operation attempt, as written to NDJSON
 */
export interface EventRecord {
  provider: string;
  run_id: string;
  op: OperationKind;
  /** 0 for warmup, 1-based for measured iterations */
  iteration: number;
  /** 1-based */
  attempt: number;
  /** Object key or prefix the attempt targeted */
  key: string;
  duration_ms: number;
  exit_code: number;
  /** Payload bytes; 0 for LIST, HEAD and DELETE */
  bytes: number;
  error: string;
  /** ISO-8601 start of the attempt */
  timestamp: string;
}

/**
 * Latency statistics over a set of samples
 */
export interface LatencyStats {
  mean: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
  stdDev: number;
}
