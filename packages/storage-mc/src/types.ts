import type { StorageResult } from '@objbench/core';

/**
 * Options for one CLI invocation
 */
export interface CommandOptions {
  /** Extra environment, merged over process.env */
  env?: Record<string, string>;
  /** Kill the process after this many milliseconds */
  timeoutMs: number;
}

/**
 * Runs a CLI and reports its outcome; swapped out in tests
 */
export type CommandRunner = (cli: string, args: string[], options: CommandOptions) => Promise<StorageResult>;

export interface McClientOptions {
  /** Path or name of the mc binary */
  cli: string;
  /** mc alias the target is exposed under (letters, digits, underscores) */
  alias: string;
  /** Value for MC_HOST_<alias> */
  hostUrl: string;
  /** Skip TLS verification */
  insecure: boolean;
  provider: string;
  bucket: string;
  runner?: CommandRunner;
}
