import type { IStorageClient, StorageCallOptions, StorageResult } from '@objbench/core';
import { runCommand } from './process.js';
import type { CommandRunner, McClientOptions } from './types.js';

/**
 * Strip leading and trailing slashes from a key or prefix
 */
function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * Storage client that drives the MinIO `mc` CLI against one bucket.
 *
 * The target is injected through MC_HOST_<alias>, so no mc config file is
 * read or written.
 */
export class McStorageClient implements IStorageClient {
  readonly provider: string;
  readonly bucket: string;
  private readonly cli: string;
  private readonly alias: string;
  private readonly hostUrl: string;
  private readonly insecure: boolean;
  private readonly runner: CommandRunner;

  constructor(options: McClientOptions) {
    this.provider = options.provider;
    this.bucket = options.bucket;
    this.cli = options.cli;
    this.alias = options.alias;
    this.hostUrl = options.hostUrl;
    this.insecure = options.insecure;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * `alias/bucket[/path]` as mc addresses it
   */
  remotePath(path = ''): string {
    const trimmed = trimSlashes(path);
    return trimmed ? `${this.alias}/${this.bucket}/${trimmed}` : `${this.alias}/${this.bucket}`;
  }

  private flags(): string[] {
    return this.insecure ? ['--insecure'] : [];
  }

  private run(args: string[], options: StorageCallOptions): Promise<StorageResult> {
    return this.runner(this.cli, args, {
      env: { [`MC_HOST_${this.alias}`]: this.hostUrl },
      timeoutMs: options.timeoutMs,
    });
  }

  createBucketArgs(): string[] {
    return ['mb', '--ignore-existing', ...this.flags(), this.remotePath()];
  }

  uploadTreeArgs(localDir: string, prefix: string, exclude: readonly string[] = []): string[] {
    const excludes = exclude.flatMap(pattern => ['--exclude', pattern]);
    return ['mirror', '--overwrite', ...excludes, ...this.flags(), localDir, this.remotePath(prefix)];
  }

  downloadTreeArgs(prefix: string, localDir: string): string[] {
    return ['mirror', '--overwrite', ...this.flags(), this.remotePath(prefix), localDir];
  }

  listPrefixArgs(prefix: string): string[] {
    return ['ls', '--recursive', ...this.flags(), this.remotePath(prefix)];
  }

  statObjectArgs(key: string): string[] {
    return ['stat', ...this.flags(), this.remotePath(key)];
  }

  deletePrefixArgs(prefix: string): string[] {
    return ['rm', '--recursive', '--force', ...this.flags(), this.remotePath(prefix)];
  }

  createBucket(options: StorageCallOptions): Promise<StorageResult> {
    return this.run(this.createBucketArgs(), options);
  }

  uploadTree(
    localDir: string,
    prefix: string,
    options: StorageCallOptions & { exclude?: string[] }
  ): Promise<StorageResult> {
    return this.run(this.uploadTreeArgs(localDir, prefix, options.exclude), options);
  }

  downloadTree(prefix: string, localDir: string, options: StorageCallOptions): Promise<StorageResult> {
    return this.run(this.downloadTreeArgs(prefix, localDir), options);
  }

  listPrefix(prefix: string, options: StorageCallOptions): Promise<StorageResult> {
    return this.run(this.listPrefixArgs(prefix), options);
  }

  statObject(key: string, options: StorageCallOptions): Promise<StorageResult> {
    return this.run(this.statObjectArgs(key), options);
  }

  deletePrefix(prefix: string, options: StorageCallOptions): Promise<StorageResult> {
    return this.run(this.deletePrefixArgs(prefix), options);
  }
}
