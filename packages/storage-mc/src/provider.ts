import { execSync } from 'node:child_process';
import type {
  Credentials,
  IStorageClient,
  IStorageProvider,
  ProviderInfo,
  StorageTarget,
} from '@objbench/core';
import { McStorageClient } from './client.js';
import type { CommandRunner } from './types.js';

/**
 * mc alias for a provider id: uppercase letters, digits and underscores only
 */
export function aliasFor(providerId: string): string {
  return `OBJBENCH_${providerId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * MC_HOST_<alias> value: the endpoint with URL-encoded credentials as userinfo
 */
export function hostUrl(endpoint: string, credentials: Credentials): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new Error(`Invalid endpoint URL: ${endpoint}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Endpoint must use http or https: ${endpoint}`);
  }

  const userinfo = [credentials.accessKey, credentials.secretKey, credentials.sessionToken]
    .filter((part): part is string => part !== undefined && part !== '')
    .map(encodeURIComponent)
    .join(':');
  const path = url.pathname === '/' ? '' : url.pathname.replace(/\/+$/, '');

  return `${url.protocol}//${userinfo}@${url.host}${path}`;
}

export interface McProviderOptions {
  /** Explicit mc binary; skips discovery */
  cli?: string;
  /** Replaces the spawning runner, used in tests */
  runner?: CommandRunner;
}

/**
 * S3-compatible storage through the MinIO client CLI
 */
export class McStorageProvider implements IStorageProvider {
  readonly name = 'mc';
  private cliPath: string | null;
  private readonly runner: CommandRunner | undefined;

  constructor(options: McProviderOptions = {}) {
    this.cliPath = options.cli ?? null;
    this.runner = options.runner;
  }

  /**
   * Find the mc CLI path. Midnight Commander also installs as `mc`, so a
   * candidate only counts when its version output names MinIO.
   */
  private findMcCli(): string | null {
    if (this.cliPath !== null) {
      return this.cliPath;
    }

    const candidates = [
      process.env.MC_PATH,
      '/usr/local/bin/mc',
      '/opt/homebrew/bin/mc',
      '/usr/bin/mcli',
      'mcli',
      'mc',
    ];

    for (const candidate of candidates) {
      if (!candidate) continue;
      try {
        const output = execSync(`${candidate} --version`, { encoding: 'utf-8', stdio: 'pipe' });
        if (/minio|RELEASE\./i.test(output)) {
          this.cliPath = candidate;
          return candidate;
        }
      } catch {
        // Not present at this path
      }
    }

    return null;
  }

  async create(target: StorageTarget, credentials: Credentials): Promise<IStorageClient> {
    const cli = this.findMcCli();
    if (!cli) {
      throw new Error('MinIO client (mc) not found. Install it or set MC_PATH');
    }

    return new McStorageClient({
      cli,
      alias: aliasFor(target.id),
      hostUrl: hostUrl(target.endpoint, credentials),
      insecure: target.insecureSsl,
      provider: target.id,
      bucket: target.bucket,
      ...(this.runner ? { runner: this.runner } : {}),
    });
  }

  async isAvailable(): Promise<boolean> {
    return this.findMcCli() !== null;
  }

  async getInfo(): Promise<ProviderInfo> {
    const cli = this.findMcCli();

    let version = 'unavailable';
    if (cli) {
      try {
        version = execSync(`${cli} --version`, { encoding: 'utf-8', stdio: 'pipe' }).split('\n')[0]?.trim() ?? version;
      } catch {
        // Version check failed
      }
    }

    return {
      name: this.name,
      version,
      features: cli ? ['mirror', 'recursive-list', 'stat', 'recursive-delete', 'env-host-config'] : [],
    };
  }
}
