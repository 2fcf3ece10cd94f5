import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { CredentialError } from './errors.js';
import type { Credentials } from './types.js';

export interface CredentialRequest {
  /** Environment variable prefix, e.g. IC for IC_ACCESS_KEY */
  namespace: string;
  /** Shared credentials profile, tried first when set */
  profile?: string | undefined;
}

export type CredentialResolverFn = (request: CredentialRequest) => Credentials;

type Env = Record<string, string | undefined>;

function firstSet(env: Env, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

function pair(accessKey: string | undefined, secretKey: string | undefined, sessionToken: string | undefined): Credentials | null {
  if (!accessKey || !secretKey) return null;
  return sessionToken ? { accessKey, secretKey, sessionToken } : { accessKey, secretKey };
}

/**
 * Read one section of an AWS-style shared credentials/config file
 */
export function parseProfileSection(content: string, section: string): Record<string, string> | null {
  let current: string | null = null;
  let found: Record<string, string> | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = (header[1] ?? '').trim();
      if (current === section) found = found ?? {};
      continue;
    }

    if (current !== section || found === null) continue;
    const eq = line.indexOf('=');
    if (eq > 0) {
      found[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
    }
  }

  return found;
}

/**
 * Resolves provider credentials from a profile or the environment.
 *
 * Order: profile (shared credentials file) → `<NS>_ACCESS_KEY` / `<NS>_SECRET_KEY`
 * → `AWS_ACCESS_KEY_ID` / `AWS_SECRET_ACCESS_KEY`.
 */
export class CredentialResolver {
  private readonly env: Env;

  constructor(env: Env = process.env) {
    this.env = env;
  }

  private profileFiles(): string[] {
    const home = homedir();
    return [
      this.env.AWS_SHARED_CREDENTIALS_FILE ?? join(home, '.aws', 'credentials'),
      this.env.AWS_CONFIG_FILE ?? join(home, '.aws', 'config'),
    ];
  }

  private fromProfile(profile: string | undefined): Credentials | null {
    if (!profile) return null;

    for (const file of this.profileFiles()) {
      if (!existsSync(file)) continue;
      const content = readFileSync(file, 'utf8');
      for (const section of [profile, `profile ${profile}`]) {
        const values = parseProfileSection(content, section);
        if (!values) continue;
        const creds = pair(values.aws_access_key_id, values.aws_secret_access_key, values.aws_session_token);
        if (creds) return creds;
      }
    }
    return null;
  }

  private fromNamespace(ns: string): Credentials | null {
    return pair(
      firstSet(this.env, [`${ns}_ACCESS_KEY`, `${ns}_ACCESS_KEY_ID`]),
      firstSet(this.env, [`${ns}_SECRET_KEY`, `${ns}_SECRET_ACCESS_KEY`]),
      this.env[`${ns}_SESSION_TOKEN`],
    );
  }

  private fromAwsEnv(): Credentials | null {
    return pair(
      firstSet(this.env, ['AWS_ACCESS_KEY_ID', 'AWS_ACCESS_KEY']),
      firstSet(this.env, ['AWS_SECRET_ACCESS_KEY', 'AWS_SECRET_KEY']),
      this.env.AWS_SESSION_TOKEN,
    );
  }

  resolve({ namespace, profile }: CredentialRequest): Credentials {
    const ns = namespace.trim().toUpperCase();
    if (ns === '') {
      throw new CredentialError('Credential namespace must not be empty', namespace);
    }

    const creds =
      this.fromProfile(profile ?? this.env.AWS_PROFILE) ??
      this.fromNamespace(ns) ??
      this.fromAwsEnv();

    if (!creds) {
      throw new CredentialError(
        `Missing credentials for namespace '${ns}'. Set ${ns}_ACCESS_KEY and ${ns}_SECRET_KEY, ` +
          'or AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY, or provide --profile / AWS_PROFILE.',
        ns,
      );
    }
    return creds;
  }
}
