import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CredentialResolver, parseProfileSection } from '../credentials.js';
import { CredentialError } from '../errors.js';

describe('CredentialResolver', () => {
  let testDir: string;
  let credentialsFile: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'credentials-test-'));
    credentialsFile = join(testDir, 'credentials');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  const isolated = (env: Record<string, string>): Record<string, string> => ({
    AWS_SHARED_CREDENTIALS_FILE: credentialsFile,
    AWS_CONFIG_FILE: join(testDir, 'config'),
    ...env,
  });

  it('resolves namespaced variables', () => {
    const resolver = new CredentialResolver(isolated({
      IC_ACCESS_KEY: 'test-access',
      IC_SECRET_KEY: 'test-secret',
    }));

    expect(resolver.resolve({ namespace: 'IC' })).toEqual({
      accessKey: 'test-access',
      secretKey: 'test-secret',
    });
  });

  it('accepts the _ID / _SECRET_ACCESS_KEY spellings and a session token', () => {
    const resolver = new CredentialResolver(isolated({
      AKAVE_ACCESS_KEY_ID: 'test-access',
      AKAVE_SECRET_ACCESS_KEY: 'test-secret',
      AKAVE_SESSION_TOKEN: 'test-token',
    }));

    expect(resolver.resolve({ namespace: 'akave' })).toEqual({
      accessKey: 'test-access',
      secretKey: 'test-secret',
      sessionToken: 'test-token',
    });
  });

  it('prefers the namespace over generic AWS variables', () => {
    const resolver = new CredentialResolver(isolated({
      IC_ACCESS_KEY: 'ns-access',
      IC_SECRET_KEY: 'ns-secret',
      AWS_ACCESS_KEY_ID: 'aws-access',
      AWS_SECRET_ACCESS_KEY: 'aws-secret',
    }));

    expect(resolver.resolve({ namespace: 'IC' }).accessKey).toBe('ns-access');
  });

  it('falls back to generic AWS variables', () => {
    const resolver = new CredentialResolver(isolated({
      AWS_ACCESS_KEY_ID: 'aws-access',
      AWS_SECRET_ACCESS_KEY: 'aws-secret',
    }));

    expect(resolver.resolve({ namespace: 'IC' })).toEqual({
      accessKey: 'aws-access',
      secretKey: 'aws-secret',
    });
  });

  it('reads a named profile before the environment', () => {
    writeFileSync(
      credentialsFile,
      [
        '[default]',
        'aws_access_key_id = default-access',
        'aws_secret_access_key = default-secret',
        '',
        '[bench]',
        'aws_access_key_id = profile-access',
        'aws_secret_access_key = profile-secret',
      ].join('\n'),
    );
    const resolver = new CredentialResolver(isolated({
      IC_ACCESS_KEY: 'ns-access',
      IC_SECRET_KEY: 'ns-secret',
    }));

    expect(resolver.resolve({ namespace: 'IC', profile: 'bench' })).toEqual({
      accessKey: 'profile-access',
      secretKey: 'profile-secret',
    });
  });

  it('fails with the expected variable names when nothing resolves', () => {
    const resolver = new CredentialResolver(isolated({ IC_ACCESS_KEY: 'only-half' }));

    expect(() => resolver.resolve({ namespace: 'ic' })).toThrow(CredentialError);
    expect(() => resolver.resolve({ namespace: 'ic' })).toThrow(
      "Missing credentials for namespace 'IC'. Set IC_ACCESS_KEY and IC_SECRET_KEY",
    );
  });

  it('rejects an empty namespace', () => {
    const resolver = new CredentialResolver(isolated({}));
    expect(() => resolver.resolve({ namespace: '  ' })).toThrow('must not be empty');
  });
});

describe('parseProfileSection', () => {
  it('returns null for a missing section', () => {
    expect(parseProfileSection('[a]\nx = 1\n', 'b')).toBeNull();
  });

  it('ignores comments and other sections', () => {
    const content = '# c\n[a]\nx = 1\n[b]\nx = 2\n; y = 3\ny = 4\n';
    expect(parseProfileSection(content, 'b')).toEqual({ x: '2', y: '4' });
  });
});
