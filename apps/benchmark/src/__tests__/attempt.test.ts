import { describe, it, expect, vi } from 'vitest';
import { TIMEOUT_EXIT_CODE, type StorageResult } from '@objbench/core';
import { attemptError, normalizeResult, withAttempts } from '../attempt.js';
import { fail, ok } from './fakes.js';

const policy = { retryAttempts: 2, retryBackoffSeconds: 0.5, timeoutSeconds: 60 };

describe('withAttempts', () => {
  it('returns after the first success', async () => {
    const call = vi.fn<(attempt: number) => Promise<StorageResult>>().mockResolvedValue(ok());
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

    const outcome = await withAttempts(call, policy, { sleep });

    expect(outcome).toEqual({ ok: true, attempts: 1, last: ok() });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off linearly and reports every attempt before sleeping', async () => {
    const events: string[] = [];
    const outcome = await withAttempts(async () => fail('nope'), policy, {
      sleep: async ms => {
        events.push(`sleep ${ms}`);
      },
      onAttempt: async attempt => {
        events.push(`attempt ${attempt}`);
      },
    });

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    expect(events).toEqual(['attempt 1', 'sleep 500', 'attempt 2', 'sleep 1000', 'attempt 3']);
  });

  it('accepts a custom success test', async () => {
    const outcome = await withAttempts(async () => fail('already exists'), policy, {
      sleep: async () => {},
      isSuccess: r => r.stderr.includes('already'),
    });

    expect(outcome).toMatchObject({ ok: true, attempts: 1 });
  });

  it('makes a single attempt with no retries', async () => {
    const call = vi.fn<(attempt: number) => Promise<StorageResult>>().mockResolvedValue(fail('x'));

    const outcome = await withAttempts(call, { ...policy, retryAttempts: 0 }, { sleep: async () => {} });

    expect(outcome.attempts).toBe(1);
    expect(call).toHaveBeenCalledTimes(1);
  });
});

describe('attemptError', () => {
  it('prefers stderr, then stdout, then the exit code', () => {
    expect(attemptError(ok(), 10)).toBe('');
    expect(attemptError(fail('  bad  '), 10)).toBe('bad');
    expect(attemptError({ ...fail(''), stdout: 'from stdout' }, 10)).toBe('from stdout');
    expect(attemptError(fail('', 3), 10)).toBe('exit code 3');
    expect(attemptError({ ...fail('ignored'), timedOut: true }, 10)).toBe('timeout after 10s');
  });
});

describe('normalizeResult', () => {
  it('reports a timed-out call with the shared timeout exit code', () => {
    expect(normalizeResult({ ...fail('killed', 137), timedOut: true }).exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(normalizeResult(fail('denied', 3)).exitCode).toBe(3);
  });
});
