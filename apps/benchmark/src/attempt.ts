import { TIMEOUT_EXIT_CODE, type StorageResult } from '@objbench/core';

export interface AttemptPolicy {
  /** Retries after the first attempt */
  retryAttempts: number;
  /** Sleep before attempt n+1 is n times this */
  retryBackoffSeconds: number;
  timeoutSeconds: number;
}

export interface AttemptHooks {
  sleep: (ms: number) => Promise<void>;
  /** Awaited after every attempt, before any backoff */
  onAttempt?: (attempt: number, result: StorageResult, startedAt: Date) => Promise<void>;
  /** Defaults to exit code 0 */
  isSuccess?: (result: StorageResult) => boolean;
}

export interface AttemptOutcome {
  ok: boolean;
  attempts: number;
  last: StorageResult;
}

/**
 * Normalize a timed-out result to exit code 124
 */
export function normalizeResult(result: StorageResult): StorageResult {
  return result.timedOut ? { ...result, exitCode: TIMEOUT_EXIT_CODE } : result;
}

/**
 * Error text recorded for an attempt; empty on success
 */
export function attemptError(result: StorageResult, timeoutSeconds: number): string {
  if (result.timedOut) return `timeout after ${timeoutSeconds}s`;
  if (result.exitCode === 0) return '';
  return result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
}

/**
 * Run `call` up to retryAttempts + 1 times, stopping at the first success.
 * Backoff is linear: attempt n failing sleeps n × retryBackoffSeconds.
 */
export async function withAttempts(
  call: (attempt: number) => Promise<StorageResult>,
  policy: AttemptPolicy,
  hooks: AttemptHooks
): Promise<AttemptOutcome> {
  const maxAttempts = policy.retryAttempts + 1;
  const isSuccess = hooks.isSuccess ?? ((r: StorageResult) => r.exitCode === 0);

  for (let attempt = 1; ; attempt++) {
    const startedAt = new Date();
    const result = normalizeResult(await call(attempt));
    await hooks.onAttempt?.(attempt, result, startedAt);

    if (isSuccess(result)) {
      return { ok: true, attempts: attempt, last: result };
    }
    if (attempt >= maxAttempts) {
      return { ok: false, attempts: attempt, last: result };
    }
    await hooks.sleep(attempt * policy.retryBackoffSeconds * 1000);
  }
}
