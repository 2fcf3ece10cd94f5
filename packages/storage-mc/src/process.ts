import { spawn } from 'node:child_process';
import type { StorageResult } from '@objbench/core';
import { TIMEOUT_EXIT_CODE, tail } from '@objbench/core';
import type { CommandOptions } from './types.js';

/**
 * Spawn a CLI, time it, and resolve with its exit status and output tails.
 * Never rejects: spawn failures resolve with exit code 1.
 */
export function runCommand(cli: string, args: string[], options: CommandOptions): Promise<StorageResult> {
  const startTime = performance.now();

  return new Promise((resolve) => {
    const proc = spawn(cli, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, ...options.env },
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, options.timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout = tail(stdout + data.toString());
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr = tail(stderr + data.toString());
    });

    proc.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      const durationMs = performance.now() - startTime;

      let exitCode = code ?? (signal ? 1 : 0);
      if (timedOut) {
        exitCode = TIMEOUT_EXIT_CODE;
        stderr = `timeout after ${options.timeoutMs / 1000}s${stderr ? `\n${stderr}` : ''}`;
      }

      resolve({
        exitCode,
        stdout: stdout.trimEnd(),
        stderr: stderr.trimEnd(),
        durationMs,
        timedOut,
      });
    });

    proc.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode: 1,
        stdout: '',
        stderr: err.message,
        durationMs: performance.now() - startTime,
        timedOut: false,
      });
    });
  });
}
