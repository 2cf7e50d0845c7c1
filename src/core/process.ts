/**
 * External process execution
 *
 * The render cycle only ever talks to a ProcessRunner, so tests can swap in
 * an in-process fake.
 */

import { spawn } from 'child_process';
import { ProcessLaunchError, ProcessTimeoutError } from './errors';
import type { CommandStep } from './wavedromCli';

export interface ProcessOutcome {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Kill the process after this many ms. 0 or unset: no limit */
  timeoutMs?: number;
}

export interface ProcessRunner {
  /**
   * Run one step to completion, capturing stdout and stderr separately.
   * Rejects only when the process cannot be started or times out.
   */
  run(step: CommandStep, options?: RunOptions): Promise<ProcessOutcome>;
}

const WINDOWS_BATCH = /\.(cmd|bat)$/i;

/**
 * What to hand to spawn for one step. Windows batch files (npm's `.cmd`
 * shims) cannot be spawned directly and go through `cmd /c`.
 */
export function spawnCommand(
  step: CommandStep,
  platform: NodeJS.Platform = process.platform,
): { executable: string; args: string[] } {
  if (platform === 'win32' && WINDOWS_BATCH.test(step.executable)) {
    return { executable: 'cmd', args: ['/d', '/c', step.executable, ...step.args] };
  }
  return { executable: step.executable, args: [...step.args] };
}

/**
 * ProcessRunner backed by child_process.spawn, without a shell except for
 * Windows batch files
 */
export class NodeProcessRunner implements ProcessRunner {
  constructor(private platform: NodeJS.Platform = process.platform) {}

  run(step: CommandStep, options: RunOptions = {}): Promise<ProcessOutcome> {
    const { timeoutMs = 0 } = options;
    const { executable, args } = spawnCommand(step, this.platform);

    return new Promise<ProcessOutcome>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const errorChunks: Buffer[] = [];
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const proc = spawn(executable, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      proc.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      proc.stderr.on('data', (chunk: Buffer) => errorChunks.push(chunk));

      proc.on('error', err => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        reject(new ProcessLaunchError(step.executable, err));
      });

      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(chunks).toString(),
          stderr: Buffer.concat(errorChunks).toString(),
        });
      });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          proc.kill();
          reject(new ProcessTimeoutError(step.executable, timeoutMs));
        }, timeoutMs);
      }
    });
  }
}
