import { spawn } from 'child_process';
import { PROCESS } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';

export interface ProcessOptions {
  /** Kill the process after this long */
  timeoutMs: number;
  /** Kill the process when aborted */
  signal?: AbortSignal;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
}

/**
 * Runs a command to completion. Resolves on any exit (including non-zero and
 * kills); rejects only when the process cannot be started (e.g. ENOENT).
 */
export type ProcessRunner = (command: string, args: string[], options: ProcessOptions) => Promise<ProcessResult>;

/**
 * ProcessRunner backed by child_process.spawn. No shell is involved; stdin is
 * closed. Timeout and abort send SIGTERM, then SIGKILL after a grace period.
 */
export const runProcess: ProcessRunner = (command, args, { timeoutMs, signal }) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let aborted = false;
    let killTimer: NodeJS.Timeout | null = null;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const terminate = (): void => {
      if (child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          logger.warn('[runProcess] Process ignored SIGTERM, sending SIGKILL', { command, pid: child.pid });
          child.kill('SIGKILL');
        }
      }, PROCESS.KILL_GRACE_PERIOD);
      killTimer.unref();
    };

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeoutMs);

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };

    const cleanup = (): void => {
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    child.on('error', error => {
      cleanup();
      reject(error);
    });

    child.on('close', (exitCode, exitSignal) => {
      cleanup();
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode,
        signal: exitSignal,
        timedOut,
        aborted,
      });
    });
  });
