import { REMOTE } from '../../config/constants.js';
import { ExtractionCancelledError, SSHError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, isError } from '../../utils/errorHandling.js';
import type { CollectedFile, RawOutput } from '../extraction/Extractor.js';
import type { ProcessResult, ProcessRunner } from '../process/runProcess.js';

export interface RemoteBridgeOptions {
  sshPath: string;
  /** yt-dlp binary on the remote host */
  remoteBinaryPath: string;
  connectTimeoutSeconds: number;
  runner: ProcessRunner;
  now?: () => number;
}

export interface RemoteRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Extensions of files in the remote work dir to stream back */
  collect: string[];
}

/**
 * Quote one word for a POSIX shell
 */
export function shellQuote(word: string): string {
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * Remote Execution Bridge
 *
 * Runs yt-dlp on another host over non-interactive ssh. Each call gets its own
 * remote temp directory (mktemp -d) that receives written files; matching
 * files are streamed back on stdout after a marker line, and the directory is
 * removed in a finally block on every exit path.
 */
export class RemoteExecutionBridge {
  private readonly now: () => number;

  constructor(private readonly options: RemoteBridgeOptions) {
    this.now = options.now ?? Date.now;
  }

  async runRemote(
    host: string,
    buildArgv: (workDir: string) => string[],
    { timeoutMs, signal, collect }: RemoteRunOptions
  ): Promise<RawOutput> {
    if (!host || host.startsWith('-')) {
      throw new SSHError(host, `Invalid ssh host: "${host}"`);
    }

    const startedAt = this.now();
    const workDir = await this.acquire(host, Math.min(REMOTE.ACQUIRE_TIMEOUT, timeoutMs), signal);
    let interrupted = false;

    try {
      const argv = [this.options.remoteBinaryPath, ...buildArgv(workDir)];
      const remaining = Math.max(1, timeoutMs - (this.now() - startedAt));
      const script = buildRemoteScript(workDir, argv, collect, Math.ceil(remaining / 1000));

      logger.debug('[RemoteExecutionBridge] Running remote extraction', { host, workDir, timeoutMs: remaining });
      const result = await this.ssh(host, script, remaining, signal);

      if (isTransportFailure(result)) {
        throw new SSHError(
          host,
          `ssh to ${host} failed: ${result.stderr.trim() || 'connection error'}`,
          result.exitCode,
          { service: 'RemoteExecutionBridge', operation: 'runRemote' }
        );
      }

      const timedOut = result.timedOut || result.exitCode === REMOTE.DEADLINE_EXIT_CODE;
      interrupted = timedOut || result.aborted;

      const { stdout, files } = splitStreamedFiles(result.stdout);
      return {
        stdout,
        stderr: result.stderr,
        exitCode: result.exitCode,
        timedOut,
        aborted: result.aborted,
        files,
      };
    } finally {
      await this.release(host, workDir, interrupted);
    }
  }

  private async acquire(host: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const result = await this.ssh(host, 'mktemp -d', timeoutMs, signal);

    if (result.aborted) {
      throw new ExtractionCancelledError({ service: 'RemoteExecutionBridge', operation: 'acquire' });
    }
    if (result.timedOut) {
      throw new SSHError(host, `Timed out creating a remote temp directory on ${host}`, result.exitCode);
    }

    const workDir = result.stdout.trim();
    if (result.exitCode !== 0 || !workDir.startsWith('/') || workDir.includes('\n')) {
      throw new SSHError(
        host,
        `Could not create a remote temp directory on ${host}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        result.exitCode
      );
    }
    return workDir;
  }

  /**
   * Best-effort removal; never throws and ignores the caller's cancellation.
   * Closing the ssh client does not stop a remote process without a pty, so an
   * interrupted run also terminates the extractor before the directory goes.
   */
  private async release(host: string, workDir: string, interrupted: boolean): Promise<void> {
    try {
      const result = await this.ssh(host, buildReleaseScript(workDir, interrupted), REMOTE.RELEASE_TIMEOUT);
      if (result.exitCode !== 0) {
        logger.warn('[RemoteExecutionBridge] Remote cleanup failed', {
          host,
          workDir,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          stderr: result.stderr.trim(),
        });
      }
    } catch (error) {
      logger.warn('[RemoteExecutionBridge] Remote cleanup failed', { host, workDir, error: getErrorMessage(error) });
    }
  }

  private async ssh(host: string, command: string, timeoutMs: number, signal?: AbortSignal): Promise<ProcessResult> {
    const args = [
      '-T',
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${this.options.connectTimeoutSeconds}`,
      host,
      command,
    ];
    try {
      return await this.options.runner(this.options.sshPath, args, { timeoutMs, ...(signal && { signal }) });
    } catch (error) {
      throw new SSHError(
        host,
        `Could not start ssh: ${getErrorMessage(error)}`,
        null,
        { service: 'RemoteExecutionBridge' },
        isError(error) ? error : undefined
      );
    }
  }
}

/**
 * ssh reports its own failures (connect, auth, host key) with exit status 255
 */
function isTransportFailure(result: ProcessResult): boolean {
  return !result.timedOut && !result.aborted && result.exitCode === REMOTE.TRANSPORT_EXIT_CODE;
}

/**
 * `cd <dir>`, then argv under `timeout` in the background with its pid written
 * to the pid file, then each matching file as `\n<marker> <name>\n<content>`,
 * exiting with the extractor's status
 */
export function buildRemoteScript(workDir: string, argv: string[], collect: string[], deadlineSeconds: number): string {
  const bounded = `timeout -k ${REMOTE.KILL_AFTER_SECONDS} ${Math.max(1, deadlineSeconds)} ${argv.map(shellQuote).join(' ')}`;
  const run = `cd ${shellQuote(workDir)} && { ${bounded} & echo $! > ${shellQuote(REMOTE.PID_FILE)}; wait $!; }`;
  if (collect.length === 0) {
    return run;
  }
  const globs = collect.map(ext => `*${ext.replace(/[^a-zA-Z0-9.]/g, '')}`).join(' ');
  return (
    `${run}; rc=$?; ` +
    `for f in ${globs}; do [ -f "$f" ] || continue; ` +
    `printf '\\n%s %s\\n' ${shellQuote(REMOTE.FILE_MARKER)} "$f"; cat -- "$f"; done; ` +
    'exit $rc'
  );
}

export function buildReleaseScript(workDir: string, interrupted: boolean): string {
  const remove = `rm -rf -- ${shellQuote(workDir)}`;
  if (!interrupted) {
    return remove;
  }
  const pidFile = shellQuote(`${workDir}/${REMOTE.PID_FILE}`);
  return `kill -TERM "$(cat ${pidFile} 2>/dev/null)" 2>/dev/null; ${remove}`;
}

/**
 * Separate extractor stdout from the files streamed after it
 */
export function splitStreamedFiles(output: string): { stdout: string; files: CollectedFile[] } {
  const parts = output.split(`\n${REMOTE.FILE_MARKER} `);
  const stdout = parts[0] ?? '';
  const files: CollectedFile[] = [];
  for (const part of parts.slice(1)) {
    const newline = part.indexOf('\n');
    if (newline === -1) {
      files.push({ name: part, content: '' });
      continue;
    }
    files.push({ name: part.substring(0, newline), content: part.substring(newline + 1) });
  }
  return { stdout, files };
}
