import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { ProcessRunner } from '../process/runProcess.js';
import type { RemoteExecutionBridge } from '../remote/RemoteExecutionBridge.js';
import { buildYtDlpArgs, type ExtractorOptions } from './ytdlpArgs.js';

export interface ExtractionRequest {
  /** URL or search expression handed to the extractor */
  target: string;
  options: ExtractorOptions;
  /** Extensions of written files to return, e.g. ['.vtt'] */
  collect?: string[];
}

export interface CollectedFile {
  name: string;
  content: string;
}

export interface RawOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  aborted: boolean;
  files: CollectedFile[];
}

export interface ExtractOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one extractor invocation somewhere and hands back its raw output
 */
export interface Extractor {
  /** Where the extractor runs, for logs ("local" or the ssh host) */
  readonly location: string;
  extract(request: ExtractionRequest, options: ExtractOptions): Promise<RawOutput>;
}

/**
 * Runs yt-dlp as a local subprocess. Files are written to a private temp
 * directory that is removed afterwards.
 */
export class LocalProcessExtractor implements Extractor {
  readonly location = 'local';

  constructor(
    private readonly binaryPath: string,
    private readonly runner: ProcessRunner
  ) {}

  async extract(request: ExtractionRequest, { timeoutMs, signal }: ExtractOptions): Promise<RawOutput> {
    const collect = request.collect ?? [];
    const workDir = collect.length > 0 ? await fs.mkdtemp(path.join(os.tmpdir(), 'mediascope-')) : undefined;

    try {
      const args = buildYtDlpArgs(request.target, request.options, workDir);
      const result = await this.runner(this.binaryPath, args, { timeoutMs, ...(signal && { signal }) });
      const files = workDir ? await readCollectedFiles(workDir, collect) : [];
      return {
        stdout: result.stdout,
        stderr: result.stderr,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        aborted: result.aborted,
        files,
      };
    } finally {
      if (workDir) {
        await fs.remove(workDir).catch((error: unknown) => {
          logger.warn('[LocalProcessExtractor] Failed to remove temp directory', {
            workDir,
            error: getErrorMessage(error),
          });
        });
      }
    }
  }
}

async function readCollectedFiles(dir: string, extensions: string[]): Promise<CollectedFile[]> {
  const names = (await fs.readdir(dir)).filter(name => extensions.some(ext => name.endsWith(ext))).sort();
  const files: CollectedFile[] = [];
  for (const name of names) {
    files.push({ name, content: await fs.readFile(path.join(dir, name), 'utf8') });
  }
  return files;
}

/**
 * Runs yt-dlp on a remote host through the ssh bridge
 */
export class RemoteExtractor implements Extractor {
  constructor(
    private readonly host: string,
    private readonly bridge: RemoteExecutionBridge
  ) {}

  get location(): string {
    return this.host;
  }

  async extract(request: ExtractionRequest, { timeoutMs, signal }: ExtractOptions): Promise<RawOutput> {
    return this.bridge.runRemote(this.host, workDir => buildYtDlpArgs(request.target, request.options, workDir), {
      timeoutMs,
      collect: request.collect ?? [],
      ...(signal && { signal }),
    });
  }
}
