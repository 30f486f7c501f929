/**
 * Binary Availability Checker
 *
 * Verifies that the external binaries the extractor needs are available.
 * Used at startup and by the health check.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { PROCESS } from '../config/constants.js';
import type { ExtractionConfig } from '../config/types.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage, isCommandNotFound } from './errorHandling.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Runs `<binary> <args>` and returns its output; rejects when it cannot run
 */
export type VersionQuery = (binary: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

export const execVersionQuery: VersionQuery = (binary, args) =>
  execFilePromise(binary, args, { timeout: PROCESS.VERSION_CHECK_TIMEOUT });

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(
  binaryName: string,
  versionArgs: string[] = ['--version'],
  versionQuery: VersionQuery = execVersionQuery
): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await versionQuery(binaryName, versionArgs);

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+([\d.]+)|v([\d.]+)|([\d.]+)/i);
    const version = versionMatch ? versionMatch[1] || versionMatch[2] || versionMatch[3] || 'unknown' : 'unknown';

    return {
      binary: binaryName,
      available: true,
      version,
    };
  } catch (error) {
    return {
      binary: binaryName,
      available: false,
      error: isCommandNotFound(error) ? `${binaryName} not found on PATH` : getErrorMessage(error),
    };
  }
}

/**
 * Check extractor binaries at startup
 * Logs warnings for missing binaries but doesn't block startup
 */
export async function checkRequiredBinaries(config: ExtractionConfig, hasRemoteHosts: boolean): Promise<void> {
  logger.info('Checking binary dependencies...');

  const binaries = [
    // A remote host can stand in for a missing local yt-dlp
    { name: config.ytdlpPath, required: !hasRemoteHosts, purpose: 'Local media extraction', args: ['--version'] },
    { name: config.ffmpegPath, required: false, purpose: 'Merged formats (optional)', args: ['-version'] },
    { name: config.sshPath, required: false, purpose: 'Remote extraction (optional)', args: ['-V'] },
  ];

  for (const binary of binaries) {
    const result = await checkBinary(binary.name, binary.args);

    if (result.available) {
      logger.info(`✓ ${binary.name} found`, {
        service: 'binaryCheck',
        binary: binary.name,
        version: result.version,
      });
    } else {
      const logLevel = binary.required ? 'error' : 'warn';
      logger[logLevel](`✗ ${binary.name} not found - ${binary.purpose}`, {
        service: 'binaryCheck',
        binary: binary.name,
        required: binary.required,
        error: result.error,
      });
    }
  }
}
