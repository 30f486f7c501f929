import type { AppConfig } from '../config/types.js';
import { logger } from '../middleware/logging.js';
import { checkBinary, execVersionQuery, type VersionQuery } from '../utils/binaryCheck.js';
import type { CacheStats, MediaService } from './MediaService.js';
import type { ExtractionPool, PoolStats } from './extraction/ExtractionPool.js';

const FFMPEG_INSTALL_HINT =
  'ffmpeg not found. Some formats may be unavailable. ' +
  'Install: apt: sudo apt install ffmpeg | brew: brew install ffmpeg | conda install -c conda-forge ffmpeg';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  ytdlp: { available: boolean; version: string | null; path: string };
  ffmpeg: { available: boolean; version: string | null; message: string };
  remoteHosts: string[];
  cache: CacheStats;
  pool: PoolStats;
  timestamp: string;
}

/**
 * Reports whether extraction can work here. Never throws.
 */
export class HealthCheckService {
  constructor(
    private readonly config: AppConfig,
    private readonly media: MediaService,
    private readonly pool: ExtractionPool,
    private readonly versionQuery: VersionQuery = execVersionQuery
  ) {}

  async check(): Promise<HealthReport> {
    const { extraction, credentials } = this.config;

    const [ytdlp, ffmpeg] = await Promise.all([
      checkBinary(extraction.ytdlpPath, ['--version'], this.versionQuery),
      checkBinary(extraction.ffmpegPath, ['-version'], this.versionQuery),
    ]);

    const remoteHosts = [
      ...new Set(
        [credentials.global.remoteHost, ...Object.values(credentials.platforms).map(settings => settings.remoteHost)].filter(
          (host): host is string => typeof host === 'string' && host.length > 0
        )
      ),
    ];

    // Without a local yt-dlp, only platforms routed to a remote host can work
    const status = ytdlp.available || remoteHosts.length > 0 ? 'healthy' : 'degraded';
    if (status === 'degraded') {
      logger.warn('[HealthCheckService] yt-dlp unavailable and no remote host configured', { error: ytdlp.error });
    }

    return {
      status,
      ytdlp: { available: ytdlp.available, version: ytdlp.version ?? null, path: extraction.ytdlpPath },
      ffmpeg: {
        available: ffmpeg.available,
        version: ffmpeg.version ?? null,
        message: ffmpeg.available ? 'ffmpeg is available' : FFMPEG_INSTALL_HINT,
      },
      remoteHosts,
      cache: this.media.cacheStats(),
      pool: this.pool.stats(),
      timestamp: new Date().toISOString(),
    };
  }
}
