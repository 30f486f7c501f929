import type { CredentialEnvironment } from '../config/types.js';
import { LIMITS } from '../config/constants.js';
import { BatchError, ErrorCode, ExtractionError, SearchError } from '../errors/index.js';
import { logger } from '../middleware/logging.js';
import type {
  AudioQuality,
  AudioStreamInfo,
  OperationName,
  Platform,
  PlaylistInfo,
  SearchResult,
  TranscriptFormat,
  TranscriptResult,
  VideoInfo,
} from '../types/media.js';
import { fingerprint } from './cache/fingerprint.js';
import { TtlCache, type TtlCacheOptions } from './cache/TtlCache.js';
import type { ExtractionClient, OperationArgs, OperationPayloads } from './extraction/ExtractionClient.js';
import type { ExtractionPool } from './extraction/ExtractionPool.js';
import { resolvePlatformConfig } from './extraction/platformConfigResolver.js';
import { detectCollectionPlatform, detectPlatform } from './platforms/platformDetector.js';

const AUDIO_QUALITIES: readonly AudioQuality[] = ['best', 'smallest'];
const TRANSCRIPT_FORMATS: readonly TranscriptFormat[] = ['text', 'segments', 'vtt'];

type ResultCaches = {
  [K in OperationName]: TtlCache<OperationPayloads[K]>;
};

export interface MediaServiceOptions {
  client: ExtractionClient;
  pool: ExtractionPool;
  credentials: CredentialEnvironment;
  timeouts: Record<OperationName, number>;
  cache: TtlCacheOptions;
  playlistMaxVideos: number;
}

export interface CacheStats {
  entries: number;
  ttlMs: number;
}

/**
 * Media Service
 *
 * Entry point for every extraction operation: validates input, resolves the
 * platform's settings, answers from the TTL cache when possible and otherwise
 * runs the extraction through the pool. Only successes are cached.
 */
export class MediaService {
  private readonly caches: ResultCaches;

  constructor(private readonly options: MediaServiceOptions) {
    this.caches = {
      video_info: new TtlCache<VideoInfo>(options.cache),
      transcript: new TtlCache<TranscriptResult>(options.cache),
      search: new TtlCache<SearchResult[]>(options.cache),
      audio_url: new TtlCache<AudioStreamInfo>(options.cache),
      playlist: new TtlCache<PlaylistInfo>(options.cache),
    };
  }

  async getVideoInfo(url: string, signal?: AbortSignal): Promise<VideoInfo> {
    const { platform, canonicalUrl } = detectPlatform(url);
    return this.run('video_info', { url: canonicalUrl, platform }, platform, signal);
  }

  async getTranscript(url: string, lang: string, format: TranscriptFormat, signal?: AbortSignal): Promise<TranscriptResult> {
    const { platform, canonicalUrl } = detectPlatform(url);
    const language = lang.trim();
    if (!language) {
      throw new ExtractionError('lang must be a non-empty language code', ErrorCode.VALIDATION_INPUT_INVALID);
    }
    if (!TRANSCRIPT_FORMATS.includes(format)) {
      throw new ExtractionError(
        `format must be one of: ${TRANSCRIPT_FORMATS.join(', ')}`,
        ErrorCode.VALIDATION_INPUT_INVALID
      );
    }
    return this.run('transcript', { url: canonicalUrl, platform, lang: language, format }, platform, signal);
  }

  async searchVideos(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new SearchError('Search query must be a non-empty string', ErrorCode.VALIDATION_INPUT_INVALID);
    }
    if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > LIMITS.SEARCH_MAX_RESULTS) {
      throw new SearchError(
        `max_results must be an integer between 1 and ${LIMITS.SEARCH_MAX_RESULTS}`,
        ErrorCode.VALIDATION_INPUT_INVALID
      );
    }
    // ytsearch is served by YouTube, so YouTube's settings apply
    return this.run('search', { query: trimmed, maxResults }, 'youtube', signal, {
      query: trimmed.toLowerCase(),
      maxResults,
    });
  }

  async getAudioUrl(url: string, quality: AudioQuality, signal?: AbortSignal): Promise<AudioStreamInfo> {
    const { platform, canonicalUrl } = detectPlatform(url);
    if (!AUDIO_QUALITIES.includes(quality)) {
      throw new ExtractionError(
        `quality must be one of: ${AUDIO_QUALITIES.join(', ')}`,
        ErrorCode.VALIDATION_INPUT_INVALID
      );
    }
    return this.run('audio_url', { url: canonicalUrl, platform, quality }, platform, signal);
  }

  async getPlaylistInfo(url: string, maxVideos: number, signal?: AbortSignal): Promise<PlaylistInfo> {
    const limit = this.options.playlistMaxVideos;
    if (!Number.isInteger(maxVideos) || maxVideos < 1 || maxVideos > limit) {
      throw new BatchError(`max_videos must be an integer between 1 and ${limit}`, ErrorCode.VALIDATION_INPUT_INVALID);
    }
    const target = url.trim();
    const platform = detectCollectionPlatform(target);
    return this.run('playlist', { url: target, maxVideos }, platform, signal);
  }

  cacheStats(): CacheStats {
    const entries = Object.values(this.caches).reduce((total, cache) => total + cache.size, 0);
    return { entries, ttlMs: this.options.cache.ttlMs };
  }

  /**
   * Stop background cache sweeps
   */
  close(): void {
    for (const cache of Object.values(this.caches)) {
      cache.stop();
    }
  }

  private async run<K extends OperationName>(
    operation: K,
    args: OperationArgs[K],
    platform: Platform | null,
    signal?: AbortSignal,
    cacheKey: object = args
  ): Promise<OperationPayloads[K]> {
    const cache: TtlCache<OperationPayloads[K]> = this.caches[operation];
    const key = fingerprint(operation, cacheKey);

    const cached = cache.get(key);
    if (cached !== undefined) {
      logger.debug('[MediaService] Cache hit', { operation, key });
      return cached;
    }

    const platformConfig = resolvePlatformConfig(platform, this.options.credentials);
    const timeoutMs = this.options.timeouts[operation];

    const result = await this.options.pool.run(
      ({ signal: taskSignal, remainingMs }) =>
        this.options.client.extract(operation, args, platformConfig, remainingMs(), taskSignal),
      { timeoutMs, label: operation, ...(signal && { signal }) }
    );

    if (!result.success) {
      throw result.error;
    }
    return cache.put(key, result.payload);
  }
}
