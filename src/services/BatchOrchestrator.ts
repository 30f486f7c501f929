import pMap from 'p-map';
import { BatchError, ErrorCode, toToolError } from '../errors/index.js';
import { logger } from '../middleware/logging.js';
import type { BatchItemOutcome, BatchResult, PlaylistInfo, VideoInfo } from '../types/media.js';
import type { MediaService } from './MediaService.js';

export interface BatchOrchestratorOptions {
  /** Most URLs accepted in one batch */
  maxUrls: number;
  /** Default in-flight limit */
  concurrency: number;
}

export interface ResolvedPlaylist {
  playlist: PlaylistInfo;
  details: BatchResult<VideoInfo>;
}

/**
 * Label for a batch entry in its outcome. Entries come from parsed JSON and
 * may be anything, so this never throws.
 */
export function entryLabel(item: unknown): string {
  if (typeof item === 'string') {
    return item;
  }
  try {
    return JSON.stringify(item) ?? typeof item;
  } catch {
    return typeof item;
  }
}

/**
 * Batch Orchestrator
 *
 * Fans video-info requests out with bounded parallelism. Each item's failure
 * becomes that item's outcome; the batch itself only fails on invalid input.
 */
export class BatchOrchestrator {
  constructor(
    private readonly media: MediaService,
    private readonly options: BatchOrchestratorOptions
  ) {}

  async batch(urls: unknown, maxConcurrency = this.options.concurrency, signal?: AbortSignal): Promise<BatchResult<VideoInfo>> {
    if (!Array.isArray(urls) || urls.length === 0) {
      throw new BatchError('urls must be a non-empty list', ErrorCode.VALIDATION_INPUT_INVALID);
    }
    if (urls.length > this.options.maxUrls) {
      throw new BatchError(`Maximum ${this.options.maxUrls} URLs per batch`, ErrorCode.BATCH_LIMIT_EXCEEDED, {
        context: { service: 'BatchOrchestrator', metadata: { received: urls.length } },
      });
    }
    const items: unknown[] = urls;
    return this.fanOut(items, maxConcurrency, signal);
  }

  /**
   * Playlist listing plus full video info for each listed video
   */
  async resolvePlaylist(
    url: string,
    maxVideos: number,
    maxConcurrency = this.options.concurrency,
    signal?: AbortSignal
  ): Promise<ResolvedPlaylist> {
    const playlist = await this.media.getPlaylistInfo(url, maxVideos, signal);
    const memberUrls = playlist.videos.slice(0, maxVideos).map(video => video.url);
    if (memberUrls.length === 0) {
      return { playlist, details: { total: 0, succeeded: 0, failed: 0, results: [] } };
    }
    const details = await this.fanOut(memberUrls, maxConcurrency, signal);
    return { playlist, details };
  }

  private async fanOut(items: unknown[], maxConcurrency: number, signal?: AbortSignal): Promise<BatchResult<VideoInfo>> {
    const concurrency = Math.max(1, Math.trunc(maxConcurrency) || 1);
    const startedAt = Date.now();

    logger.info('[BatchOrchestrator] Starting batch', { total: items.length, concurrency });

    const results = await pMap(
      items,
      async (item): Promise<BatchItemOutcome<VideoInfo>> => {
        const url = entryLabel(item);
        try {
          if (typeof item !== 'string') {
            throw new BatchError(`Batch entry must be a string, got ${typeof item}`, ErrorCode.VALIDATION_INPUT_INVALID);
          }
          const data = await this.media.getVideoInfo(item, signal);
          return { url, status: 'ok', data };
        } catch (error) {
          const toolError = toToolError(error);
          logger.warn('[BatchOrchestrator] Batch item failed', { url, ...toolError });
          return { url, status: 'error', error: toolError };
        }
      },
      { concurrency }
    );

    const succeeded = results.filter(result => result.status === 'ok').length;

    logger.info('[BatchOrchestrator] Batch complete', {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      durationMs: Date.now() - startedAt,
    });

    return {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
  }
}
