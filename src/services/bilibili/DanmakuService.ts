import type { CredentialEnvironment } from '../../config/types.js';
import { ErrorCode, ExtractionError, InvalidUrlError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import type { DanmakuResult } from '../../types/media.js';
import { fingerprint } from '../cache/fingerprint.js';
import { TtlCache, type TtlCacheOptions } from '../cache/TtlCache.js';
import { resolvePlatformConfig } from '../extraction/platformConfigResolver.js';
import { detectPlatform } from '../platforms/platformDetector.js';
import type { BilibiliClient, BilibiliView } from './BilibiliClient.js';

export interface DanmakuServiceOptions {
  client: BilibiliClient;
  credentials: CredentialEnvironment;
  cache: TtlCacheOptions;
  maxLimit: number;
}

/**
 * Title, description and comments as one block of plain text
 */
export function formatDanmakuText(view: Pick<BilibiliView, 'title' | 'description'>, comments: string[]): string {
  const lines = [`[Title] ${view.title}`, '', `[Description] ${view.description || '(no description)'}`];
  if (comments.length > 0) {
    lines.push('', `[Danmaku (${comments.length})]`, comments.join(' | '));
  }
  return lines.join('\n');
}

/**
 * Danmaku Service
 *
 * Stats and danmaku of a Bilibili video, fetched from the web API with the
 * platform's proxy and cached like extraction results.
 */
export class DanmakuService {
  private readonly cache: TtlCache<DanmakuResult>;

  constructor(private readonly options: DanmakuServiceOptions) {
    this.cache = new TtlCache<DanmakuResult>(options.cache);
  }

  async getDanmaku(url: string, limit: number, signal?: AbortSignal): Promise<DanmakuResult> {
    const { platform, videoId } = detectPlatform(url);
    if (platform !== 'bilibili') {
      throw new InvalidUrlError(url, `Danmaku is only available for Bilibili videos: ${url.trim()}`);
    }
    if (!videoId) {
      throw new InvalidUrlError(url, `Danmaku needs a bilibili.com/video/BV... URL: ${url.trim()}`);
    }
    const maxLimit = this.options.maxLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > maxLimit) {
      throw new ExtractionError(`limit must be an integer between 1 and ${maxLimit}`, ErrorCode.VALIDATION_INPUT_INVALID);
    }

    const key = fingerprint('danmaku', { bvid: videoId, limit });
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      logger.debug('[DanmakuService] Cache hit', { bvid: videoId });
      return cached;
    }

    const { proxy } = resolvePlatformConfig('bilibili', this.options.credentials);
    const requestOptions = { proxy, ...(signal && { signal }) };

    const view = await this.options.client.getView(videoId, requestOptions);
    const comments = await this.options.client.getDanmaku(view.cid, limit, requestOptions);

    logger.debug('[DanmakuService] Fetched danmaku', { bvid: view.bvid, cid: view.cid, comments: comments.length });

    return this.cache.put(key, { ...view, comments, text: formatDanmakuText(view, comments) });
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  close(): void {
    this.cache.stop();
  }
}
