import type { BatchConfig, BilibiliConfig } from '../config/types.js';
import { LIMITS } from '../config/constants.js';
import type { BatchOrchestrator } from '../services/BatchOrchestrator.js';
import type { DanmakuService } from '../services/bilibili/DanmakuService.js';
import type { HealthCheckService } from '../services/HealthCheckService.js';
import type { MediaService } from '../services/MediaService.js';
import {
  batchGetInfoArgs,
  getAudioUrlArgs,
  getDanmakuArgs,
  getPlaylistInfoArgs,
  getTranscriptArgs,
  getVideoInfoArgs,
  noArgs,
  searchVideosArgs,
} from '../validation/toolSchemas.js';
import { defineTool, ToolRegistry, type ParameterDescriptor } from './toolRegistry.js';

export { ToolRegistry, type Tool, type ToolDescriptor } from './toolRegistry.js';

const URL_PARAMETER: ParameterDescriptor = {
  type: 'string',
  description: 'Video URL (YouTube, TikTok, Douyin or Bilibili)',
  required: true,
};

export interface ToolDependencies {
  media: MediaService;
  batch: BatchOrchestrator;
  health: HealthCheckService;
  danmaku: DanmakuService;
  batchConfig: BatchConfig;
  bilibiliConfig: BilibiliConfig;
  /** Pool size; no batch runs more extractions than this at once */
  maxConcurrentExtractions: number;
}

export function createTools({
  media,
  batch,
  health,
  danmaku,
  batchConfig,
  bilibiliConfig,
  maxConcurrentExtractions,
}: ToolDependencies): ToolRegistry {
  const { danmakuMaxLimit, danmakuDefaultLimit } = bilibiliConfig;

  return new ToolRegistry([
    defineTool({
      name: 'get_video_info',
      description: 'Metadata, selected formats and a subtitle summary for one video',
      parameters: { url: URL_PARAMETER },
      failureType: 'ExtractionError',
      schema: getVideoInfoArgs,
      handler: ({ url }, { signal }) => media.getVideoInfo(url, signal),
    }),

    defineTool({
      name: 'get_transcript',
      description: 'Subtitles of a video as plain text, timed segments or raw VTT',
      parameters: {
        url: URL_PARAMETER,
        lang: { type: 'string', description: 'Subtitle language code', required: false, default: 'en' },
        format: {
          type: 'string',
          description: 'Output shape',
          required: false,
          default: 'text',
          enum: ['text', 'segments', 'vtt'],
        },
      },
      failureType: 'ExtractionError',
      schema: getTranscriptArgs,
      handler: ({ url, lang, format }, { signal }) => media.getTranscript(url, lang, format, signal),
    }),

    defineTool({
      name: 'search_videos',
      description: 'Search YouTube',
      parameters: {
        query: { type: 'string', description: 'Search terms', required: true },
        max_results: {
          type: 'integer',
          description: `Number of results (1-${LIMITS.SEARCH_MAX_RESULTS})`,
          required: false,
          default: LIMITS.SEARCH_DEFAULT_RESULTS,
        },
      },
      failureType: 'SearchError',
      schema: searchVideosArgs,
      handler: ({ query, max_results }, { signal }) => media.searchVideos(query, max_results, signal),
    }),

    defineTool({
      name: 'get_audio_url',
      description: 'Direct URL of an audio-only stream',
      parameters: {
        url: URL_PARAMETER,
        quality: {
          type: 'string',
          description: 'Highest bitrate or smallest file',
          required: false,
          default: 'best',
          enum: ['best', 'smallest'],
        },
      },
      failureType: 'ExtractionError',
      schema: getAudioUrlArgs,
      handler: ({ url, quality }, { signal }) => media.getAudioUrl(url, quality, signal),
    }),

    defineTool({
      name: 'get_playlist_info',
      description: 'Playlist or channel listing, optionally with full info for each video',
      parameters: {
        url: { type: 'string', description: 'Playlist or channel URL', required: true },
        max_videos: {
          type: 'integer',
          description: `Videos to list (1-${batchConfig.playlistMaxVideos})`,
          required: false,
          default: Math.min(batchConfig.playlistDefaultVideos, batchConfig.playlistMaxVideos),
        },
        resolve_details: {
          type: 'boolean',
          description: 'Also fetch video info for every listed video',
          required: false,
          default: false,
        },
      },
      failureType: 'BatchError',
      schema: getPlaylistInfoArgs(batchConfig.playlistMaxVideos, batchConfig.playlistDefaultVideos),
      handler: async ({ url, max_videos, resolve_details }, { signal }) => {
        if (!resolve_details) {
          return media.getPlaylistInfo(url, max_videos, signal);
        }
        const { playlist, details } = await batch.resolvePlaylist(url, max_videos, batchConfig.concurrency, signal);
        return { ...playlist, details };
      },
    }),

    defineTool({
      name: 'batch_get_info',
      description: `Video info for up to ${batchConfig.maxUrls} URLs; each URL succeeds or fails on its own`,
      parameters: {
        urls: { type: 'array', description: 'Video URLs', required: true },
        max_concurrency: {
          type: 'integer',
          description: `Extractions in flight at once (1-${maxConcurrentExtractions})`,
          required: false,
          default: Math.min(batchConfig.concurrency, maxConcurrentExtractions),
        },
      },
      failureType: 'BatchError',
      schema: batchGetInfoArgs(maxConcurrentExtractions),
      handler: ({ urls, max_concurrency }, { signal }) =>
        batch.batch(urls, max_concurrency ?? batchConfig.concurrency, signal),
    }),

    defineTool({
      name: 'get_danmaku',
      description: 'Stats and danmaku (overlay comments) of a Bilibili video, with a plain-text digest',
      parameters: {
        url: { type: 'string', description: 'Bilibili video URL (bilibili.com/video/BV...)', required: true },
        limit: {
          type: 'integer',
          description: `Most danmaku to return (1-${danmakuMaxLimit})`,
          required: false,
          default: Math.min(danmakuDefaultLimit, danmakuMaxLimit),
        },
      },
      failureType: 'ExtractionError',
      schema: getDanmakuArgs(danmakuMaxLimit, danmakuDefaultLimit),
      handler: ({ url, limit }, { signal }) => danmaku.getDanmaku(url, limit, signal),
    }),

    defineTool({
      name: 'health_check',
      description: 'Extractor availability, remote hosts, cache and pool state',
      parameters: {},
      failureType: 'UnexpectedError',
      schema: noArgs,
      handler: () => health.check(),
    }),
  ]);
}
