/**
 * Media Domain Types
 *
 * Normalized records returned by the extraction operations.
 */

import type { ErrorType } from '../errors/ApplicationError.js';

export const PLATFORMS = ['youtube', 'tiktok', 'douyin', 'bilibili'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const OPERATIONS = ['video_info', 'transcript', 'search', 'audio_url', 'playlist'] as const;

export type OperationName = (typeof OPERATIONS)[number];

export interface PlatformMatch {
  platform: Platform;
  canonicalUrl: string;
  /** null for short links that only resolve upstream */
  videoId: string | null;
}

/**
 * Effective extractor settings for one platform
 */
export interface PlatformConfig {
  platform: Platform | null;
  proxy: string | null;
  cookieSource: string | null;
  cookieFile: string | null;
  remoteHost: string | null;
}

export interface MediaFormat {
  formatId: string;
  ext: string | null;
  url: string | null;
  resolution: string | null;
  width: number | null;
  height: number | null;
  fps: number | null;
  vcodec: string | null;
  acodec: string | null;
  /** Audio bitrate (kbps) */
  abr: number | null;
  /** Total bitrate (kbps) */
  tbr: number | null;
  filesize: number | null;
  formatNote: string | null;
}

export interface VideoInfo {
  id: string;
  title: string;
  url: string;
  platform: Platform;
  uploader: string | null;
  uploaderUrl: string | null;
  duration: number | null;
  durationString: string | null;
  description: string | null;
  thumbnail: string | null;
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  uploadDate: string | null;
  bestVideo: MediaFormat | null;
  smallestVideo: MediaFormat | null;
  audioOnly: MediaFormat | null;
  subtitleSummary: string | null;
}

export interface TranscriptSegment {
  /** Seconds from start */
  start: number;
  end: number;
  text: string;
}

export type TranscriptFormat = 'text' | 'segments' | 'vtt';

export interface TranscriptResult {
  videoId: string;
  platform: Platform;
  language: string;
  isAutoGenerated: boolean;
  format: TranscriptFormat;
  fullText: string;
  segments?: TranscriptSegment[];
  vtt?: string;
}

export interface SearchResult {
  id: string;
  title: string;
  url: string;
  duration: number | null;
  channel: string | null;
  viewCount: number | null;
  thumbnail: string | null;
  uploadDate: string | null;
}

export type AudioQuality = 'best' | 'smallest';

export interface AudioStreamInfo {
  videoId: string;
  title: string;
  platform: Platform;
  quality: AudioQuality;
  format: MediaFormat;
  duration: number | null;
}

export interface PlaylistEntry {
  id: string;
  title: string | null;
  url: string;
  duration: number | null;
}

export interface PlaylistInfo {
  playlistId: string | null;
  title: string | null;
  channel: string | null;
  url: string;
  videoCount: number;
  videos: PlaylistEntry[];
}

export type BatchItemOutcome<T> =
  | { url: string; status: 'ok'; data: T }
  | { url: string; status: 'error'; error: { error_type: ErrorType; message: string } };

export interface BatchResult<T> {
  total: number;
  succeeded: number;
  failed: number;
  results: BatchItemOutcome<T>[];
}

export interface BilibiliStats {
  views: number;
  likes: number;
  danmaku: number;
  replies: number;
}

export interface DanmakuResult {
  bvid: string;
  /** Part id the comments belong to */
  cid: number;
  title: string;
  description: string;
  owner: string | null;
  duration: number;
  stats: BilibiliStats;
  comments: string[];
  /** Title, description and comments as one plain-text block */
  text: string;
}
