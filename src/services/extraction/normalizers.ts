/**
 * Extractor Output Normalizers
 *
 * zod schemas for the parts of yt-dlp's JSON we read, and the functions that
 * turn validated documents into the service's records.
 */

import { z } from 'zod';
import { LIMITS } from '../../config/constants.js';
import { ErrorCode, ExtractionError } from '../../errors/index.js';
import type {
  AudioQuality,
  AudioStreamInfo,
  MediaFormat,
  Platform,
  PlaylistEntry,
  PlaylistInfo,
  SearchResult,
  TranscriptFormat,
  TranscriptResult,
  VideoInfo,
} from '../../types/media.js';
import { parseSubtitles, segmentsToText } from '../transcript/subtitleParser.js';
import type { CollectedFile } from './Extractor.js';

const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();

const rawFormatSchema = z
  .object({
    format_id: optionalString,
    ext: optionalString,
    url: optionalString,
    resolution: optionalString,
    width: optionalNumber,
    height: optionalNumber,
    fps: optionalNumber,
    vcodec: optionalString,
    acodec: optionalString,
    abr: optionalNumber,
    tbr: optionalNumber,
    filesize: optionalNumber,
    filesize_approx: optionalNumber,
    format_note: optionalString,
  })
  .passthrough();

const rawSubtitleTrackSchema = z
  .object({
    ext: optionalString,
    url: optionalString,
    data: optionalString,
  })
  .passthrough();

export const rawVideoSchema = z
  .object({
    id: z.string().min(1),
    title: optionalString,
    webpage_url: optionalString,
    uploader: optionalString,
    uploader_url: optionalString,
    channel: optionalString,
    duration: optionalNumber,
    description: optionalString,
    thumbnail: optionalString,
    view_count: optionalNumber,
    like_count: optionalNumber,
    comment_count: optionalNumber,
    upload_date: optionalString,
    tags: z.array(z.string()).nullish(),
    formats: z.array(rawFormatSchema).nullish(),
    subtitles: z.record(z.array(rawSubtitleTrackSchema)).nullish(),
    automatic_captions: z.record(z.array(rawSubtitleTrackSchema)).nullish(),
    requested_subtitles: z.record(rawSubtitleTrackSchema.nullable()).nullish(),
  })
  .passthrough();

const rawEntrySchema = z
  .object({
    id: optionalString,
    title: optionalString,
    url: optionalString,
    webpage_url: optionalString,
    duration: optionalNumber,
    uploader: optionalString,
    channel: optionalString,
    view_count: optionalNumber,
    thumbnail: optionalString,
    thumbnails: z.array(z.object({ url: optionalString }).passthrough()).nullish(),
    upload_date: optionalString,
  })
  .passthrough();

export const rawCollectionSchema = z
  .object({
    id: optionalString,
    title: optionalString,
    uploader: optionalString,
    channel: optionalString,
    playlist_count: optionalNumber,
    webpage_url: optionalString,
    entries: z.array(rawEntrySchema.nullable()).nullish(),
  })
  .passthrough();

export type RawFormat = z.infer<typeof rawFormatSchema>;
export type RawVideo = z.infer<typeof rawVideoSchema>;
export type RawEntry = z.infer<typeof rawEntrySchema>;
export type RawCollection = z.infer<typeof rawCollectionSchema>;

// ============================================
// Shared helpers
// ============================================

/**
 * Seconds to M:SS or H:MM:SS
 */
export function formatDuration(seconds: number | null): string | null {
  if (seconds === null) {
    return null;
  }
  const total = Math.trunc(seconds);
  const s = total % 60;
  const m = Math.trunc(total / 60) % 60;
  const h = Math.trunc(total / 3600);
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${ss}` : `${m}:${ss}`;
}

function wholeSeconds(duration: number | null | undefined): number | null {
  return duration ? Math.trunc(duration) : null;
}

function hasVideo(format: RawFormat): boolean {
  return format.vcodec != null && format.vcodec !== 'none';
}

function hasAudio(format: RawFormat): boolean {
  return format.acodec != null && format.acodec !== 'none';
}

function toMediaFormat(format: RawFormat): MediaFormat | null {
  if (!format.format_id || !format.ext) {
    return null;
  }
  const width = format.width ?? null;
  const height = format.height ?? null;
  return {
    formatId: format.format_id,
    ext: format.ext,
    url: format.url ?? null,
    resolution: format.resolution ?? (width && height ? `${width}x${height}` : null),
    width,
    height,
    fps: format.fps ?? null,
    vcodec: format.vcodec ?? null,
    acodec: format.acodec ?? null,
    abr: format.abr ?? null,
    tbr: format.tbr ?? null,
    filesize: format.filesize ?? format.filesize_approx ?? null,
    formatNote: format.format_note ?? null,
  };
}

/**
 * First element with the strictly greatest score; ties keep the earlier one
 */
function pickBest<T>(items: T[], score: (item: T) => number): T | undefined {
  let best: T | undefined;
  let bestScore = -Infinity;
  for (const item of items) {
    const value = score(item);
    if (best === undefined || value > bestScore) {
      best = item;
      bestScore = value;
    }
  }
  return best;
}

// ============================================
// Video info
// ============================================

export interface SelectedFormats {
  bestVideo: MediaFormat | null;
  smallestVideo: MediaFormat | null;
  audioOnly: MediaFormat | null;
}

/**
 * Highest video, lowest-size video (tbr as fallback) and highest-bitrate audio-only format
 */
export function selectFormats(formats: RawFormat[]): SelectedFormats {
  const videoFormats = formats.filter(hasVideo);
  const audioOnlyFormats = formats.filter(format => hasAudio(format) && !hasVideo(format));

  const best = pickBest(videoFormats, format => format.height ?? 0);
  const smallest = pickBest(videoFormats, format => -(format.filesize || format.tbr || Infinity));
  const audio = pickBest(audioOnlyFormats, format => format.abr || format.tbr || 0);

  return {
    bestVideo: best ? toMediaFormat(best) : null,
    smallestVideo: smallest ? toMediaFormat(smallest) : null,
    audioOnly: audio ? toMediaFormat(audio) : null,
  };
}

function captionText(track: z.infer<typeof rawSubtitleTrackSchema> | null | undefined): string | null {
  const data = track?.data ?? track?.url;
  return typeof data === 'string' && data.length > 10 ? data : null;
}

/**
 * Short text summary of the video's spoken or written content
 */
export function extractSubtitleSummary(raw: RawVideo, platform: Platform): string | null {
  if (platform === 'tiktok' || platform === 'douyin') {
    if (raw.tags && raw.tags.length > 0) {
      return raw.tags.join(', ');
    }
    return raw.description ? raw.description.substring(0, LIMITS.DESCRIPTION_SUMMARY_CHARS) : null;
  }

  const automatic = raw.automatic_captions ?? {};
  for (const lang of ['en', 'en-orig']) {
    for (const track of automatic[lang] ?? []) {
      const text = captionText(track);
      if (text) {
        return text.substring(0, LIMITS.SUBTITLE_SUMMARY_CHARS);
      }
    }
  }

  for (const track of Object.values(raw.requested_subtitles ?? {})) {
    const data = track?.data;
    if (data && data.length > 10) {
      return data.substring(0, LIMITS.SUBTITLE_SUMMARY_CHARS);
    }
  }
  return null;
}

export function normalizeVideoInfo(raw: RawVideo, platform: Platform): VideoInfo {
  const duration = wholeSeconds(raw.duration);
  return {
    id: raw.id,
    title: raw.title ?? '',
    url: raw.webpage_url ?? '',
    platform,
    uploader: raw.uploader ?? raw.channel ?? null,
    uploaderUrl: raw.uploader_url ?? null,
    duration,
    durationString: formatDuration(duration),
    description: raw.description ?? null,
    thumbnail: raw.thumbnail ?? null,
    viewCount: raw.view_count ?? null,
    likeCount: raw.like_count ?? null,
    commentCount: raw.comment_count ?? null,
    uploadDate: raw.upload_date ?? null,
    ...selectFormats(raw.formats ?? []),
    subtitleSummary: extractSubtitleSummary(raw, platform),
  };
}

// ============================================
// Search
// ============================================

function youtubeWatchUrl(id: string): string {
  return `https://www.youtube.com/watch?v=${id}`;
}

export function normalizeSearchResults(raw: RawCollection): SearchResult[] {
  const results: SearchResult[] = [];
  for (const entry of raw.entries ?? []) {
    if (!entry?.id || !entry.title) {
      continue;
    }
    results.push({
      id: entry.id,
      title: entry.title,
      url: entry.url ?? youtubeWatchUrl(entry.id),
      duration: wholeSeconds(entry.duration),
      channel: entry.uploader ?? entry.channel ?? null,
      viewCount: entry.view_count ?? null,
      thumbnail: entry.thumbnail ?? entry.thumbnails?.[0]?.url ?? null,
      uploadDate: entry.upload_date ?? null,
    });
  }
  return results;
}

// ============================================
// Audio
// ============================================

export function selectAudioStream(raw: RawVideo, platform: Platform, quality: AudioQuality): AudioStreamInfo {
  const candidates = (raw.formats ?? []).filter(format => hasAudio(format) && !hasVideo(format) && format.url);

  const chosen =
    quality === 'best'
      ? pickBest(candidates, format => (format.abr || format.tbr || 0) + (format.ext === 'm4a' ? 0.001 : 0))
      : pickBest(candidates, format => -(format.filesize || format.filesize_approx || Infinity));

  const format = chosen ? toMediaFormat(chosen) : null;
  if (!format) {
    throw new ExtractionError(`No audio-only format available for ${raw.id}`, ErrorCode.EXTRACTION_NO_AUDIO, {
      context: { operation: 'audio_url', target: raw.id },
    });
  }

  return {
    videoId: raw.id,
    title: raw.title ?? '',
    platform,
    quality,
    format,
    duration: wholeSeconds(raw.duration),
  };
}

// ============================================
// Playlist
// ============================================

export function normalizePlaylist(raw: RawCollection, url: string, maxVideos: number): PlaylistInfo {
  const videos: PlaylistEntry[] = [];
  for (const entry of (raw.entries ?? []).slice(0, maxVideos)) {
    if (!entry?.id) {
      continue;
    }
    videos.push({
      id: entry.id,
      title: entry.title ?? null,
      url: entry.url ?? entry.webpage_url ?? youtubeWatchUrl(entry.id),
      duration: wholeSeconds(entry.duration),
    });
  }

  return {
    playlistId: raw.id ?? null,
    title: raw.title ?? null,
    channel: raw.uploader ?? raw.channel ?? null,
    url: raw.webpage_url ?? url,
    videoCount: raw.playlist_count ?? videos.length,
    videos,
  };
}

// ============================================
// Transcript
// ============================================

const SUBTITLE_EXTENSIONS = ['.vtt', '.srt'];

/**
 * Language tag of `<id>.<lang>.<ext>`
 */
function fileLanguage(name: string): string {
  const parts = name.split('.');
  return parts.length >= 3 ? (parts[parts.length - 2] ?? '') : '';
}

/**
 * Requested language, then its `-orig` variant, then any subtitle file
 */
export function pickSubtitleFile(files: CollectedFile[], lang: string): CollectedFile | undefined {
  const subtitles = files.filter(file => SUBTITLE_EXTENSIONS.some(ext => file.name.endsWith(ext)));
  return (
    subtitles.find(file => fileLanguage(file.name) === lang) ??
    subtitles.find(file => fileLanguage(file.name) === `${lang}-orig`) ??
    subtitles[0]
  );
}

export interface TranscriptRequest {
  platform: Platform;
  lang: string;
  format: TranscriptFormat;
}

export function buildTranscript(raw: RawVideo, files: CollectedFile[], request: TranscriptRequest): TranscriptResult {
  const file = pickSubtitleFile(files, request.lang);
  if (!file) {
    throw new ExtractionError(
      `No subtitles available for ${raw.id} in "${request.lang}"`,
      ErrorCode.EXTRACTION_NO_SUBTITLES,
      { context: { operation: 'transcript', target: raw.id } }
    );
  }

  const language = fileLanguage(file.name) || request.lang;
  const manual = raw.subtitles?.[language] ?? [];
  const segments = parseSubtitles(file.content);

  return {
    videoId: raw.id,
    platform: request.platform,
    language,
    isAutoGenerated: manual.length === 0,
    format: request.format,
    fullText: segmentsToText(segments),
    ...(request.format === 'segments' && { segments }),
    ...(request.format === 'vtt' && { vtt: file.content }),
  };
}
