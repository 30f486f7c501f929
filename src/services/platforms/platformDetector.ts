import { InvalidUrlError } from '../../errors/index.js';
import type { Platform, PlatformMatch } from '../../types/media.js';

interface UrlPattern {
  platform: Platform;
  /** Named group `id` when the URL carries the video ID */
  regex: RegExp;
}

const PATTERNS: readonly UrlPattern[] = [
  // YouTube
  { platform: 'youtube', regex: /(?:https?:\/\/)?(?:www\.)?youtube\.com\/watch\?.*v=(?<id>[a-zA-Z0-9_-]{11})/ },
  { platform: 'youtube', regex: /(?:https?:\/\/)?youtu\.be\/(?<id>[a-zA-Z0-9_-]{11})/ },
  { platform: 'youtube', regex: /(?:https?:\/\/)?(?:www\.)?youtube\.com\/shorts\/(?<id>[a-zA-Z0-9_-]{11})/ },
  { platform: 'youtube', regex: /(?:https?:\/\/)?(?:www\.)?youtube\.com\/embed\/(?<id>[a-zA-Z0-9_-]{11})/ },
  { platform: 'youtube', regex: /(?:https?:\/\/)?m\.youtube\.com\/watch\?.*v=(?<id>[a-zA-Z0-9_-]{11})/ },
  // TikTok
  { platform: 'tiktok', regex: /(?:https?:\/\/)?(?:www\.)?tiktok\.com\/@[^/]+\/video\/(?<id>\d+)/ },
  { platform: 'tiktok', regex: /(?:https?:\/\/)?vm\.tiktok\.com\/[a-zA-Z0-9]+/ },
  // Douyin
  { platform: 'douyin', regex: /(?:https?:\/\/)?(?:www\.)?douyin\.com\/video\/(?<id>\d+)/ },
  { platform: 'douyin', regex: /(?:https?:\/\/)?(?:www\.)?douyin\.com\/user\/[^?]+\?.*modal_id=(?<id>\d+)/ },
  { platform: 'douyin', regex: /(?:https?:\/\/)?v\.douyin\.com\/[a-zA-Z0-9]+/ },
  // Bilibili
  { platform: 'bilibili', regex: /(?:https?:\/\/)?(?:www\.|m\.)?bilibili\.com\/video\/(?<id>BV[a-zA-Z0-9]+)/ },
  { platform: 'bilibili', regex: /(?:https?:\/\/)?b23\.tv\/[a-zA-Z0-9]+/ },
];

const HOST_PLATFORMS: ReadonlyArray<[RegExp, Platform]> = [
  [/(^|\.)youtube\.com$|^youtu\.be$/, 'youtube'],
  [/(^|\.)tiktok\.com$/, 'tiktok'],
  [/(^|\.)douyin\.com$/, 'douyin'],
  [/(^|\.)bilibili\.com$|^b23\.tv$/, 'bilibili'],
];

function canonicalize(platform: Platform, videoId: string | null, url: string): string {
  if (!videoId) {
    return url;
  }
  switch (platform) {
    case 'youtube':
      return `https://www.youtube.com/watch?v=${videoId}`;
    case 'douyin':
      return `https://www.douyin.com/video/${videoId}`;
    case 'bilibili':
      return `https://www.bilibili.com/video/${videoId}`;
    case 'tiktok':
      return url;
  }
}

/**
 * Recognize a single-video URL
 *
 * @throws InvalidUrlError when no supported platform matches
 */
export function detectPlatform(url: string): PlatformMatch {
  const stripped = url.trim();
  if (!stripped) {
    throw new InvalidUrlError(url, 'URL must be a non-empty string');
  }

  for (const { platform, regex } of PATTERNS) {
    const match = regex.exec(stripped);
    if (match) {
      const videoId = match.groups?.id ?? null;
      return { platform, videoId, canonicalUrl: canonicalize(platform, videoId, stripped) };
    }
  }

  throw new InvalidUrlError(stripped, `Unsupported or invalid URL: ${stripped}`);
}

/**
 * Accept any http(s) URL for collection targets (playlists, channels).
 * Returns the platform by host, or null for sites without their own settings.
 */
export function detectCollectionPlatform(url: string): Platform | null {
  const stripped = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(stripped);
  } catch {
    throw new InvalidUrlError(stripped, `Invalid playlist URL: ${stripped}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(stripped, `Playlist URL must use http or https: ${stripped}`);
  }

  const host = parsed.hostname.toLowerCase();
  for (const [regex, platform] of HOST_PLATFORMS) {
    if (regex.test(host)) {
      return platform;
    }
  }
  return null;
}
