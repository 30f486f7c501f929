import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 3000,
    host: '0.0.0.0',
    env: 'development',
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  extraction: {
    ytdlpPath: 'yt-dlp',
    remoteYtdlpPath: 'yt-dlp',
    sshPath: 'ssh',
    ffmpegPath: 'ffmpeg',
    socketTimeoutSeconds: 30,
    sshConnectTimeoutSeconds: 10,
    maxConcurrentExtractions: 8,
    timeouts: {
      video_info: 60000,
      audio_url: 60000,
      search: 45000,
      playlist: 90000,
      transcript: 120000,
    },
  },
  cache: {
    ttlMs: 600000, // 10 minutes
    sweepIntervalMs: 60000,
  },
  batch: {
    maxUrls: 10,
    concurrency: 3,
    playlistMaxVideos: 50,
    playlistDefaultVideos: 20,
  },
  bilibili: {
    apiBaseUrl: 'https://api.bilibili.com',
    requestTimeoutMs: 30000,
    danmakuDefaultLimit: 200,
    danmakuMaxLimit: 1000,
  },
  credentials: {
    global: {},
    platforms: {},
  },
};
