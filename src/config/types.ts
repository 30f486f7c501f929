import type { OperationName, Platform } from '../types/media.js';

export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface ExtractionConfig {
  /** yt-dlp binary used for local extraction */
  ytdlpPath: string;
  /** yt-dlp binary on remote hosts */
  remoteYtdlpPath: string;
  sshPath: string;
  ffmpegPath: string;
  /** Passed to yt-dlp as --socket-timeout */
  socketTimeoutSeconds: number;
  /** Passed to ssh as -o ConnectTimeout */
  sshConnectTimeoutSeconds: number;
  /** Simultaneous subprocess / ssh sessions */
  maxConcurrentExtractions: number;
  timeouts: Record<OperationName, number>; // milliseconds
}

export interface CacheConfig {
  ttlMs: number;
  sweepIntervalMs: number;
}

export interface BatchConfig {
  maxUrls: number;
  concurrency: number;
  playlistMaxVideos: number;
  playlistDefaultVideos: number;
}

export interface BilibiliConfig {
  /** Web API used for video stats and danmaku */
  apiBaseUrl: string;
  /** SESSDATA cookie sent with API requests */
  sessdata?: string;
  requestTimeoutMs: number;
  danmakuDefaultLimit: number;
  danmakuMaxLimit: number;
}

export interface CredentialSettings {
  proxy?: string;
  cookieSource?: string;
  cookieFile?: string;
  remoteHost?: string;
}

/**
 * Global settings plus per-platform overrides
 */
export interface CredentialEnvironment {
  global: CredentialSettings;
  platforms: Partial<Record<Platform, CredentialSettings>>;
}

export interface AppConfig {
  server: ServerConfig;
  logging: LoggingConfig;
  extraction: ExtractionConfig;
  cache: CacheConfig;
  batch: BatchConfig;
  bilibili: BilibiliConfig;
  credentials: CredentialEnvironment;
}
