import dotenv from 'dotenv';
import {
  AppConfig,
  BatchConfig,
  BilibiliConfig,
  CacheConfig,
  CredentialEnvironment,
  CredentialSettings,
  ExtractionConfig,
  ServerConfig,
} from './types.js';
import { defaultConfig } from './defaults.js';
import { ENV } from './constants.js';
import { ConfigurationError } from '../errors/index.js';
import { PLATFORMS } from '../types/media.js';
import { deepFreeze } from '../utils/deepFreeze.js';

type Env = Record<string, string | undefined>;

/**
 * Build an immutable configuration snapshot from an environment map
 */
export function buildConfig(env: Env): AppConfig {
  return new EnvReader(env).load();
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = buildConfig(process.env);
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  getExtractionConfig(): ExtractionConfig {
    return this.config.extraction;
  }

  getCacheConfig(): CacheConfig {
    return this.config.cache;
  }

  getBatchConfig(): BatchConfig {
    return this.config.batch;
  }

  getBilibiliConfig(): BilibiliConfig {
    return this.config.bilibili;
  }

  getCredentials(): CredentialEnvironment {
    return this.config.credentials;
  }

  reload(): void {
    dotenv.config();
    this.config = buildConfig(process.env);
  }
}

class EnvReader {
  constructor(private readonly env: Env) {}

  load(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);
    const prefix = ENV.PREFIX;

    // Server configuration
    config.server.port = this.getNumber('PORT', config.server.port);
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, ['development', 'production', 'test']);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, ['error', 'warn', 'info', 'debug']);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean('LOG_CONSOLE_ENABLED', config.logging.console.enabled);

    // Extraction
    const extraction = config.extraction;
    extraction.ytdlpPath = this.getString(`${prefix}YTDLP_PATH`, extraction.ytdlpPath);
    extraction.remoteYtdlpPath = this.getString(`${prefix}REMOTE_YTDLP_PATH`, extraction.remoteYtdlpPath);
    extraction.sshPath = this.getString(`${prefix}SSH_PATH`, extraction.sshPath);
    extraction.ffmpegPath = this.getString(`${prefix}FFMPEG_PATH`, extraction.ffmpegPath);
    extraction.socketTimeoutSeconds = this.getPositive(`${prefix}SOCKET_TIMEOUT`, extraction.socketTimeoutSeconds);
    extraction.maxConcurrentExtractions = this.getPositive(
      `${prefix}MAX_CONCURRENT_EXTRACTIONS`,
      extraction.maxConcurrentExtractions
    );

    // Cache
    config.cache.ttlMs = this.getPositive(`${prefix}CACHE_TTL_MS`, config.cache.ttlMs);

    // Batch
    config.batch.maxUrls = this.getPositive(`${prefix}BATCH_MAX_URLS`, config.batch.maxUrls);
    config.batch.concurrency = this.getPositive(`${prefix}BATCH_CONCURRENCY`, config.batch.concurrency);

    // Bilibili web API
    config.bilibili.apiBaseUrl = this.getString(`${prefix}BILIBILI_API_URL`, config.bilibili.apiBaseUrl);
    const sessdata = this.getOptional(`${prefix}BILIBILI_SESSDATA`);
    if (sessdata) config.bilibili.sessdata = sessdata;
    config.bilibili.danmakuMaxLimit = this.getPositive(`${prefix}DANMAKU_MAX_LIMIT`, config.bilibili.danmakuMaxLimit);

    // Credentials: global, then one block per platform
    config.credentials.global = this.getCredentials(prefix);
    for (const platform of PLATFORMS) {
      const settings = this.getCredentials(`${prefix}${platform.toUpperCase()}_`);
      if (Object.keys(settings).length > 0) {
        config.credentials.platforms[platform] = settings;
      }
    }

    return deepFreeze(config);
  }

  private getCredentials(prefix: string): CredentialSettings {
    const settings: CredentialSettings = {};
    const suffixes = ENV.CREDENTIAL_SUFFIXES;
    const proxy = this.getOptional(`${prefix}${suffixes.proxy}`);
    const cookieSource = this.getOptional(`${prefix}${suffixes.cookieSource}`);
    const cookieFile = this.getOptional(`${prefix}${suffixes.cookieFile}`);
    const remoteHost = this.getOptional(`${prefix}${suffixes.remoteHost}`);
    if (proxy) settings.proxy = proxy;
    if (cookieSource) settings.cookieSource = cookieSource;
    if (cookieFile) settings.cookieFile = cookieFile;
    if (remoteHost) settings.remoteHost = remoteHost;
    return settings;
  }

  /**
   * Trimmed value, with blank treated as unset
   */
  private getOptional(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }

  private getString(key: string, defaultValue: string): string {
    return this.getOptional(key) ?? defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.getOptional(key);
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(`Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getPositive(key: string, defaultValue: number): number {
    const parsed = this.getNumber(key, defaultValue);
    if (parsed <= 0) {
      throw new ConfigurationError(`Environment variable ${key} must be greater than zero`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.getOptional(key);
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.getOptional(key);
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(`Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }
}
