import type { AxiosAdapter } from 'axios';
import type { AppConfig } from './config/types.js';
import { BatchOrchestrator } from './services/BatchOrchestrator.js';
import { HealthCheckService } from './services/HealthCheckService.js';
import { BilibiliClient } from './services/bilibili/BilibiliClient.js';
import { DanmakuService } from './services/bilibili/DanmakuService.js';
import { MediaService } from './services/MediaService.js';
import { ExtractionClient } from './services/extraction/ExtractionClient.js';
import { ExtractionPool } from './services/extraction/ExtractionPool.js';
import { LocalProcessExtractor, RemoteExtractor } from './services/extraction/Extractor.js';
import { runProcess, type ProcessRunner } from './services/process/runProcess.js';
import { RemoteExecutionBridge } from './services/remote/RemoteExecutionBridge.js';
import { createTools, type ToolRegistry } from './tools/index.js';
import { execVersionQuery, type VersionQuery } from './utils/binaryCheck.js';

export interface Services {
  media: MediaService;
  batch: BatchOrchestrator;
  health: HealthCheckService;
  danmaku: DanmakuService;
  pool: ExtractionPool;
  tools: ToolRegistry;
}

export interface ServiceOverrides {
  /** Spawns yt-dlp and ssh */
  runner?: ProcessRunner;
  /** Reads binary versions for the health check */
  versionQuery?: VersionQuery;
  /** Answers Bilibili API requests */
  httpAdapter?: AxiosAdapter;
}

/**
 * Wire every service from one configuration snapshot
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const { extraction, cache, batch: batchConfig, bilibili: bilibiliConfig, credentials } = config;
  const runner = overrides.runner ?? runProcess;

  const bridge = new RemoteExecutionBridge({
    sshPath: extraction.sshPath,
    remoteBinaryPath: extraction.remoteYtdlpPath,
    connectTimeoutSeconds: extraction.sshConnectTimeoutSeconds,
    runner,
  });

  const client = new ExtractionClient({
    local: new LocalProcessExtractor(extraction.ytdlpPath, runner),
    remote: host => new RemoteExtractor(host, bridge),
    socketTimeoutSeconds: extraction.socketTimeoutSeconds,
  });

  const pool = new ExtractionPool(extraction.maxConcurrentExtractions);

  const media = new MediaService({
    client,
    pool,
    credentials,
    timeouts: extraction.timeouts,
    cache: { ttlMs: cache.ttlMs, sweepIntervalMs: cache.sweepIntervalMs },
    playlistMaxVideos: batchConfig.playlistMaxVideos,
  });

  const batch = new BatchOrchestrator(media, {
    maxUrls: batchConfig.maxUrls,
    concurrency: batchConfig.concurrency,
  });

  const danmaku = new DanmakuService({
    client: new BilibiliClient({
      baseUrl: bilibiliConfig.apiBaseUrl,
      timeoutMs: bilibiliConfig.requestTimeoutMs,
      ...(bilibiliConfig.sessdata ? { sessdata: bilibiliConfig.sessdata } : {}),
      ...(overrides.httpAdapter && { adapter: overrides.httpAdapter }),
    }),
    credentials,
    cache: { ttlMs: cache.ttlMs, sweepIntervalMs: cache.sweepIntervalMs },
    maxLimit: bilibiliConfig.danmakuMaxLimit,
  });

  const health = new HealthCheckService(config, media, pool, overrides.versionQuery ?? execVersionQuery);
  const tools = createTools({
    media,
    batch,
    health,
    danmaku,
    batchConfig,
    bilibiliConfig,
    maxConcurrentExtractions: extraction.maxConcurrentExtractions,
  });

  return { media, batch, health, danmaku, pool, tools };
}
