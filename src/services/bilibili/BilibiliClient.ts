/**
 * Bilibili Web API Client
 *
 * Reads what yt-dlp does not expose for Bilibili:
 * - Video stats (views, likes, danmaku and reply counts) and the part id (cid)
 * - Danmaku, the scrolling comments overlaid on the video
 *
 * Requests go through axios with the browser headers the API expects. A
 * SESSDATA cookie, when configured, is sent with every request.
 */

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosProxyConfig } from 'axios';
import { Parser } from 'xml2js';
import { z } from 'zod';
import {
  ErrorCode,
  ExtractionCancelledError,
  ExtractionError,
  ExtractionTimeoutError,
  VideoUnavailableError,
  type ApplicationError,
  type ErrorContext,
} from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { BilibiliStats } from '../../types/media.js';

const VIEW_PATH = '/x/web-interface/view';
const DANMAKU_PATH = '/x/v1/dm/list.so';

const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Referer: 'https://www.bilibili.com',
};

/** API codes for videos that are gone, hidden or under review */
const UNAVAILABLE_CODES = new Set([-404, 62002, 62004]);

const viewResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .object({
      bvid: z.string(),
      cid: z.number(),
      title: z.string(),
      desc: z.string().nullish(),
      duration: z.number(),
      owner: z.object({ name: z.string() }).nullish(),
      stat: z.object({
        view: z.number(),
        like: z.number(),
        danmaku: z.number(),
        reply: z.number(),
      }),
    })
    .nullish(),
});

// xml2js: `<d p="...">text</d>` becomes { _: text, $: {...} }, a bare `<d>text</d>` a string
const danmakuDocumentSchema = z.object({
  i: z.union([
    z.object({ d: z.array(z.union([z.string(), z.object({ _: z.string().optional() })])).optional() }),
    z.string(),
  ]),
});

export interface BilibiliView {
  bvid: string;
  cid: number;
  title: string;
  description: string;
  owner: string | null;
  duration: number;
  stats: BilibiliStats;
}

export interface BilibiliClientOptions {
  baseUrl: string;
  timeoutMs: number;
  sessdata?: string;
  /** Replaces the HTTP transport; tests answer requests in process */
  adapter?: AxiosAdapter;
}

export interface BilibiliRequestOptions {
  /** http(s) proxy URL, or null for a direct connection */
  proxy: string | null;
  signal?: AbortSignal;
}

/**
 * axios proxy settings for an http(s) proxy URL
 */
export function toAxiosProxy(proxy: string): AxiosProxyConfig {
  let parsed: URL;
  try {
    parsed = new URL(proxy);
  } catch {
    throw new ExtractionError(`Invalid proxy URL: ${proxy}`);
  }
  const protocol = parsed.protocol.replace(/:$/, '');
  if (protocol !== 'http' && protocol !== 'https') {
    throw new ExtractionError(`Bilibili API requests support http(s) proxies only, got ${protocol}`);
  }
  return {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : protocol === 'https' ? 443 : 80,
    ...(parsed.username
      ? { auth: { username: decodeURIComponent(parsed.username), password: decodeURIComponent(parsed.password) } }
      : {}),
  };
}

export class BilibiliClient {
  private readonly client: AxiosInstance;

  constructor(private readonly options: BilibiliClientOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        ...BROWSER_HEADERS,
        ...(options.sessdata ? { Cookie: `SESSDATA=${options.sessdata}` } : {}),
      },
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  /**
   * Metadata and stats of one video
   *
   * @throws VideoUnavailableError when the API reports the video gone or hidden
   */
  async getView(bvid: string, options: BilibiliRequestOptions): Promise<BilibiliView> {
    const context: ErrorContext = { service: 'BilibiliClient', operation: 'getView', target: bvid };
    const body = await this.request(VIEW_PATH, { bvid }, 'json', options, context);

    const parsed = viewResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError('Unexpected Bilibili API response', ErrorCode.EXTRACTION_MALFORMED_OUTPUT, { context });
    }

    const { code, message, data } = parsed.data;
    if (code !== 0 || !data) {
      const reason = message || `code ${code}`;
      if (UNAVAILABLE_CODES.has(code)) {
        throw new VideoUnavailableError(`Bilibili video ${bvid} is unavailable: ${reason}`, context);
      }
      throw new ExtractionError(`Bilibili API error for ${bvid}: ${reason}`, ErrorCode.EXTRACTION_FAILED, { context });
    }

    return {
      bvid: data.bvid,
      cid: data.cid,
      title: data.title,
      description: data.desc ?? '',
      owner: data.owner?.name ?? null,
      duration: data.duration,
      stats: {
        views: data.stat.view,
        likes: data.stat.like,
        danmaku: data.stat.danmaku,
        replies: data.stat.reply,
      },
    };
  }

  /**
   * Up to `limit` danmaku of one part, in document order. An unparsable
   * document yields no comments.
   */
  async getDanmaku(cid: number, limit: number, options: BilibiliRequestOptions): Promise<string[]> {
    const context: ErrorContext = { service: 'BilibiliClient', operation: 'getDanmaku', metadata: { cid } };
    const xml = await this.request(DANMAKU_PATH, { oid: cid }, 'text', options, context);
    if (typeof xml !== 'string') {
      throw new ExtractionError('Unexpected danmaku response', ErrorCode.EXTRACTION_MALFORMED_OUTPUT, { context });
    }

    const document = await this.parseDocument(xml, cid);
    if (!document || typeof document.i === 'string') {
      return [];
    }

    const comments: string[] = [];
    for (const entry of document.i.d ?? []) {
      const text = (typeof entry === 'string' ? entry : entry._ ?? '').trim();
      if (text) {
        comments.push(text);
      }
      if (comments.length >= limit) {
        break;
      }
    }
    return comments;
  }

  private async parseDocument(xml: string, cid: number): Promise<z.infer<typeof danmakuDocumentSchema> | null> {
    if (xml.includes('<!ENTITY') || xml.includes('<!DOCTYPE')) {
      logger.warn('[BilibiliClient] Danmaku document declares entities, ignoring it', { cid });
      return null;
    }
    try {
      const parsed = danmakuDocumentSchema.safeParse(await new Parser({ strict: true }).parseStringPromise(xml));
      if (!parsed.success) {
        logger.warn('[BilibiliClient] Danmaku document has an unexpected shape', { cid });
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn('[BilibiliClient] Could not parse danmaku document', { cid, error: getErrorMessage(error) });
      return null;
    }
  }

  private async request(
    path: string,
    params: Record<string, string | number>,
    responseType: 'json' | 'text',
    { proxy, signal }: BilibiliRequestOptions,
    context: ErrorContext
  ): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(path, {
        params,
        responseType,
        ...(proxy ? { proxy: toAxiosProxy(proxy) } : {}),
        ...(signal && { signal }),
      });
      logger.debug('[BilibiliClient] Request successful', { path, params, status: response.status });
      return response.data;
    } catch (error) {
      throw this.convertToApplicationError(error, context);
    }
  }

  private convertToApplicationError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ExtractionError) {
      return error;
    }
    if (axios.isCancel(error)) {
      return new ExtractionCancelledError(context);
    }
    if (!(error instanceof AxiosError)) {
      return new ExtractionError(`Bilibili request failed: ${getErrorMessage(error)}`, ErrorCode.EXTRACTION_FAILED, {
        context,
      });
    }

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new ExtractionTimeoutError(this.options.timeoutMs, context);
    }

    const status = error.response?.status;
    switch (status) {
      case undefined:
        return new ExtractionError(`Bilibili request failed: ${error.message}`, ErrorCode.EXTRACTION_FAILED, {
          context,
          cause: error,
        });
      case 404:
        return new VideoUnavailableError(`Bilibili resource not found: ${error.message}`, context, error);
      // The API answers throttled clients with 412
      case 412:
      case 429:
        return new ExtractionError(`Bilibili rate limit: ${error.message}`, ErrorCode.EXTRACTION_RATE_LIMITED, {
          context,
          cause: error,
        });
      default:
        return new ExtractionError(`Bilibili request failed with status ${status}`, ErrorCode.EXTRACTION_FAILED, {
          context,
          cause: error,
        });
    }
  }
}
