import type { ZodType, ZodTypeDef } from 'zod';
import { LIMITS } from '../../config/constants.js';
import {
  ApplicationError,
  ErrorCode,
  ExtractionCancelledError,
  ExtractionTimeoutError,
  errorForType,
  toApplicationError,
  type ErrorContext,
  type ErrorType,
} from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import type {
  AudioQuality,
  AudioStreamInfo,
  OperationName,
  Platform,
  PlatformConfig,
  PlaylistInfo,
  SearchResult,
  TranscriptFormat,
  TranscriptResult,
  VideoInfo,
} from '../../types/media.js';
import { classifyError, summarizeStderr } from './errorClassifier.js';
import type { ExtractionRequest, Extractor, RawOutput } from './Extractor.js';
import {
  buildTranscript,
  normalizePlaylist,
  normalizeSearchResults,
  normalizeVideoInfo,
  rawCollectionSchema,
  rawVideoSchema,
  selectAudioStream,
  type RawCollection,
  type RawVideo,
} from './normalizers.js';

/**
 * Normalized arguments per operation
 */
export interface OperationArgs {
  video_info: { url: string; platform: Platform };
  transcript: { url: string; platform: Platform; lang: string; format: TranscriptFormat };
  search: { query: string; maxResults: number };
  audio_url: { url: string; platform: Platform; quality: AudioQuality };
  playlist: { url: string; maxVideos: number };
}

export interface OperationPayloads {
  video_info: VideoInfo;
  transcript: TranscriptResult;
  search: SearchResult[];
  audio_url: AudioStreamInfo;
  playlist: PlaylistInfo;
}

export type ExtractionResult<T> =
  | { success: true; payload: T }
  | { success: false; kind: ErrorType; message: string; error: ApplicationError };

/**
 * How one operation drives the extractor and reads its output
 */
interface OperationSpec<K extends OperationName, Raw> {
  /** Error type for failures that match no specific pattern */
  failureType: ErrorType;
  /** Request without credentials; those come from the PlatformConfig */
  buildRequest(args: OperationArgs[K]): ExtractionRequest;
  schema: ZodType<Raw, ZodTypeDef, unknown>;
  parse(raw: Raw, output: RawOutput, args: OperationArgs[K]): OperationPayloads[K];
}

type ReadOutcome<T> = { ok: true; payload: T } | { ok: false; issue: string };

/**
 * OperationSpec with its raw document type hidden behind validation
 */
interface Operation<K extends OperationName> {
  failureType: ErrorType;
  buildRequest(args: OperationArgs[K]): ExtractionRequest;
  read(document: unknown, output: RawOutput, args: OperationArgs[K]): ReadOutcome<OperationPayloads[K]>;
}

function defineOperation<K extends OperationName, Raw>(definition: OperationSpec<K, Raw>): Operation<K> {
  return {
    failureType: definition.failureType,
    buildRequest: definition.buildRequest,
    read: (document, output, args) => {
      const validated = definition.schema.safeParse(document);
      if (!validated.success) {
        const issue = validated.error.issues[0];
        return { ok: false, issue: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown' };
      }
      return { ok: true, payload: definition.parse(validated.data, output, args) };
    },
  };
}

type OperationTable = {
  [K in OperationName]: Operation<K>;
};

const OPERATION_TABLE: OperationTable = {
  video_info: defineOperation<'video_info', RawVideo>({
    failureType: 'ExtractionError',
    buildRequest: ({ url }) => ({
      target: url,
      options: { dump: 'single', noPlaylist: true },
    }),
    schema: rawVideoSchema,
    parse: (raw, _output, { platform }) => normalizeVideoInfo(raw, platform),
  }),

  transcript: defineOperation<'transcript', RawVideo>({
    failureType: 'ExtractionError',
    buildRequest: ({ url, lang }) => ({
      target: url,
      options: {
        dump: 'single',
        noPlaylist: true,
        writeSubtitles: true,
        writeAutoSubtitles: true,
        subtitleLanguages: [lang, `${lang}-orig`],
        subtitleFormat: 'vtt/srt/best',
        outputTemplate: '%(id)s.%(ext)s',
      },
      collect: ['.vtt', '.srt'],
    }),
    schema: rawVideoSchema,
    parse: (raw, output, { platform, lang, format }) => buildTranscript(raw, output.files, { platform, lang, format }),
  }),

  search: defineOperation<'search', RawCollection>({
    failureType: 'SearchError',
    buildRequest: ({ query, maxResults }) => ({
      target: `ytsearch${maxResults}:${query}`,
      options: { dump: 'single', flatPlaylist: true },
    }),
    schema: rawCollectionSchema,
    parse: raw => normalizeSearchResults(raw),
  }),

  audio_url: defineOperation<'audio_url', RawVideo>({
    failureType: 'ExtractionError',
    buildRequest: ({ url }) => ({
      target: url,
      options: { dump: 'single', noPlaylist: true },
    }),
    schema: rawVideoSchema,
    parse: (raw, _output, { platform, quality }) => selectAudioStream(raw, platform, quality),
  }),

  playlist: defineOperation<'playlist', RawCollection>({
    failureType: 'BatchError',
    buildRequest: ({ url, maxVideos }) => ({
      target: url,
      options: { dump: 'single', flatPlaylist: true, playlistEnd: maxVideos },
    }),
    schema: rawCollectionSchema,
    parse: (raw, _output, { url, maxVideos }) => normalizePlaylist(raw, url, maxVideos),
  }),
};

export interface ExtractionClientOptions {
  /** Extractor used when no remote host is configured */
  local: Extractor;
  /** Extractor for a remote host */
  remote: (host: string) => Extractor;
  socketTimeoutSeconds: number;
}

/**
 * Extraction Client
 *
 * One extractor call per invocation: builds the request, runs it locally or
 * through the remote bridge, and turns the output into a typed payload or a
 * classified failure. No retries.
 */
export class ExtractionClient {
  constructor(private readonly options: ExtractionClientOptions) {}

  selectExtractor(platformConfig: PlatformConfig): Extractor {
    return platformConfig.remoteHost ? this.options.remote(platformConfig.remoteHost) : this.options.local;
  }

  async extract<K extends OperationName>(
    operation: K,
    args: OperationArgs[K],
    platformConfig: PlatformConfig,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ExtractionResult<OperationPayloads[K]>> {
    const operationSpec: Operation<K> = OPERATION_TABLE[operation];
    const extractor = this.selectExtractor(platformConfig);
    const base = operationSpec.buildRequest(args);
    const request: ExtractionRequest = {
      ...base,
      options: {
        ...base.options,
        proxy: platformConfig.proxy,
        cookieFile: platformConfig.cookieFile,
        cookieSource: platformConfig.cookieSource,
        socketTimeoutSeconds: this.options.socketTimeoutSeconds,
      },
    };
    const context: ErrorContext = { service: 'ExtractionClient', operation, target: request.target };
    const startedAt = Date.now();

    logger.debug('[ExtractionClient] Starting extraction', {
      operation,
      target: request.target,
      location: extractor.location,
      timeoutMs,
    });

    let output: RawOutput;
    try {
      output = await extractor.extract(request, { timeoutMs, ...(signal && { signal }) });
    } catch (error) {
      // Transport failures and cancellation arrive as ApplicationErrors and pass through
      return this.fail(toApplicationError(error, context));
    }

    context.durationMs = Date.now() - startedAt;

    if (output.timedOut) {
      return this.fail(new ExtractionTimeoutError(timeoutMs, context));
    }
    if (output.aborted) {
      return this.fail(new ExtractionCancelledError(context));
    }
    if (output.exitCode !== 0) {
      return this.fail(this.classifyFailure(operationSpec.failureType, output, context));
    }

    let document: unknown;
    try {
      document = JSON.parse(output.stdout);
    } catch {
      return this.fail(
        errorForType(operationSpec.failureType, 'Extractor returned malformed JSON', {
          code: ErrorCode.EXTRACTION_MALFORMED_OUTPUT,
          context,
        })
      );
    }

    try {
      const outcome = operationSpec.read(document, output, args);
      if (!outcome.ok) {
        return this.fail(
          errorForType(operationSpec.failureType, `Unexpected extractor output (${outcome.issue})`, {
            code: ErrorCode.EXTRACTION_MALFORMED_OUTPUT,
            context,
          })
        );
      }
      logger.debug('[ExtractionClient] Extraction finished', {
        operation,
        target: request.target,
        durationMs: context.durationMs,
      });
      return { success: true, payload: outcome.payload };
    } catch (error) {
      return this.fail(toApplicationError(error, context));
    }
  }

  private classifyFailure(failureType: ErrorType, output: RawOutput, context: ErrorContext): ApplicationError {
    const summary =
      summarizeStderr(output.stderr, LIMITS.STDERR_EXCERPT_CHARS) ||
      (output.exitCode === null ? 'Extractor terminated by a signal' : `Extractor exited with code ${output.exitCode}`);
    const classification = classifyError(output.stderr);

    switch (classification.reason) {
      case 'geo_restricted':
        return errorForType('GeoRestriction', summary, { context });
      case 'unavailable':
        return errorForType('VideoUnavailable', summary, { context });
      case 'rate_limited':
        return errorForType(failureType, summary, { code: ErrorCode.EXTRACTION_RATE_LIMITED, context });
      case 'extraction_failed':
        return errorForType(failureType, summary, { context });
    }
  }

  private fail<T>(error: ApplicationError): ExtractionResult<T> {
    logger.warn('[ExtractionClient] Extraction failed', {
      errorType: error.errorType,
      code: error.code,
      message: error.message,
      context: error.context,
    });
    return { success: false, kind: error.errorType, message: error.message, error };
  }
}
