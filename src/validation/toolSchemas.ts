import { z, type ZodError } from 'zod';
import { LIMITS } from '../config/constants.js';

/**
 * Tool Argument Schemas
 *
 * Zod schemas for the JSON arguments of each tool call
 */

const urlSchema = z.string({ required_error: 'url is required', invalid_type_error: 'url must be a string' });

export const getVideoInfoArgs = z.object({
  url: urlSchema,
});

export const getTranscriptArgs = z.object({
  url: urlSchema,
  lang: z.string().trim().min(1, 'lang must be a non-empty language code').default('en'),
  format: z.enum(['text', 'segments', 'vtt']).default('text'),
});

export const searchVideosArgs = z.object({
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'Search query must be a non-empty string'),
  max_results: z
    .number()
    .int()
    .min(1, `max_results must be between 1 and ${LIMITS.SEARCH_MAX_RESULTS}`)
    .max(LIMITS.SEARCH_MAX_RESULTS, `max_results must be between 1 and ${LIMITS.SEARCH_MAX_RESULTS}`)
    .default(LIMITS.SEARCH_DEFAULT_RESULTS),
});

export const getAudioUrlArgs = z.object({
  url: urlSchema,
  quality: z.enum(['best', 'smallest']).default('best'),
});

/**
 * Playlist limits come from config, so the schema is built per instance
 */
export function getPlaylistInfoArgs(maxVideos: number, defaultVideos: number) {
  return z.object({
    url: urlSchema,
    max_videos: z
      .number()
      .int()
      .min(1, `max_videos must be between 1 and ${maxVideos}`)
      .max(maxVideos, `max_videos must be between 1 and ${maxVideos}`)
      .default(Math.min(defaultVideos, maxVideos)),
    resolve_details: z.boolean().default(false),
  });
}

// Entry types and the batch cap are checked by the orchestrator
export function batchGetInfoArgs(maxConcurrency: number) {
  return z.object({
    urls: z
      .array(z.unknown(), { required_error: 'urls is required', invalid_type_error: 'urls must be a list' })
      .min(1, 'urls must be a non-empty list'),
    max_concurrency: z
      .number()
      .int()
      .min(1, `max_concurrency must be between 1 and ${maxConcurrency}`)
      .max(maxConcurrency, `max_concurrency must be between 1 and ${maxConcurrency}`)
      .optional(),
  });
}

export function getDanmakuArgs(maxLimit: number, defaultLimit: number) {
  return z.object({
    url: urlSchema,
    limit: z
      .number()
      .int()
      .min(1, `limit must be between 1 and ${maxLimit}`)
      .max(maxLimit, `limit must be between 1 and ${maxLimit}`)
      .default(Math.min(defaultLimit, maxLimit)),
  });
}

export const noArgs = z.object({}).passthrough();

/**
 * First issue as `field: message`, or the bare message for root-level issues
 */
export function formatIssues(error: ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'Invalid arguments';
  }
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}
