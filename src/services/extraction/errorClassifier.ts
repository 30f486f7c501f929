/**
 * Extractor Error Classifier
 *
 * Maps yt-dlp stderr to a failure reason using a strong/weak/context pattern:
 * - STRONG: any single match is sufficient
 * - WEAK: need 2+ matches OR 1 weak match + context match
 * - CONTEXT: strengthens weak matches
 *
 * Rules are checked in order, strong before weak. Geo restriction comes first
 * because upstream messages often combine it with "unavailable".
 */

import { logger } from '../../middleware/logging.js';

export type FailureReason = 'geo_restricted' | 'unavailable' | 'rate_limited' | 'extraction_failed';

export interface ClassificationResult {
  reason: FailureReason;
  confidence: 'high' | 'medium' | 'low';
  matchedPatterns: string[];
  isRetryable: boolean;
}

interface ClassificationRule {
  reason: Exclude<FailureReason, 'extraction_failed'>;
  strong: string[];
  weak: string[];
  context: string[];
  isRetryable: boolean;
}

const RULES: readonly ClassificationRule[] = [
  {
    reason: 'geo_restricted',
    strong: [
      'geo',
      'not available in your country',
      'blocked in your country',
      'not available in your region',
      'blocked in your region',
      'content is not available in your location',
    ],
    weak: ['country', 'region', 'territory', 'location'],
    context: ['available', 'restricted', 'blocked'],
    isRetryable: false,
  },
  {
    reason: 'unavailable',
    strong: [
      'private',
      'unavailable',
      'sign in',
      'removed',
      'login required',
      'this video does not exist',
      'has been terminated',
      'members-only',
    ],
    weak: ['no longer exists', 'deleted', 'terminated', 'taken down', 'age-restricted'],
    context: ['video', 'account', 'channel'],
    isRetryable: false,
  },
  {
    reason: 'rate_limited',
    strong: ['http error 429', 'too many requests', 'rate limit', 'rate-limited'],
    weak: ['429', 'throttled', 'slow down', 'try again later'],
    context: ['error', 'http', 'request'],
    isRetryable: true,
  },
];

/**
 * Patterns found in the message (case-insensitive)
 */
function findMatches(message: string, patterns: string[]): string[] {
  const lower = message.toLowerCase();
  return patterns.filter(pattern => lower.includes(pattern.toLowerCase()));
}

/**
 * Classify an extractor error message into a failure reason
 */
export function classifyError(errorMessage: string): ClassificationResult {
  const msg = errorMessage || '';

  for (const rule of RULES) {
    const strong = findMatches(msg, rule.strong);
    if (strong.length > 0) {
      return { reason: rule.reason, confidence: 'high', matchedPatterns: strong, isRetryable: rule.isRetryable };
    }
  }

  for (const rule of RULES) {
    const weak = findMatches(msg, rule.weak);
    const hasContext = findMatches(msg, rule.context).length > 0;
    if (weak.length >= 2 || (weak.length >= 1 && hasContext)) {
      return { reason: rule.reason, confidence: 'medium', matchedPatterns: weak, isRetryable: rule.isRetryable };
    }
  }

  logger.debug('[ErrorClassifier] Unknown error type, classifying as extraction_failed', {
    errorMessage: msg.substring(0, 200),
  });

  return {
    reason: 'extraction_failed',
    confidence: 'low',
    matchedPatterns: [],
    isRetryable: false,
  };
}

/**
 * Last `ERROR:` line of yt-dlp stderr, or the trimmed tail when there is none
 */
export function summarizeStderr(stderr: string, maxChars: number): string {
  const lines = stderr
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
  const errorLine = [...lines].reverse().find(line => line.startsWith('ERROR:'));
  const summary = errorLine ?? lines.slice(-3).join(' ');
  return summary.length > maxChars ? `${summary.substring(0, maxChars)}...` : summary;
}
