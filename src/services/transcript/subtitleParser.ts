import type { TranscriptSegment } from '../../types/media.js';

const HTML_TAG = /<[^>]+>/g;
const VTT_TIMESTAMP_TAG = /<\d{2}:\d{2}:\d{2}\.\d{3}>/g;
const SRT_SEQUENCE = /^\d+\s*$/;
const TIMESTAMP_LINE = /((?:\d{1,2}:)?\d{2}:\d{2}[.,]\d{3})\s*-->\s*((?:\d{1,2}:)?\d{2}:\d{2}[.,]\d{3})/;

/**
 * HH:MM:SS.mmm or MM:SS.mmm (comma or dot) to seconds
 */
export function parseTimestamp(timestamp: string): number {
  const parts = timestamp.trim().replace(',', '.').split(':');
  if (parts.length === 3) {
    const [h, m, s] = parts;
    return Number(h) * 3600 + Number(m) * 60 + Number(s);
  }
  if (parts.length === 2) {
    const [m, s] = parts;
    return Number(m) * 60 + Number(s);
  }
  return 0;
}

function cleanText(text: string): string {
  return text.replace(VTT_TIMESTAMP_TAG, '').replace(HTML_TAG, '').trim();
}

/**
 * Parse WebVTT or SRT into timed segments.
 *
 * Inline tags are stripped. Consecutive cues with identical text (rolling
 * auto-captions) collapse into one segment that spans them all.
 */
export function parseSubtitles(raw: string): TranscriptSegment[] {
  if (!raw) {
    return [];
  }

  const segments: TranscriptSegment[] = [];
  const lines = raw.split(/\r?\n/);
  let i = 0;

  // Skip the WEBVTT header block
  if (lines.length > 0 && (lines[0] ?? '').replace(/^\uFEFF/, '').trim().startsWith('WEBVTT')) {
    i = 1;
    while (i < lines.length && (lines[i] ?? '').trim()) {
      i++;
    }
  }

  while (i < lines.length) {
    const line = (lines[i] ?? '').trim();
    const timing = TIMESTAMP_LINE.exec(line);
    i++;
    if (!timing) {
      continue;
    }

    const start = parseTimestamp(timing[1] ?? '');
    const end = parseTimestamp(timing[2] ?? '');

    const textParts: string[] = [];
    while (i < lines.length) {
      const textLine = (lines[i] ?? '').trim();
      if (!textLine || TIMESTAMP_LINE.test(textLine) || SRT_SEQUENCE.test(textLine)) {
        break;
      }
      const cleaned = cleanText(textLine);
      if (cleaned) {
        textParts.push(cleaned);
      }
      i++;
    }

    const text = textParts.join(' ');
    if (!text) {
      continue;
    }

    const previous = segments[segments.length - 1];
    if (previous && previous.text === text) {
      previous.end = end;
    } else {
      segments.push({ start, end, text });
    }
  }

  return segments;
}

export function segmentsToText(segments: TranscriptSegment[], separator = ' '): string {
  return segments
    .map(segment => segment.text)
    .filter(text => text.length > 0)
    .join(separator);
}
