import { createHash } from 'crypto';
import type { OperationName } from '../../types/media.js';

/**
 * JSON with object keys sorted at every depth; undefined members are dropped
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map(item => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/** Extraction operations plus the Bilibili API lookups */
export type CacheNamespace = OperationName | 'danmaku';

/**
 * Cache key for one operation call: `<operation>:<sha256 of canonical args>`
 */
export function fingerprint(operation: CacheNamespace, args: object): string {
  const digest = createHash('sha256').update(canonicalJson(args)).digest('hex');
  return `${operation}:${digest}`;
}
