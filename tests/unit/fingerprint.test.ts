import { describe, it, expect } from '@jest/globals';
import { canonicalJson, fingerprint } from '../../src/services/cache/fingerprint.js';

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, 2], c: 'x' } })).toBe('{"a":{"c":"x","d":[1,2]},"b":1}');
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(canonicalJson({ a: undefined, b: [undefined, 2] })).toBe('{"b":[null,2]}');
  });
});

describe('fingerprint', () => {
  it('does not depend on key order', () => {
    const first = fingerprint('search', { query: 'lofi', maxResults: 5 });
    const second = fingerprint('search', { maxResults: 5, query: 'lofi' });

    expect(first).toBe(second);
  });

  it('is prefixed with the operation and a sha256 hex digest', () => {
    expect(fingerprint('video_info', { url: 'u' })).toMatch(/^video_info:[0-9a-f]{64}$/);
  });

  it('differs across operations and argument values', () => {
    const args = { url: 'https://www.youtube.com/watch?v=abc' };

    expect(fingerprint('video_info', args)).not.toBe(fingerprint('audio_url', args));
    expect(fingerprint('search', { query: 'a', maxResults: 5 })).not.toBe(
      fingerprint('search', { query: 'a', maxResults: 6 })
    );
  });
});
