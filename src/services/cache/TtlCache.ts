import { logger } from '../../middleware/logging.js';
import { deepFreeze } from '../../utils/deepFreeze.js';

interface CacheEntry<T> {
  value: T;
  createdAt: number;
  ttl: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  /** Interval of the background sweep; 0 disables it */
  sweepIntervalMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

/**
 * TTL Cache
 *
 * In-memory map from request fingerprint to a frozen snapshot of a successful
 * result. An entry is visible while `now < createdAt + ttl`; expired entries
 * are evicted when read and by a periodic sweep.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;

    const sweepIntervalMs = options.sweepIntervalMs ?? 0;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      // Must not keep the process alive
      this.sweepTimer.unref();
    }
  }

  get ttl(): number {
    return this.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  get(fingerprint: string): T | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(fingerprint);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Store a snapshot of the value; later changes to the caller's object are not visible
   */
  put(fingerprint: string, value: T): T {
    const snapshot = deepFreeze(structuredClone(value));
    this.entries.set(fingerprint, { value: snapshot, createdAt: this.now(), ttl: this.ttlMs });
    return snapshot;
  }

  invalidate(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  /**
   * Remove every expired entry
   *
   * @returns number of entries removed
   */
  sweep(): number {
    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('[TtlCache] Swept expired entries', { removed, remaining: this.entries.size });
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() >= entry.createdAt + entry.ttl;
  }
}
