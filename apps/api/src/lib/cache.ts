import { LRUCache } from 'lru-cache';
import type { CacheKey } from '../core/branded-types.js';
import type { ExtractedText } from '../core/types.js';
import { trackCacheHit, trackCacheMiss, trackCacheSet, updateCacheSize } from './metrics.js';

export interface CacheOptions {
  maxSize: number;
  ttlSeconds: number;
}

/**
 * Successful article extractions keyed by normalized URL. Expired entries are
 * purged on their own timers so the size gauge follows the real contents.
 */
export class ExtractionCache {
  private readonly entries: LRUCache<CacheKey, ExtractedText>;
  private readonly ttlMs: number;

  constructor({ maxSize, ttlSeconds }: CacheOptions) {
    this.ttlMs = ttlSeconds * 1000;
    this.entries = new LRUCache<CacheKey, ExtractedText>({
      max: maxSize,
      ttl: this.ttlMs,
      ttlAutopurge: true,
      disposeAfter: () => updateCacheSize(this.entries.size),
    });
    updateCacheSize(0);
  }

  get(key: CacheKey): ExtractedText | null {
    const hit = this.entries.get(key);
    if (hit === undefined) {
      trackCacheMiss();
      return null;
    }

    trackCacheHit();
    return { ...hit, cached: true };
  }

  set(key: CacheKey, data: ExtractedText): void {
    this.entries.set(key, { ...data, cached: false });
    trackCacheSet();
    updateCacheSize(this.entries.size);
  }

  has(key: CacheKey): boolean {
    return this.entries.has(key);
  }

  getStats(): { size: number; maxSize: number; ttlMs: number } {
    return { size: this.entries.size, maxSize: this.entries.max, ttlMs: this.ttlMs };
  }

  clear(): void {
    this.entries.clear();
    updateCacheSize(0);
  }
}
