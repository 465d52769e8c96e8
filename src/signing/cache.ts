/**
 * Signing key cache.
 *
 * @module signing/cache
 */

import { createHash } from 'node:crypto';

/**
 * Default lifetime of a cached key (24 hours); a derived key is only valid
 * for its date anyway.
 */
const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

interface CacheEntry {
  key: Buffer;
  expiresAt: number;
}

/**
 * Derived SigV4 keys keyed by date, region, service and a digest of the
 * secret, so rotated credentials never reuse a stale key.
 *
 * @example
 * ```typescript
 * const cache = new SigningKeyCache();
 * cache.set('test-secret', '20240102', 'us-west-2', 'widgets', key);
 * cache.get('test-secret', '20240102', 'us-west-2', 'widgets'); // key
 * cache.get('other-secret', '20240102', 'us-west-2', 'widgets'); // undefined
 * ```
 */
export class SigningKeyCache {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number = DEFAULT_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  private cacheKey(secret: string, date: string, region: string, service: string): string {
    const digest = createHash('sha256').update(secret).digest('hex').slice(0, 16);
    return `${digest}:${date}:${region}:${service}`;
  }

  /**
   * Store a key, dropping every expired entry first.
   */
  set(secret: string, date: string, region: string, service: string, key: Buffer): void {
    this.cleanup();
    this.cache.set(this.cacheKey(secret, date, region, service), {
      key,
      expiresAt: this.now() + this.ttlMs,
    });
  }

  get(secret: string, date: string, region: string, service: string): Buffer | undefined {
    const cacheKey = this.cacheKey(secret, date, region, service);
    const entry = this.cache.get(cacheKey);
    if (!entry) {
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.cache.delete(cacheKey);
      return undefined;
    }
    return entry.key;
  }

  /**
   * Remove expired entries.
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
