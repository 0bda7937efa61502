import { Logger } from '../core/Logger';
import type { CacheEntry, ResponseCacheConfig } from '../../types/CacheTypes';
import { DEFAULT_RESPONSE_CACHE_CONFIG } from '../../types/CacheTypes';
import type { Mode } from '../../types/ModeTypes';
import type { Usage } from '../../types/CommonTypes';

/**
 * ResponseCacheService - in-memory fingerprint -> result cache
 *
 * Fixed capacity with least-recently-stored eviction: a lookup never refreshes an
 * entry's position, only store() does. Map insertion order is the eviction order.
 * Shared by every session in the process; mutations run on the event loop only.
 */
export class ResponseCacheService {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly logger: Logger,
    private readonly config: ResponseCacheConfig = DEFAULT_RESPONSE_CACHE_CONFIG
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get cached entry (returns null on miss or expiry)
   */
  lookup(fingerprint: string): CacheEntry | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      this.logger.debug('Cache miss', { fingerprint });
      return null;
    }

    if (this.config.ttlMs !== undefined && Date.now() - entry.stored_at_ms > this.config.ttlMs) {
      this.entries.delete(fingerprint);
      this.logger.debug('Cache expired', { fingerprint });
      return null;
    }

    this.logger.debug('Cache hit', { fingerprint });
    return entry;
  }

  store(fingerprint: string, mode: Mode, result: string, usage?: Usage): CacheEntry {
    const entry: CacheEntry = {
      fingerprint,
      mode,
      result,
      stored_at_ms: Date.now(),
      ...(usage ? { usage } : {}),
    };
    // Re-inserting moves the key to the newest position.
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);

    while (this.entries.size > this.config.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.logger.debug('Cache evicted', { fingerprint: oldest.value });
    }
    return entry;
  }

  invalidate(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  invalidateMode(mode: Mode): number {
    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (entry.mode === mode) {
        this.entries.delete(fingerprint);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}
