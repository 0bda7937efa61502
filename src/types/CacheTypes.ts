import type { Mode } from './ModeTypes';
import type { Usage } from './CommonTypes';

export interface CacheEntry {
  fingerprint: string;
  mode: Mode;
  result: string;
  usage?: Usage;
  stored_at_ms: number;
}

export interface ResponseCacheConfig {
  maxEntries: number;
  /** Entries older than this miss; undefined keeps them until evicted. */
  ttlMs?: number;
}

export const DEFAULT_RESPONSE_CACHE_CONFIG: ResponseCacheConfig = {
  maxEntries: 64,
  ttlMs: 5 * 60 * 1000,
};
