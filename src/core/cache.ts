/**
 * DNS resolution cache with two policies behind one interface:
 * an unbounded map, and a bounded LRU with TTL and a background sweep.
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry, CacheSettings, CacheStats, ResolutionOutcome } from './types.js';

export type CachePolicy =
  | { kind: 'unbounded' }
  | ({ kind: 'lru' } & CacheSettings);

export interface ResolutionCache {
  /** Cached outcome, or undefined on a miss */
  load(key: string): ResolutionOutcome | undefined;
  store(key: string, outcome: ResolutionOutcome): void;
  readonly size: number;
  stats(): CacheStats;
  /** Stops background work; the cache stays usable */
  close(): void;
}

export const DEFAULT_CACHE_SETTINGS: CacheSettings = {
  capacity: 10000,
  ttlMs: 30 * 60 * 1000,
  sweepIntervalMs: 5 * 60 * 1000,
};

function freezeOutcome(outcome: ResolutionOutcome): ResolutionOutcome {
  return Object.freeze({
    found: outcome.found,
    addresses: Object.freeze([...outcome.addresses]),
  });
}

/**
 * Unbounded policy: a plain map, no eviction
 */
export class MapResolutionCache implements ResolutionCache {
  private entries = new Map<string, ResolutionOutcome>();
  private hits = 0;
  private misses = 0;

  load(key: string): ResolutionOutcome | undefined {
    const outcome = this.entries.get(key);
    if (outcome === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return outcome;
  }

  store(key: string, outcome: ResolutionOutcome): void {
    this.entries.set(key, freezeOutcome(outcome));
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      policy: 'unbounded',
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: 0,
      expired: 0,
    };
  }

  close(): void {
    // nothing scheduled
  }
}

/**
 * Bounded policy: least-recently-used eviction at capacity, lazy expiry on
 * load, and a periodic sweep of expired entries.
 */
export class LruResolutionCache implements ResolutionCache {
  private cache: LRUCache<string, CacheEntry<ResolutionOutcome>>;
  private readonly ttl: number;
  private sweepTimer?: NodeJS.Timeout;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expired = 0;

  constructor(settings: CacheSettings = DEFAULT_CACHE_SETTINGS) {
    this.ttl = settings.ttlMs;
    // Expiry is tracked on the entry itself; lru-cache only orders and bounds.
    this.cache = new LRUCache<string, CacheEntry<ResolutionOutcome>>({
      max: settings.capacity,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') {
          this.evictions++;
        }
      },
    });

    if (settings.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), settings.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  load(key: string): ResolutionOutcome | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  store(key: string, outcome: ResolutionOutcome): void {
    this.cache.set(key, {
      value: freezeOutcome(outcome),
      expiresAt: Date.now() + this.ttl,
    });
  }

  /**
   * Remove every expired entry without touching recency of the others
   * @returns number of entries removed
   */
  sweep(): number {
    const now = Date.now();
    const stale: string[] = [];

    for (const [key, entry] of this.cache.entries()) {
      if (now > entry.expiresAt) {
        stale.push(key);
      }
    }

    for (const key of stale) {
      this.cache.delete(key);
    }
    this.expired += stale.length;
    return stale.length;
  }

  get size(): number {
    return this.cache.size;
  }

  stats(): CacheStats {
    return {
      policy: 'lru',
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expired: this.expired,
    };
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }
}

export function createResolutionCache(policy: CachePolicy): ResolutionCache {
  if (policy.kind === 'lru') {
    return new LruResolutionCache(policy);
  }
  return new MapResolutionCache();
}

/**
 * Pick a policy from the expected number of candidates: small scans keep
 * everything, large or unknown-size scans get a bounded cache.
 */
export function selectCachePolicy(
  expectedCandidates: number | undefined,
  threshold: number,
  settings: CacheSettings = DEFAULT_CACHE_SETTINGS
): CachePolicy {
  if (expectedCandidates !== undefined && expectedCandidates <= threshold) {
    return { kind: 'unbounded' };
  }
  return { kind: 'lru', ...settings };
}
