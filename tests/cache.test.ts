/**
 * Tests for the resolution cache policies
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  LruResolutionCache,
  MapResolutionCache,
  createResolutionCache,
  selectCachePolicy,
  DEFAULT_CACHE_SETTINGS,
} from '../src/core/cache.js';

const found = (...addresses: string[]) => ({ found: true, addresses });
const notFound = { found: false, addresses: [] };

describe('MapResolutionCache', () => {
  let cache: MapResolutionCache;

  beforeEach(() => {
    cache = new MapResolutionCache();
  });

  it('should return stored outcomes and undefined on a miss', () => {
    cache.store('www.example.com', found('192.0.2.1'));
    cache.store('api.example.com', notFound);

    expect(cache.load('www.example.com')).toEqual(found('192.0.2.1'));
    expect(cache.load('api.example.com')).toEqual(notFound);
    expect(cache.load('mail.example.com')).toBeUndefined();
    expect(cache.size).toBe(2);
  });

  it('should store a frozen copy', () => {
    const addresses = ['192.0.2.1'];
    cache.store('www.example.com', { found: true, addresses });
    addresses.push('192.0.2.2');

    const outcome = cache.load('www.example.com');
    expect(outcome?.addresses).toEqual(['192.0.2.1']);
    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome?.addresses)).toBe(true);
  });

  it('should count hits and misses', () => {
    cache.store('www.example.com', found('192.0.2.1'));
    cache.load('www.example.com');
    cache.load('www.example.com');
    cache.load('nope.example.com');

    expect(cache.stats()).toEqual({
      policy: 'unbounded',
      size: 1,
      hits: 2,
      misses: 1,
      evictions: 0,
      expired: 0,
    });
  });
});

describe('LruResolutionCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should evict the least recently used entry at capacity', () => {
    const cache = new LruResolutionCache({ capacity: 3, ttlMs: 60000, sweepIntervalMs: 0 });

    cache.store('a.example.com', found('192.0.2.1'));
    cache.store('b.example.com', found('192.0.2.2'));
    cache.store('c.example.com', found('192.0.2.3'));
    cache.load('a.example.com');
    cache.store('d.example.com', found('192.0.2.4'));

    expect(cache.size).toBe(3);
    expect(cache.load('b.example.com')).toBeUndefined();
    expect(cache.load('a.example.com')).toEqual(found('192.0.2.1'));
    expect(cache.load('c.example.com')).toEqual(found('192.0.2.3'));
    expect(cache.load('d.example.com')).toEqual(found('192.0.2.4'));
    expect(cache.stats().evictions).toBe(1);
  });

  it('should treat an expired entry as absent on load', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const start = Date.now();
    const cache = new LruResolutionCache({ capacity: 10, ttlMs: 1000, sweepIntervalMs: 0 });

    cache.store('www.example.com', found('192.0.2.1'));

    vi.setSystemTime(start + 1000);
    expect(cache.load('www.example.com')).toEqual(found('192.0.2.1'));

    vi.setSystemTime(start + 1001);
    expect(cache.load('www.example.com')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(cache.stats().expired).toBe(1);
  });

  it('should sweep expired entries in the background', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new LruResolutionCache({ capacity: 10, ttlMs: 1000, sweepIntervalMs: 500 });

    cache.store('old.example.com', found('192.0.2.1'));
    vi.advanceTimersByTime(600);
    cache.store('new.example.com', found('192.0.2.2'));
    vi.advanceTimersByTime(900);

    expect(cache.size).toBe(1);
    expect(cache.stats().expired).toBe(1);
    expect(cache.load('new.example.com')).toEqual(found('192.0.2.2'));

    cache.close();
  });

  it('should stop sweeping after close', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new LruResolutionCache({ capacity: 10, ttlMs: 100, sweepIntervalMs: 200 });

    cache.store('www.example.com', found('192.0.2.1'));
    cache.close();
    vi.advanceTimersByTime(1000);

    expect(cache.size).toBe(1);
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(0);
  });
});

describe('selectCachePolicy', () => {
  it('should keep everything for small known inputs', () => {
    expect(selectCachePolicy(10, 10)).toEqual({ kind: 'unbounded' });
  });

  it('should bound large or unknown inputs', () => {
    expect(selectCachePolicy(11, 10)).toEqual({ kind: 'lru', ...DEFAULT_CACHE_SETTINGS });
    expect(selectCachePolicy(undefined, 10)).toEqual({ kind: 'lru', ...DEFAULT_CACHE_SETTINGS });
  });

  it('should build the matching cache', () => {
    expect(createResolutionCache({ kind: 'unbounded' })).toBeInstanceOf(MapResolutionCache);

    const lru = createResolutionCache({ kind: 'lru', capacity: 5, ttlMs: 1000, sweepIntervalMs: 0 });
    expect(lru).toBeInstanceOf(LruResolutionCache);
    expect(lru.stats().policy).toBe('lru');
    lru.close();
  });
});
