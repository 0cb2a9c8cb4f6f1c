/**
 * Scan configuration defaults and validation
 */

import { cleanDomain, isValidDomain } from '../utils/domain.js';
import { DEFAULT_BACKOFF } from './backoff.js';
import { DEFAULT_CACHE_SETTINGS } from './cache.js';
import { ConfigError } from './errors.js';
import type { BackoffSettings, CacheSettings, ScanConfig, ScanOptions } from './types.js';
import { DEFAULT_WORDLIST_URL, STREAMING_THRESHOLD } from './wordlist.js';

export const DEFAULTS = {
  workers: 10,
  rateLimit: 100,
  depth: 1,
  streamingThreshold: STREAMING_THRESHOLD,
  takeoverTimeoutMs: 5000,
  dnsTimeoutMs: 5000,
} as const;

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

function requireNumber(name: string, value: number, min: number): number {
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`${name} must be a number >= ${min}, got ${value}`);
  }
  return value;
}

function resolveBackoff(rateLimit: number, overrides: ScanOptions['backoff'] = {}): BackoffSettings {
  const settings: BackoffSettings = { ...DEFAULT_BACKOFF, ...overrides, baseDelayMs: rateLimit };
  requireNumber('backoff.maxDelayMs', settings.maxDelayMs, 0);
  requireNumber('backoff.factor', settings.factor, 1);
  requireNumber('backoff.jitter', settings.jitter, 0);
  requireInteger('backoff.failThreshold', settings.failThreshold, 1);
  return settings;
}

function resolveCache(overrides: Partial<CacheSettings> = {}): CacheSettings {
  const settings: CacheSettings = { ...DEFAULT_CACHE_SETTINGS, ...overrides };
  requireInteger('cache.capacity', settings.capacity, 1);
  requireNumber('cache.ttlMs', settings.ttlMs, 1);
  requireNumber('cache.sweepIntervalMs', settings.sweepIntervalMs, 0);
  return settings;
}

/**
 * Apply defaults and validate; the result is frozen.
 * @throws ConfigError
 */
export function resolveScanConfig(options: ScanOptions): ScanConfig {
  const domain = cleanDomain(options.domain);
  if (!isValidDomain(domain)) {
    throw new ConfigError(`Invalid domain: ${options.domain}`);
  }

  const workers = requireInteger('workers', options.workers ?? DEFAULTS.workers, 1);
  const rateLimit = requireNumber('rateLimit', options.rateLimit ?? DEFAULTS.rateLimit, 0);

  const depth = options.depth ?? DEFAULTS.depth;
  if (!Number.isInteger(depth) || (depth !== -1 && depth < 1)) {
    throw new ConfigError(`depth must be -1 (unlimited) or an integer >= 1, got ${depth}`);
  }

  const proxy = options.proxy?.trim();

  return Object.freeze<ScanConfig>({
    domain,
    wordlist: options.wordlist ?? { kind: 'url', url: DEFAULT_WORDLIST_URL },
    resolvers: Object.freeze([...(options.resolvers ?? [])]),
    workers,
    backoff: Object.freeze(resolveBackoff(rateLimit, options.backoff)),
    recursive: options.recursive ?? false,
    depth,
    takeover: options.takeover ?? false,
    proxy: proxy ? proxy : undefined,
    showIps: options.showIps ?? false,
    streamingThreshold: requireInteger(
      'streamingThreshold',
      options.streamingThreshold ?? DEFAULTS.streamingThreshold,
      0
    ),
    takeoverTimeoutMs: requireNumber(
      'takeoverTimeoutMs',
      options.takeoverTimeoutMs ?? DEFAULTS.takeoverTimeoutMs,
      1
    ),
    dnsTimeoutMs: requireNumber('dnsTimeoutMs', options.dnsTimeoutMs ?? DEFAULTS.dnsTimeoutMs, 1),
    cache: Object.freeze(resolveCache(options.cache)),
  });
}
