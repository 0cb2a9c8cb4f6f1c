/**
 * Type definitions for subsweep
 */

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Outcome of one DNS lookup, as kept in the resolution cache
 */
export interface ResolutionOutcome {
  readonly found: boolean;
  readonly addresses: readonly string[];
}

/**
 * Cache entry with absolute expiry (epoch milliseconds)
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * A discovered hostname
 */
export interface SubdomainResult {
  subdomain: string;
  ips?: string[];
  /** Service id of a matched takeover fingerprint */
  takeover?: string;
}

/**
 * Where the candidate words come from
 */
export type WordlistSpec =
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string }
  | { kind: 'list'; words: readonly string[] };

export interface BackoffSettings {
  enabled: boolean;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: number;
  /** Attempts at which a root host counts as rate limited */
  failThreshold: number;
}

export interface CacheSettings {
  capacity: number;
  ttlMs: number;
  sweepIntervalMs: number;
}

/**
 * Caller-facing scan options; everything but the domain has a default
 */
export interface ScanOptions {
  domain: string;
  wordlist?: WordlistSpec;
  /** Resolver addresses, or a single path to a resolver file */
  resolvers?: string[];
  workers?: number;
  /** Base delay of the per-host backoff, in milliseconds */
  rateLimit?: number;
  backoff?: Partial<Omit<BackoffSettings, 'baseDelayMs'>>;
  recursive?: boolean;
  /** -1 for unlimited, 1 for no recursion */
  depth?: number;
  takeover?: boolean;
  proxy?: string;
  showIps?: boolean;
  /** Word sources larger than this are streamed instead of loaded */
  streamingThreshold?: number;
  takeoverTimeoutMs?: number;
  dnsTimeoutMs?: number;
  cache?: Partial<CacheSettings>;
}

/**
 * Resolved, immutable per-run configuration
 */
export interface ScanConfig {
  readonly domain: string;
  readonly wordlist: WordlistSpec;
  readonly resolvers: readonly string[];
  readonly workers: number;
  readonly backoff: Readonly<BackoffSettings>;
  readonly recursive: boolean;
  readonly depth: number;
  readonly takeover: boolean;
  readonly proxy?: string;
  readonly showIps: boolean;
  readonly streamingThreshold: number;
  readonly takeoverTimeoutMs: number;
  readonly dnsTimeoutMs: number;
  readonly cache: Readonly<CacheSettings>;
}

/**
 * Receives every discovered hostname, then one close at end of run
 */
export interface ResultSink {
  accept(result: SubdomainResult): void | Promise<void>;
  close(): Promise<void>;
}

/**
 * DNS resolver subsystem. With a server, queries that server; without one,
 * uses the operating system resolver.
 */
export interface DnsResolver {
  lookup(hostname: string, server?: string): Promise<string[]>;
}

/**
 * Minimal HTTP response as seen by the takeover detector and passive sources
 */
export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface HttpFetcher {
  get(url: string, options?: { headers?: Record<string, string> }): Promise<HttpResponse>;
}

/**
 * External source of already-known subdomains
 */
export interface PassiveEnumerator {
  readonly name: string;
  enumerate(domain: string): Promise<string[]>;
}

export type ScanPhase =
  | 'LevelStart'
  | 'Ingesting'
  | 'Dispatching'
  | 'Collecting'
  | 'LevelDone'
  | 'Finished';

export type IngestionMode = 'eager' | 'streaming';

export interface CacheStats {
  policy: 'unbounded' | 'lru';
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  expired: number;
}

/**
 * Per-level counters
 */
export interface LevelStats {
  level: number;
  targets: number;
  /** Candidates generated (targets × words) */
  candidates: number;
  cacheHits: number;
  /** Lookups that went to the resolver subsystem */
  resolved: number;
  discovered: number;
  failedTasks: number;
}

/**
 * Complete scan results
 */
export interface ScanSummary {
  domain: string;
  results: SubdomainResult[];
  levels: LevelStats[];
  cache: CacheStats;
  mode: IngestionMode;
  aborted: boolean;
  startTime: Date;
  endTime: Date;
  duration: number;
}
