/**
 * subsweep: subdomain discovery over DNS.
 * Main entry point for programmatic usage
 */

import { ScanOrchestrator } from './core/scanner.js';
import type { ScanOptions, SubdomainResult } from './core/types.js';

export { ScanOrchestrator };
export type { ScanDependencies } from './core/scanner.js';
export { resolveScanConfig, DEFAULTS } from './core/config.js';
export {
  LruResolutionCache,
  MapResolutionCache,
  createResolutionCache,
  selectCachePolicy,
  type CachePolicy,
  type ResolutionCache,
} from './core/cache.js';
export { RateController, createRateController, DEFAULT_BACKOFF } from './core/backoff.js';
export { WorkerPool, type Task, type WorkerPoolOptions, type PoolStats } from './core/pool.js';
export {
  FileWordSource,
  ListWordSource,
  UrlWordSource,
  openWordSource,
  materialize,
  type WordSource,
} from './core/wordlist.js';
export { TakeoverDetector, loadFingerprints, type Fingerprint } from './core/takeover.js';
export {
  NodeDnsResolver,
  classifyResolutionError,
  normalizeResolvers,
  resolveWithFallback,
} from './core/resolver.js';
export * from './core/errors.js';
export * from './core/types.js';
export { CrtShEnumerator, runPassiveScan, type PassiveScanOptions } from './passive/index.js';
export { ConsoleSink, JsonFileSink, MultiSink, TextFileSink } from './output/index.js';
export { HttpClient } from './utils/http.js';
export { Logger, createLogger } from './utils/logger.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'subsweep';
 *
 * const results = await quickScan('example.com', ['www', 'api', 'mail'], {
 *   workers: 20,
 * });
 * ```
 */
export async function quickScan(
  domain: string,
  words: readonly string[],
  options: Omit<ScanOptions, 'domain' | 'wordlist'> = {}
): Promise<SubdomainResult[]> {
  const scanner = await ScanOrchestrator.create({ ...options, domain, wordlist: { kind: 'list', words } });
  const summary = await scanner.run();
  return summary.results;
}
