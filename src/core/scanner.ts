/**
 * Active scan orchestrator.
 *
 * One run walks levels: level 1 brute-forces the root domain, each further
 * level brute-forces the names discovered by the previous one. Every level
 * gets its own worker pool; the resolution cache and the rate controller
 * live for the whole run.
 */

import chalk from 'chalk';
import { sleep } from '../utils/concurrency.js';
import { extractRootDomain } from '../utils/domain.js';
import { HttpClient, parseProxyUrl } from '../utils/http.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { createRateController, type RateController } from './backoff.js';
import { createResolutionCache, selectCachePolicy, type ResolutionCache } from './cache.js';
import { resolveScanConfig } from './config.js';
import { describeError } from './errors.js';
import { WorkerPool } from './pool.js';
import {
  classifyResolutionError,
  NodeDnsResolver,
  normalizeResolvers,
  resolveWithFallback,
} from './resolver.js';
import { TakeoverDetector } from './takeover.js';
import type {
  DnsResolver,
  HttpFetcher,
  IngestionMode,
  LevelStats,
  ResolutionOutcome,
  ResultSink,
  ScanConfig,
  ScanOptions,
  ScanPhase,
  ScanSummary,
  SubdomainResult,
} from './types.js';
import { materialize, openWordSource, type StreamFetcher, type WordSource } from './wordlist.js';

export interface ScanDependencies {
  /** Resolver subsystem; node:dns by default */
  resolver?: DnsResolver;
  /** Used for the wordlist download and takeover probes */
  http?: HttpFetcher & StreamFetcher;
  sink?: ResultSink;
  logger?: Logger;
  /** Jitter source for the rate controller */
  random?: () => number;
  fingerprintsPath?: string;
  detector?: TakeoverDetector;
}

interface LevelOutcome {
  stats: LevelStats;
  discovered: string[];
}

/** Candidates between two progress lines */
const PROGRESS_INTERVAL = 1000;

const NULL_SINK: ResultSink = {
  accept: () => undefined,
  close: async () => undefined,
};

export class ScanOrchestrator {
  readonly config: ScanConfig;
  readonly cache: ResolutionCache;
  readonly backoff: RateController;
  readonly mode: IngestionMode;
  private readonly wordCount?: number;
  private currentPhase: ScanPhase = 'LevelStart';
  private readonly source: WordSource;
  private readonly resolvers: readonly string[];
  private readonly resolver: DnsResolver;
  private readonly detector?: TakeoverDetector;
  private readonly sink: ResultSink;
  private readonly logger: Logger;
  private readonly owned: HttpClient[];
  private readonly emitted = new Set<string>();
  private readonly claimed = new Set<string>();
  private readonly inFlight = new Map<string, Promise<ResolutionOutcome>>();
  private readonly results: SubdomainResult[] = [];
  private started = false;

  private constructor(parts: {
    config: ScanConfig;
    source: WordSource;
    mode: IngestionMode;
    wordCount?: number;
    cache: ResolutionCache;
    backoff: RateController;
    resolvers: readonly string[];
    resolver: DnsResolver;
    detector?: TakeoverDetector;
    sink: ResultSink;
    logger: Logger;
    owned: HttpClient[];
  }) {
    this.config = parts.config;
    this.source = parts.source;
    this.mode = parts.mode;
    this.wordCount = parts.wordCount;
    this.cache = parts.cache;
    this.backoff = parts.backoff;
    this.resolvers = parts.resolvers;
    this.resolver = parts.resolver;
    this.detector = parts.detector;
    this.sink = parts.sink;
    this.logger = parts.logger;
    this.owned = parts.owned;
  }

  /**
   * Validate everything that can fail before any worker starts
   * @throws ConfigError, ResolverConfigError, ProxyConfigError, WordlistLoadError
   */
  static async create(options: ScanOptions, deps: ScanDependencies = {}): Promise<ScanOrchestrator> {
    const logger = deps.logger ?? silentLogger();
    const config = resolveScanConfig(options);
    const resolvers = config.resolvers.length > 0 ? await normalizeResolvers(config.resolvers) : [];

    if (config.proxy !== undefined) {
      if (config.takeover) {
        parseProxyUrl(config.proxy);
      } else {
        logger.warn('Proxy is only used for takeover checks; ignoring it');
      }
    }

    const owned: HttpClient[] = [];
    const own = (client: HttpClient) => {
      owned.push(client);
      return client;
    };

    const wordlistClient =
      config.wordlist.kind === 'url' ? deps.http ?? own(new HttpClient({ timeout: 30000 })) : undefined;

    let source: WordSource;
    let count: number | undefined;
    let mode: IngestionMode = 'streaming';
    let detector: TakeoverDetector | undefined;
    try {
      source = await openWordSource(config.wordlist, { client: wordlistClient });
      count = await source.count();
      if (count !== undefined && count <= config.streamingThreshold) {
        mode = 'eager';
        source = await materialize(source);
      }

      if (config.takeover) {
        detector =
          deps.detector ??
          (await TakeoverDetector.create(
            deps.http ?? own(new HttpClient({ timeout: config.takeoverTimeoutMs, proxy: config.proxy })),
            { fingerprintsPath: deps.fingerprintsPath, logger }
          ));
      }
    } catch (error) {
      await Promise.all(owned.map((client) => client.close()));
      throw error;
    }

    // each level past the first multiplies the candidates by its discoveries
    const expected = config.recursive && config.depth !== 1 ? undefined : count;
    const policy = selectCachePolicy(expected, config.streamingThreshold, config.cache);
    logger.debug(
      `Wordlist ${source.description}: ${count ?? 'unknown'} words, ${mode} ingestion, ${policy.kind} cache`
    );

    return new ScanOrchestrator({
      config,
      source,
      mode,
      wordCount: count,
      cache: createResolutionCache(policy),
      backoff: createRateController(config.backoff, deps.random),
      resolvers,
      resolver: deps.resolver ?? new NodeDnsResolver({ timeout: config.dnsTimeoutMs }),
      detector,
      sink: deps.sink ?? NULL_SINK,
      logger,
      owned,
    });
  }

  get phase(): ScanPhase {
    return this.currentPhase;
  }

  /**
   * Run every level. An orchestrator runs once.
   */
  async run(signal?: AbortSignal): Promise<ScanSummary> {
    if (this.started) {
      throw new Error('A scan orchestrator can only run once');
    }
    this.started = true;

    const startTime = new Date();
    const levels: LevelStats[] = [];
    const { domain, recursive, depth, workers } = this.config;

    this.logger.info(
      `Scanning ${chalk.bold(domain)} with ${workers} workers` +
        (recursive ? `, depth ${depth === -1 ? 'unlimited' : depth}` : '')
    );

    try {
      let targets = [domain];
      let level = 1;

      for (;;) {
        this.currentPhase = 'LevelStart';
        if (signal?.aborted) {
          break;
        }

        const outcome = await this.scanLevel(level, targets, signal);
        levels.push(outcome.stats);
        this.currentPhase = 'LevelDone';
        this.logger.info(
          `Level ${level}: ${outcome.stats.candidates} candidates, ${outcome.stats.discovered} discovered`
        );

        if (signal?.aborted || !recursive || (depth !== -1 && level >= depth) || outcome.discovered.length === 0) {
          break;
        }
        targets = outcome.discovered;
        level++;
      }
    } finally {
      this.currentPhase = 'Finished';
      await this.release();
    }

    const endTime = new Date();
    const aborted = signal?.aborted ?? false;
    if (aborted) {
      this.logger.warn(`Scan aborted after ${levels.length} level(s)`);
    }

    return {
      domain,
      results: [...this.results],
      levels,
      cache: this.cache.stats(),
      mode: this.mode,
      aborted,
      startTime,
      endTime,
      duration: endTime.getTime() - startTime.getTime(),
    };
  }

  private async scanLevel(level: number, targets: string[], signal?: AbortSignal): Promise<LevelOutcome> {
    const stats: LevelStats = {
      level,
      targets: targets.length,
      candidates: 0,
      cacheHits: 0,
      resolved: 0,
      discovered: 0,
      failedTasks: 0,
    };
    const discovered: string[] = [];
    const pool = new WorkerPool<SubdomainResult>({
      concurrency: this.config.workers,
      signal,
      logger: this.logger,
    });
    pool.start();

    let sinkFailure: { error: unknown } | undefined;
    const collecting = this.collect(pool, discovered).catch((error: unknown) => {
      sinkFailure = { error };
      pool.cancel();
    });

    this.currentPhase = 'Ingesting';
    try {
      await this.dispatch(pool, targets, stats);
    } catch (error) {
      pool.cancel();
      await pool.stop();
      await collecting;
      throw error;
    }

    this.currentPhase = 'Collecting';
    await pool.stop();
    await collecting;
    if (sinkFailure) {
      throw sinkFailure.error;
    }

    stats.discovered = discovered.length;
    stats.failedTasks = pool.stats().failed;
    return { stats, discovered };
  }

  /**
   * Feed targets × words into the pool, checking the cache first
   */
  private async dispatch(pool: WorkerPool<SubdomainResult>, targets: string[], stats: LevelStats): Promise<void> {
    const { signal } = pool;
    const total = this.wordCount === undefined ? undefined : targets.length * this.wordCount;

    for (const target of targets) {
      for await (const word of this.source.words()) {
        if (pool.cancelled) {
          return;
        }
        this.currentPhase = 'Dispatching';

        const hostname = `${word}.${target}`.toLowerCase();
        stats.candidates++;
        if (stats.candidates % PROGRESS_INTERVAL === 0) {
          this.reportProgress(stats, total);
        }

        const cached = this.cache.load(hostname);
        if (cached) {
          stats.cacheHits++;
          if (cached.found && !this.claimed.has(hostname)) {
            await pool.addTask(() => this.claim(hostname, cached));
          }
          continue;
        }

        await pool.addTask(() => this.resolveCandidate(hostname, stats, signal));
      }
    }

    if (stats.candidates % PROGRESS_INTERVAL !== 0) {
      this.reportProgress(stats, total);
    }
  }

  private reportProgress(stats: LevelStats, total: number | undefined): void {
    const message = `Level ${stats.level} candidates`;
    if (total === undefined) {
      this.logger.info(`${message}: ${stats.candidates} dispatched`);
    } else {
      this.logger.progress(message, stats.candidates, total);
    }
  }

  private async collect(pool: WorkerPool<SubdomainResult>, discovered: string[]): Promise<void> {
    for await (const result of pool.results()) {
      if (this.emitted.has(result.subdomain)) {
        continue;
      }
      this.emitted.add(result.subdomain);
      discovered.push(result.subdomain);
      this.results.push(result);

      if (result.takeover) {
        this.logger.warn(`Possible takeover on ${result.subdomain} (${result.takeover})`);
      }
      await this.sink.accept(result);
    }
  }

  private async resolveCandidate(
    hostname: string,
    stats: LevelStats,
    signal: AbortSignal
  ): Promise<SubdomainResult | undefined> {
    // a duplicate candidate may have been resolved since it was dispatched
    const cached = this.cache.load(hostname);
    if (cached) {
      stats.cacheHits++;
      return cached.found ? await this.claim(hostname, cached) : undefined;
    }

    let pending = this.inFlight.get(hostname);
    if (!pending) {
      pending = this.lookup(hostname, stats, signal).finally(() => this.inFlight.delete(hostname));
      this.inFlight.set(hostname, pending);
    }

    const outcome = await pending;
    return outcome.found ? await this.claim(hostname, outcome) : undefined;
  }

  /**
   * Only the first task to reach a found hostname builds its result
   */
  private async claim(hostname: string, outcome: ResolutionOutcome): Promise<SubdomainResult | undefined> {
    if (this.claimed.has(hostname)) {
      return undefined;
    }
    this.claimed.add(hostname);
    return await this.toResult(hostname, outcome);
  }

  /**
   * Gate on the rate controller, resolve, store the outcome, update backoff
   */
  private async lookup(hostname: string, stats: LevelStats, signal: AbortSignal): Promise<ResolutionOutcome> {
    const { backoff } = this.config;

    if (backoff.enabled && this.backoff.isRateLimited(hostname, backoff.failThreshold)) {
      const delay = this.backoff.nextDelay(hostname);
      this.logger.debug(`Backing off ${extractRootDomain(hostname)} for ${Math.round(delay)}ms`);
      await sleep(delay, signal);
    }

    stats.resolved++;
    let outcome: ResolutionOutcome;
    let answered: boolean;

    try {
      const addresses = await resolveWithFallback(hostname, this.resolvers, this.resolver);
      outcome = { found: true, addresses };
      answered = true;
    } catch (error) {
      outcome = { found: false, addresses: [] };
      answered = classifyResolutionError(error) === 'negative';
      if (!answered) {
        this.logger.debug(describeError(error));
      }
    }

    this.cache.store(hostname, outcome);
    if (backoff.enabled) {
      this.backoff.adaptiveDelay(hostname, answered);
    }
    return outcome;
  }

  private async toResult(hostname: string, outcome: ResolutionOutcome): Promise<SubdomainResult> {
    const result: SubdomainResult = { subdomain: hostname };
    if (this.config.showIps) {
      result.ips = [...outcome.addresses];
    }
    return this.detector ? await this.detector.check(result) : result;
  }

  private async release(): Promise<void> {
    this.cache.close();

    const settled = await Promise.allSettled([
      this.source.close(),
      ...this.owned.map((client) => client.close()),
    ]);
    for (const entry of settled) {
      if (entry.status === 'rejected') {
        this.logger.warn(`Cleanup failed: ${describeError(entry.reason)}`);
      }
    }

    await this.sink.close();
  }
}
