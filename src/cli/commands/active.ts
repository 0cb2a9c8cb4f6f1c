/**
 * Active (brute-force) scan command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ScanOrchestrator } from '../../core/scanner.js';
import { describeError, isFatalScanError } from '../../core/errors.js';
import type { ScanSummary } from '../../core/types.js';
import type { Logger } from '../../utils/logger.js';
import {
  CommandOutput,
  createCliLogger,
  parseInteger,
  resolveTargets,
  withInterrupt,
  type OutputFlags,
} from '../shared.js';

interface ActiveFlags extends OutputFlags {
  domain?: string;
  list?: string;
  wordlist?: string;
  resolvers?: string[];
  rateLimit: number;
  recursive: boolean;
  depth: number;
  takeover: boolean;
  proxy?: string;
  workers: number;
  showIp: boolean;
}

function printSummary(logger: Logger, summary: ScanSummary): void {
  const seconds = (summary.duration / 1000).toFixed(1);
  const takeovers = summary.results.filter((result) => result.takeover).length;

  logger.success(
    `${chalk.bold(summary.domain)}: ${summary.results.length} subdomains in ${seconds}s` +
      (takeovers > 0 ? chalk.red(` (${takeovers} possible takeovers)`) : '')
  );
  logger.debug(
    `Cache ${summary.cache.policy}: ${summary.cache.hits} hits, ${summary.cache.misses} misses, ` +
      `${summary.cache.evictions} evictions; ${summary.mode} ingestion`
  );
}

export const activeCommand = new Command('active')
  .description('Brute-force subdomains against DNS')
  .option('-d, --domain <domain>', 'Target domain (e.g., example.com)')
  .option('-l, --list <file>', 'File containing a list of domains')
  .option('-w, --wordlist <file>', 'Custom wordlist file (defaults to a remote list)')
  .option('-r, --resolvers <list...>', 'DNS resolvers (e.g., 8.8.8.8,1.1.1.1) or a resolver file')
  .option('-t, --rate-limit <ms>', 'Base backoff delay in milliseconds', parseInteger, 100)
  .option('-R, --recursive', 'Re-scan discovered subdomains', false)
  .option('-D, --depth <n>', 'Recursion depth (-1 for unlimited)', parseInteger, 1)
  .option('-T, --takeover', 'Check discovered hosts for subdomain takeover', false)
  .option('-p, --proxy <url>', 'Proxy for takeover requests (e.g., http://proxy:8080)')
  .option('-W, --workers <n>', 'Concurrent workers', parseInteger, 10)
  .option('-s, --show-ip', 'Show IP addresses of discovered subdomains', false)
  .option('-o, --output <file>', 'Save results to a text file')
  .option('-j, --json-output <file>', 'Save results as JSON')
  .option('-q, --quiet', 'Only print results', false)
  .option('--debug', 'Verbose logging', false)
  .action(async (flags: ActiveFlags) => {
    const logger = createCliLogger(flags);
    const domains = await resolveTargets(flags.domain, flags.list);
    const output = new CommandOutput(flags, domains);

    try {
      await withInterrupt(logger, async (signal) => {
        for (const domain of domains) {
          if (signal.aborted) {
            break;
          }

          let summary: ScanSummary;
          try {
            const scanner = await ScanOrchestrator.create(
              {
                domain,
                wordlist: flags.wordlist ? { kind: 'file', path: flags.wordlist } : undefined,
                resolvers: flags.resolvers,
                rateLimit: flags.rateLimit,
                recursive: flags.recursive,
                depth: flags.depth,
                takeover: flags.takeover,
                proxy: flags.proxy,
                workers: flags.workers,
                showIps: flags.showIp,
              },
              { sink: output.forScan(), logger }
            );
            summary = await scanner.run(signal);
          } catch (error) {
            if (!isFatalScanError(error)) {
              throw error;
            }
            logger.error(`Active scan failed for ${domain}: ${describeError(error)}`);
            process.exitCode = 1;
            continue;
          }

          printSummary(logger, summary);
        }
      });
    } finally {
      await output.close(logger);
    }
  });
