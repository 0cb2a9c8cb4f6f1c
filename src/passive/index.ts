/**
 * Passive enumeration: names come from an external source, optionally
 * enriched with their addresses.
 */

import { batchProcess } from '../utils/concurrency.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { classifyResolutionError } from '../core/resolver.js';
import { describeError } from '../core/errors.js';
import type { DnsResolver, PassiveEnumerator, ResultSink, SubdomainResult } from '../core/types.js';

export { CrtShEnumerator, parseCrtShNames } from './crtsh.js';

export interface PassiveScanOptions {
  showIps?: boolean;
  /** Needed when showIps is set */
  resolver?: DnsResolver;
  /** Parallel address lookups */
  concurrency?: number;
  sink?: ResultSink;
  logger?: Logger;
}

/**
 * Enumerate `domain` through `enumerator`, emit each name to the sink and
 * close it. A name whose lookup fails is still reported, without addresses.
 */
export async function runPassiveScan(
  domain: string,
  enumerator: PassiveEnumerator,
  options: PassiveScanOptions = {}
): Promise<SubdomainResult[]> {
  const logger = options.logger ?? silentLogger();
  const { sink, resolver } = options;

  try {
    logger.info(`Starting passive scan for ${domain} (${enumerator.name})`);
    const names = [...new Set(await enumerator.enumerate(domain))].sort();

    const results = await batchProcess(
      names,
      async (name): Promise<SubdomainResult> => {
        if (!options.showIps || !resolver) {
          return { subdomain: name };
        }
        try {
          return { subdomain: name, ips: await resolver.lookup(name) };
        } catch (error) {
          if (classifyResolutionError(error) === 'transport') {
            logger.debug(`Address lookup failed for ${name}: ${describeError(error)}`);
          }
          return { subdomain: name };
        }
      },
      options.concurrency ?? 10
    );

    if (sink) {
      for (const result of results) {
        await sink.accept(result);
      }
    }
    return results;
  } finally {
    await sink?.close();
  }
}
