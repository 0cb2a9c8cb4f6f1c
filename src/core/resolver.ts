/**
 * DNS resolver adapter and resolver-list handling
 */

import { Resolver, lookup as systemLookup } from 'node:dns/promises';
import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import { ResolutionFailure, ResolverConfigError, type ResolutionFailureKind } from './errors.js';
import type { DnsResolver } from './types.js';

const NEGATIVE_ANSWER_CODES = new Set(['ENOTFOUND', 'ENODATA', 'NXDOMAIN', 'NOTFOUND', 'ENONAME']);

export interface NodeDnsResolverOptions {
  /** Per-query timeout in milliseconds */
  timeout?: number;
  tries?: number;
}

/**
 * Resolver backed by node:dns. With a server, A records are queried on that
 * server (AAAA when there are none); without one the OS resolver is used.
 */
export class NodeDnsResolver implements DnsResolver {
  private resolvers = new Map<string, Resolver>();
  private readonly timeout: number;
  private readonly tries: number;

  constructor(options: NodeDnsResolverOptions = {}) {
    this.timeout = options.timeout ?? 5000;
    this.tries = options.tries ?? 2;
  }

  async lookup(hostname: string, server?: string): Promise<string[]> {
    if (server === undefined) {
      const entries = await systemLookup(hostname, { all: true });
      return entries.map((entry) => entry.address);
    }

    const resolver = this.resolverFor(server);
    try {
      return await resolver.resolve4(hostname);
    } catch (error) {
      if (classifyResolutionError(error) !== 'negative') {
        throw error;
      }
      return await resolver.resolve6(hostname);
    }
  }

  private resolverFor(server: string): Resolver {
    let resolver = this.resolvers.get(server);
    if (!resolver) {
      resolver = new Resolver({ timeout: this.timeout, tries: this.tries });
      resolver.setServers([server]);
      this.resolvers.set(server, resolver);
    }
    return resolver;
  }
}

/**
 * `negative` when a server answered that the name has no address,
 * `transport` for timeouts, refusals and everything else.
 */
export function classifyResolutionError(error: unknown): ResolutionFailureKind {
  if (error instanceof ResolutionFailure) {
    return error.kind;
  }
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' && NEGATIVE_ANSWER_CODES.has(code)) {
      return 'negative';
    }
  }
  return 'transport';
}

/**
 * Try each server in order until one answers with addresses; use the
 * default resolver when no servers are configured.
 * @throws ResolutionFailure carrying the last error
 */
export async function resolveWithFallback(
  hostname: string,
  servers: readonly string[],
  resolver: DnsResolver
): Promise<string[]> {
  const attempts: Array<string | undefined> = servers.length > 0 ? [...servers] : [undefined];
  let lastError: unknown;

  for (const server of attempts) {
    try {
      const addresses = await resolver.lookup(hostname, server);
      if (addresses.length > 0) {
        return addresses;
      }
      lastError = Object.assign(new Error(`no addresses for ${hostname}`), { code: 'ENODATA' });
    } catch (error) {
      lastError = error;
    }
  }

  throw new ResolutionFailure(hostname, classifyResolutionError(lastError), lastError);
}

/**
 * `8.8.8.8`, `8.8.8.8:5353`, `2001:db8::1` or `[2001:db8::1]:53`
 */
export function isResolverAddress(entry: string): boolean {
  if (isIP(entry) !== 0) {
    return true;
  }
  const bracketed = /^\[([^\]]+)\]:(\d{1,5})$/.exec(entry);
  if (bracketed) {
    return isIP(bracketed[1]) === 6 && isPort(bracketed[2]);
  }
  const withPort = /^([^:]+):(\d{1,5})$/.exec(entry);
  if (withPort) {
    return isIP(withPort[1]) === 4 && isPort(withPort[2]);
  }
  return false;
}

function isPort(value: string): boolean {
  const port = Number(value);
  return port > 0 && port <= 65535;
}

/**
 * Read a resolver file: one address per line, blank lines and `#` comments
 * ignored.
 */
export async function loadResolvers(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ResolverConfigError(`Cannot read resolver file ${filePath}`, error);
  }

  const resolvers = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));

  if (resolvers.length === 0) {
    throw new ResolverConfigError(`Resolver file ${filePath} lists no resolvers`);
  }
  return validateResolvers(resolvers, filePath);
}

/**
 * Turn the configured resolver entries into a list of addresses. A single
 * entry that is not an address is read as a resolver file; comma-separated
 * entries are split.
 * @throws ResolverConfigError
 */
export async function normalizeResolvers(entries: readonly string[]): Promise<string[]> {
  const flattened = entries
    .flatMap((entry) => entry.split(','))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (flattened.length === 1 && !isResolverAddress(flattened[0])) {
    return await loadResolvers(flattened[0]);
  }
  return validateResolvers(flattened);
}

function validateResolvers(resolvers: string[], origin?: string): string[] {
  const invalid = resolvers.filter((entry) => !isResolverAddress(entry));
  if (invalid.length > 0) {
    const where = origin ? ` in ${origin}` : '';
    throw new ResolverConfigError(`Invalid resolver address${where}: ${invalid.join(', ')}`);
  }
  return resolvers;
}
