/**
 * In-process stand-ins shared by the tests
 */

import { vi } from 'vitest';
import type { ResultSink, SubdomainResult } from '../src/core/types.js';

export function dnsError(code: string, hostname: string): Error {
  return Object.assign(new Error(`queryA ${code} ${hostname}`), { code });
}

/**
 * Resolver answering from a fixed table; every other name is NXDOMAIN
 */
export function stubResolver(records: Record<string, string[]>) {
  const table = new Map(Object.entries(records));
  return {
    lookup: vi.fn(async (hostname: string, _server?: string): Promise<string[]> => {
      const addresses = table.get(hostname);
      if (!addresses) {
        throw dnsError('ENOTFOUND', hostname);
      }
      return addresses;
    }),
  };
}

export class MemorySink implements ResultSink {
  readonly results: SubdomainResult[] = [];
  closed = 0;

  accept(result: SubdomainResult): void {
    this.results.push(result);
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

export function hostnames(results: SubdomainResult[]): string[] {
  return results.map((result) => result.subdomain).sort();
}
