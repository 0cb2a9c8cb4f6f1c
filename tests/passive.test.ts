/**
 * Tests for passive enumeration
 */

import { describe, it, expect, vi } from 'vitest';
import { CrtShEnumerator, parseCrtShNames, runPassiveScan } from '../src/passive/index.js';
import type { HttpResponse, PassiveEnumerator } from '../src/core/types.js';
import { MemorySink, dnsError } from './helpers.js';

const CRT_ANSWER = JSON.stringify([
  { name_value: 'www.example.com\nAPI.example.com' },
  { name_value: '*.example.com' },
  { name_value: 'www.example.com' },
  { name_value: 'example.com' },
  { name_value: 'mail.example.org' },
  { common_name: 'no-name-value.example.com' },
]);

function crtsh(statusCode: number, body: string) {
  return {
    get: vi.fn(
      async (_url: string, _options?: { headers?: Record<string, string> }): Promise<HttpResponse> => ({
        statusCode,
        headers: {},
        body,
      })
    ),
  };
}

describe('parseCrtShNames', () => {
  it('should keep unique subdomains without wildcards', () => {
    expect(parseCrtShNames(CRT_ANSWER, 'example.com')).toEqual(['www.example.com', 'api.example.com']);
  });

  it('should reject answers that are not arrays', () => {
    expect(() => parseCrtShNames('{"error":"busy"}', 'example.com')).toThrow('crt.sh answer is not a JSON array');
  });
});

describe('CrtShEnumerator', () => {
  it('should query certificate transparency for the domain', async () => {
    const http = crtsh(200, CRT_ANSWER);
    const enumerator = new CrtShEnumerator(http);

    const names = await enumerator.enumerate('example.com');

    expect(names).toEqual(['www.example.com', 'api.example.com']);
    expect(http.get).toHaveBeenCalledWith('https://crt.sh/?q=%25.example.com&output=json', {
      headers: { accept: 'application/json' },
    });
  });

  it('should fail on an error status', async () => {
    const enumerator = new CrtShEnumerator(crtsh(503, 'unavailable'));

    await expect(enumerator.enumerate('example.com')).rejects.toThrow('crt.sh returned 503');
  });
});

describe('runPassiveScan', () => {
  const enumerator: PassiveEnumerator = {
    name: 'fixture',
    enumerate: async () => ['www.example.com', 'api.example.com', 'www.example.com'],
  };

  it('should emit sorted unique names and close the sink', async () => {
    const sink = new MemorySink();

    const results = await runPassiveScan('example.com', enumerator, { sink });

    expect(results).toEqual([{ subdomain: 'api.example.com' }, { subdomain: 'www.example.com' }]);
    expect(sink.results).toEqual(results);
    expect(sink.closed).toBe(1);
  });

  it('should attach addresses when they resolve', async () => {
    const resolver = {
      lookup: vi.fn(async (hostname: string, _server?: string): Promise<string[]> => {
        if (hostname === 'www.example.com') {
          return ['192.0.2.80'];
        }
        throw dnsError('ENOTFOUND', hostname);
      }),
    };

    const results = await runPassiveScan('example.com', enumerator, { showIps: true, resolver, concurrency: 2 });

    expect(results).toEqual([{ subdomain: 'api.example.com' }, { subdomain: 'www.example.com', ips: ['192.0.2.80'] }]);
    expect(resolver.lookup).toHaveBeenCalledTimes(2);
  });

  it('should close the sink when enumeration fails', async () => {
    const sink = new MemorySink();
    const failing: PassiveEnumerator = {
      name: 'failing',
      enumerate: async () => {
        throw new Error('source unavailable');
      },
    };

    await expect(runPassiveScan('example.com', failing, { sink })).rejects.toThrow('source unavailable');
    expect(sink.closed).toBe(1);
  });
});
