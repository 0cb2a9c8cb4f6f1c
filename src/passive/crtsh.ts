/**
 * Certificate transparency source (crt.sh)
 */

import { isSubdomainOf } from '../utils/domain.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { HttpFetcher, PassiveEnumerator } from '../core/types.js';

export const CRTSH_URL = 'https://crt.sh/';

/**
 * Names from a crt.sh JSON answer: every `name_value` line, lower-cased,
 * without wildcards, limited to subdomains of `domain`.
 */
export function parseCrtShNames(body: string, domain: string): string[] {
  const data: unknown = JSON.parse(body);
  if (!Array.isArray(data)) {
    throw new Error('crt.sh answer is not a JSON array');
  }

  const names = new Set<string>();
  for (const entry of data) {
    if (typeof entry !== 'object' || entry === null || !('name_value' in entry)) {
      continue;
    }
    const { name_value: nameValue } = entry;
    if (typeof nameValue !== 'string') {
      continue;
    }

    for (const line of nameValue.split('\n')) {
      const name = line.trim().toLowerCase();
      if (name && !name.includes('*') && isSubdomainOf(name, domain)) {
        names.add(name);
      }
    }
  }
  return [...names];
}

export class CrtShEnumerator implements PassiveEnumerator {
  readonly name = 'crt.sh';
  private readonly http: HttpFetcher;
  private readonly logger: Logger;

  constructor(http: HttpFetcher, logger: Logger = silentLogger()) {
    this.http = http;
    this.logger = logger;
  }

  async enumerate(domain: string): Promise<string[]> {
    this.logger.info('Querying crt.sh...');
    const url = `${CRTSH_URL}?q=${encodeURIComponent(`%.${domain}`)}&output=json`;

    const response = await this.http.get(url, { headers: { accept: 'application/json' } });
    if (response.statusCode !== 200) {
      throw new Error(`crt.sh returned ${response.statusCode}`);
    }

    const names = parseCrtShNames(response.body, domain);
    this.logger.info(`Found ${names.length} subdomains from crt.sh`);
    return names;
  }
}
