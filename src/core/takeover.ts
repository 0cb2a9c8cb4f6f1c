/**
 * Subdomain takeover detection by response-body fingerprints.
 *
 * Fingerprints are matched in the order they are declared; the first hit
 * names the service.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ConfigError, TakeoverProbeError } from './errors.js';
import type { HttpFetcher, SubdomainResult } from './types.js';

export interface Fingerprint {
  service: string;
  pattern: string;
}

export const DEFAULT_FINGERPRINTS_PATH = fileURLToPath(
  new URL('../../templates/takeover-fingerprints.json', import.meta.url)
);

function isFingerprint(value: unknown): value is Fingerprint {
  if (typeof value !== 'object' || value === null || !('service' in value) || !('pattern' in value)) {
    return false;
  }
  const { service, pattern } = value;
  return typeof service === 'string' && service.length > 0 && typeof pattern === 'string' && pattern.length > 0;
}

/**
 * Load an ordered fingerprint list from a JSON array of `{ service, pattern }`
 * @throws ConfigError
 */
export async function loadFingerprints(path = DEFAULT_FINGERPRINTS_PATH): Promise<Fingerprint[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read takeover fingerprints ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!Array.isArray(raw)) {
    throw new ConfigError(`Takeover fingerprints ${path} must be a JSON array`);
  }

  const fingerprints: Fingerprint[] = [];
  raw.forEach((entry: unknown, index) => {
    if (!isFingerprint(entry)) {
      throw new ConfigError(`Takeover fingerprint #${index} in ${path} needs a service and a pattern`);
    }
    fingerprints.push({ service: entry.service, pattern: entry.pattern });
  });
  return fingerprints;
}

export class TakeoverDetector {
  private readonly client: HttpFetcher;
  private readonly fingerprints: readonly Fingerprint[];
  private readonly logger: Logger;

  constructor(client: HttpFetcher, fingerprints: readonly Fingerprint[], logger: Logger = silentLogger()) {
    this.client = client;
    this.fingerprints = fingerprints;
    this.logger = logger;
  }

  static async create(
    client: HttpFetcher,
    options: { fingerprintsPath?: string; logger?: Logger } = {}
  ): Promise<TakeoverDetector> {
    const fingerprints = await loadFingerprints(options.fingerprintsPath);
    return new TakeoverDetector(client, fingerprints, options.logger);
  }

  /**
   * Service id of the first fingerprint found in the body
   */
  match(body: string): string | undefined {
    for (const { service, pattern } of this.fingerprints) {
      if (body.includes(pattern)) {
        return service;
      }
    }
    return undefined;
  }

  /**
   * GET http://<subdomain> once and match the body. Transport failures mean
   * "not vulnerable".
   * @returns the result, with `takeover` set on a match
   */
  async check(result: SubdomainResult): Promise<SubdomainResult> {
    let body: string;
    try {
      const response = await this.client.get(`http://${result.subdomain}`);
      body = response.body;
    } catch (error) {
      this.logger.debug(new TakeoverProbeError(result.subdomain, error).message);
      return result;
    }

    const service = this.match(body);
    if (service === undefined) {
      return result;
    }

    this.logger.debug(`Takeover fingerprint "${service}" matched on ${result.subdomain}`);
    return { ...result, takeover: service };
  }
}
