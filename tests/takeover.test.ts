/**
 * Tests for TakeoverDetector
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TakeoverDetector, loadFingerprints } from '../src/core/takeover.js';
import { ConfigError } from '../src/core/errors.js';
import type { HttpResponse } from '../src/core/types.js';

function answering(body: string) {
  return {
    get: vi.fn(async (_url: string): Promise<HttpResponse> => ({ statusCode: 404, headers: {}, body })),
  };
}

describe('loadFingerprints', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'subsweep-fingerprints-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load the bundled list in declared order', async () => {
    const fingerprints = await loadFingerprints();

    expect(fingerprints).toHaveLength(47);
    expect(fingerprints[0]).toEqual({ service: 'aws', pattern: 'NoSuchBucket' });
    expect(fingerprints[1]).toEqual({ service: 'aws_s3', pattern: 'The specified bucket does not exist' });
  });

  it('should reject entries without a pattern', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, JSON.stringify([{ service: 'github', pattern: 'x' }, { service: 'heroku' }]));

    await expect(loadFingerprints(path)).rejects.toThrow(
      `Takeover fingerprint #1 in ${path} needs a service and a pattern`
    );
  });

  it('should reject unreadable files', async () => {
    await expect(loadFingerprints(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('TakeoverDetector', () => {
  describe('match', () => {
    it('should return the first fingerprint found in declared order', () => {
      const detector = new TakeoverDetector(answering(''), [
        { service: 'first', pattern: 'bucket' },
        { service: 'second', pattern: 'missing bucket' },
      ]);

      expect(detector.match('a missing bucket page')).toBe('first');
      expect(detector.match('nothing here')).toBeUndefined();
    });

    it('should resolve overlapping patterns of the bundled list deterministically', async () => {
      const detector = await TakeoverDetector.create(answering(''));

      expect(detector.match('<Code>NoSuchBucket</Code>')).toBe('aws');
      expect(detector.match('The specified bucket does not exist.')).toBe('aws_s3');
      expect(detector.match('404 The specified container does not exist')).toBe('azure_blob');
      expect(detector.match('The specified container does not exist')).toBe('azure');
    });

    it('should reach every entry of the bundled list', async () => {
      const fingerprints = await loadFingerprints();
      const detector = new TakeoverDetector(answering(''), fingerprints);

      for (const { service, pattern } of fingerprints) {
        expect(detector.match(pattern)).toBe(service);
      }
      expect(new Set(fingerprints.map((fingerprint) => fingerprint.pattern)).size).toBe(fingerprints.length);
    });
  });

  describe('check', () => {
    it('should GET the host over http and tag a match', async () => {
      const http = answering("<h1>There isn't a GitHub Pages site here.</h1>");
      const detector = await TakeoverDetector.create(http);

      const result = await detector.check({ subdomain: 'docs.example.com' });

      expect(http.get).toHaveBeenCalledWith('http://docs.example.com');
      expect(result).toEqual({ subdomain: 'docs.example.com', takeover: 'github' });
    });

    it('should leave the result untouched without a match', async () => {
      const detector = new TakeoverDetector(answering('<h1>Welcome</h1>'), [{ service: 'heroku', pattern: 'No such app' }]);
      const input = { subdomain: 'www.example.com', ips: ['192.0.2.1'] };

      expect(await detector.check(input)).toBe(input);
    });

    it('should treat transport failures as not vulnerable', async () => {
      const http = {
        get: vi.fn(async (_url: string): Promise<HttpResponse> => {
          throw new Error('connect ETIMEDOUT');
        }),
      };
      const detector = new TakeoverDetector(http, [{ service: 'heroku', pattern: 'No such app' }]);
      const input = { subdomain: 'slow.example.com' };

      expect(await detector.check(input)).toBe(input);
    });
  });
});
