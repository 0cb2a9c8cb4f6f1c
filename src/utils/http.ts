/**
 * HTTP utilities with connection pooling and optional proxying
 */

import type { Readable } from 'node:stream';
import { request, Agent, ProxyAgent, type Dispatcher } from 'undici';
import { ProxyConfigError } from '../core/errors.js';
import type { HttpFetcher, HttpResponse } from '../core/types.js';

export const USER_AGENT = 'subsweep/1.0';

export interface HttpClientOptions {
  /** Whole-request timeout in milliseconds */
  timeout?: number;
  /** http:// or https:// proxy URL */
  proxy?: string;
  maxRedirections?: number;
}

export interface HttpStreamResponse {
  statusCode: number;
  body: Readable;
}

/**
 * Create a persistent HTTP agent with connection pooling
 */
export function createHttpAgent(proxy?: URL): Dispatcher {
  if (proxy) {
    return new ProxyAgent({ uri: proxy.toString(), keepAliveTimeout: 10000 });
  }
  return new Agent({
    connections: 100,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
  });
}

/**
 * HTTP client with timeout and redirect following
 */
export class HttpClient implements HttpFetcher {
  private agent: Dispatcher;
  private timeout: number;
  private maxRedirections: number;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 5000;
    this.maxRedirections = options.maxRedirections ?? 10;
    this.agent = createHttpAgent(options.proxy ? parseProxyUrl(options.proxy) : undefined);
  }

  /**
   * GET a URL and read the whole body
   */
  async get(url: string, options: { headers?: Record<string, string> } = {}): Promise<HttpResponse> {
    const signal = AbortSignal.timeout(this.timeout);
    const response = await request(url, {
      method: 'GET',
      headers: { 'user-agent': USER_AGENT, ...options.headers },
      maxRedirections: this.maxRedirections,
      headersTimeout: this.timeout,
      bodyTimeout: this.timeout,
      dispatcher: this.agent,
      throwOnError: false,
      signal,
    });

    const body = await response.body.text();

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body,
    };
  }

  /**
   * GET a URL and hand back the unread body stream. The caller must consume
   * or destroy it.
   */
  async stream(url: string): Promise<HttpStreamResponse> {
    const response = await request(url, {
      method: 'GET',
      headers: { 'user-agent': USER_AGENT },
      maxRedirections: this.maxRedirections,
      headersTimeout: this.timeout,
      bodyTimeout: this.timeout,
      dispatcher: this.agent,
      throwOnError: false,
    });

    return { statusCode: response.statusCode, body: response.body };
  }

  /**
   * Close the agent and cleanup connections
   */
  async close() {
    await this.agent.close();
  }
}

/**
 * Parse URL safely
 */
export function parseUrl(urlString: string): URL | null {
  try {
    return new URL(urlString);
  } catch {
    return null;
  }
}

/**
 * Validate a proxy URL; only http and https proxies are supported.
 * @throws ProxyConfigError
 */
export function parseProxyUrl(proxy: string): URL {
  const url = parseUrl(proxy);
  if (!url) {
    throw new ProxyConfigError(proxy, 'not a valid URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ProxyConfigError(proxy, `unsupported scheme ${url.protocol.replace(/:$/, '')}`);
  }
  if (!url.hostname) {
    throw new ProxyConfigError(proxy, 'missing host');
  }
  return url;
}
