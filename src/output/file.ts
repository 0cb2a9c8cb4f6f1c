/**
 * Result persistence, streamed as results arrive
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import type { ResultSink, SubdomainResult } from '../core/types.js';

abstract class StreamSink implements ResultSink {
  readonly path: string;
  private readonly stream: WriteStream;
  private failure?: Error;
  private closing?: Promise<void>;

  protected constructor(path: string, header = '') {
    this.path = path;
    this.stream = createWriteStream(path, { encoding: 'utf-8' });
    // open and write errors surface on the next write or on close
    this.stream.on('error', (error) => {
      this.failure = error;
    });
    if (header) {
      this.stream.write(header);
    }
  }

  abstract accept(result: SubdomainResult): Promise<void>;

  protected abstract trailer(): string;

  protected async write(chunk: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.stream.write(chunk)) {
      await once(this.stream, 'drain');
    }
  }

  /**
   * Write the trailer and wait until everything is flushed
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.finish();
    }
    return this.closing;
  }

  private async finish(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.stream.end(this.trailer());
    await finished(this.stream);
  }
}

/**
 * One hostname per line
 */
export class TextFileSink extends StreamSink {
  constructor(path: string) {
    super(path);
  }

  async accept(result: SubdomainResult): Promise<void> {
    await this.write(`${result.subdomain}\n`);
  }

  protected trailer(): string {
    return '';
  }
}

/**
 * `{ "domain": ..., "subdomains": [ ... ] }`, one result per line
 */
export class JsonFileSink extends StreamSink {
  private first = true;

  constructor(path: string, domain: string) {
    super(path, `{\n  "domain": ${JSON.stringify(domain)},\n  "subdomains": [\n`);
  }

  async accept(result: SubdomainResult): Promise<void> {
    const separator = this.first ? '' : ',\n';
    this.first = false;
    await this.write(`${separator}    ${JSON.stringify(result)}`);
  }

  protected trailer(): string {
    return this.first ? '  ]\n}\n' : '\n  ]\n}\n';
  }
}
