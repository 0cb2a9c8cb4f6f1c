/**
 * Candidate word sources: local files, remote lists and in-memory arrays,
 * all readable incrementally.
 */

import { createReadStream } from 'node:fs';
import { access, stat, constants } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import type { Readable } from 'node:stream';
import { HttpClient, type HttpStreamResponse } from '../utils/http.js';
import { WordlistLoadError } from './errors.js';
import type { WordlistSpec } from './types.js';

export const DEFAULT_WORDLIST_URL =
  'https://raw.githubusercontent.com/danielmiessler/SecLists/refs/heads/master/Discovery/DNS/subdomains-top1million-110000.txt';

/** Sources with more words than this are streamed rather than loaded */
export const STREAMING_THRESHOLD = 10000;

const LINE_BREAK = /\r\n|\n|\r/;

/** The part of HttpClient a remote source needs */
export type StreamFetcher = Pick<HttpClient, 'stream'>;

export interface WordSource {
  readonly description: string;
  /** Non-empty trimmed words; every call starts a fresh pass */
  words(): AsyncIterable<string>;
  /** Number of words, or undefined when it cannot be known up front */
  count(): Promise<number | undefined>;
  /** Release anything held open (an unread download) */
  close(): Promise<void>;
}

/**
 * Split a byte or text stream into trimmed, non-empty records
 */
export async function* readWords(input: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  for await (const chunk of input) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    const lines = pending.split(LINE_BREAK);
    pending = lines.pop() ?? '';

    for (const line of lines) {
      const word = line.trim();
      if (word) {
        yield word;
      }
    }
  }

  const last = (pending + decoder.end()).trim();
  if (last) {
    yield last;
  }
}

/**
 * Count records in a file without loading it
 */
export async function countLines(filePath: string): Promise<number> {
  let count = 0;
  for await (const _word of readWords(createReadStream(filePath))) {
    count++;
  }
  return count;
}

/**
 * Re-throw read failures as WordlistLoadError
 */
async function* guarded(source: string, words: AsyncIterable<string>): AsyncGenerator<string> {
  try {
    yield* words;
  } catch (error) {
    if (error instanceof WordlistLoadError) {
      throw error;
    }
    throw new WordlistLoadError(source, error);
  }
}

export class ListWordSource implements WordSource {
  readonly description: string;
  private readonly list: readonly string[];

  constructor(words: readonly string[], description = 'in-memory list') {
    this.list = words.map((word) => word.trim()).filter((word) => word.length > 0);
    this.description = description;
  }

  async *words(): AsyncGenerator<string> {
    yield* this.list;
  }

  async count(): Promise<number> {
    return this.list.length;
  }

  async close(): Promise<void> {
    // nothing held
  }
}

export class FileWordSource implements WordSource {
  readonly description: string;
  private readonly path: string;
  private size?: number;

  constructor(path: string) {
    this.path = path;
    this.description = path;
  }

  /**
   * @throws WordlistLoadError when the file is missing, not a file, or unreadable
   */
  static async open(path: string): Promise<FileWordSource> {
    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new Error('not a regular file');
      }
      await access(path, constants.R_OK);
    } catch (error) {
      throw new WordlistLoadError(path, error);
    }
    return new FileWordSource(path);
  }

  words(): AsyncIterable<string> {
    return guarded(this.path, readWords(createReadStream(this.path)));
  }

  async count(): Promise<number> {
    if (this.size === undefined) {
      try {
        this.size = await countLines(this.path);
      } catch (error) {
        throw new WordlistLoadError(this.path, error);
      }
    }
    return this.size;
  }

  async close(): Promise<void> {
    // streams are opened per pass and closed by it
  }
}

/**
 * Remote newline-delimited list. The first pass reuses the response opened
 * to validate the URL; later passes download again.
 */
export class UrlWordSource implements WordSource {
  readonly description: string;
  private readonly url: string;
  private readonly client: StreamFetcher;
  private readonly owned?: HttpClient;
  private firstBody?: Readable;

  private constructor(url: string, client: StreamFetcher, body: Readable, owned?: HttpClient) {
    this.url = url;
    this.client = client;
    this.description = url;
    this.firstBody = body;
    this.owned = owned;
  }

  /**
   * Without a client, one is created and closed with the source.
   * @throws WordlistLoadError when the URL is unreachable or does not answer 200
   */
  static async open(url: string, client?: StreamFetcher): Promise<UrlWordSource> {
    const owned = client ? undefined : new HttpClient({ timeout: 30000 });
    const fetcher = client ?? owned;
    if (!fetcher) {
      throw new WordlistLoadError(url, new Error('no HTTP client'));
    }
    try {
      const body = await UrlWordSource.fetch(url, fetcher);
      return new UrlWordSource(url, fetcher, body, owned);
    } catch (error) {
      await owned?.close();
      throw error;
    }
  }

  private static async fetch(url: string, client: StreamFetcher): Promise<Readable> {
    let response: HttpStreamResponse;
    try {
      response = await client.stream(url);
    } catch (error) {
      throw new WordlistLoadError(url, error);
    }
    if (response.statusCode !== 200) {
      response.body.destroy();
      throw new WordlistLoadError(url, new Error(`status code ${response.statusCode}`));
    }
    return response.body;
  }

  words(): AsyncIterable<string> {
    return guarded(this.url, this.pass());
  }

  private async *pass(): AsyncGenerator<string> {
    const body = this.firstBody ?? (await UrlWordSource.fetch(this.url, this.client));
    this.firstBody = undefined;
    try {
      yield* readWords(body);
    } finally {
      body.destroy();
    }
  }

  async count(): Promise<undefined> {
    return undefined;
  }

  async close(): Promise<void> {
    this.firstBody?.destroy();
    this.firstBody = undefined;
    await this.owned?.close();
  }
}

export interface OpenWordSourceOptions {
  /** Used for remote sources; one is created on demand otherwise */
  client?: StreamFetcher;
}

/**
 * Open and validate a word source before any scanning starts
 * @throws WordlistLoadError
 */
export async function openWordSource(
  wordlist: WordlistSpec,
  options: OpenWordSourceOptions = {}
): Promise<WordSource> {
  switch (wordlist.kind) {
    case 'file':
      return await FileWordSource.open(wordlist.path);
    case 'url':
      return await UrlWordSource.open(wordlist.url, options.client);
    case 'list':
      return new ListWordSource(wordlist.words);
  }
}

/**
 * Read a whole source into memory; the result yields the same words
 */
export async function materialize(source: WordSource): Promise<ListWordSource> {
  const words: string[] = [];
  for await (const word of source.words()) {
    words.push(word);
  }
  await source.close();
  return new ListWordSource(words, source.description);
}
