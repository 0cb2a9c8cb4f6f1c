/**
 * Helpers shared by the CLI commands
 */

import { readFile } from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';
import { cleanDomain } from '../utils/domain.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ConsoleSink, JsonFileSink, MultiSink, TextFileSink } from '../output/index.js';
import type { ResultSink, SubdomainResult } from '../core/types.js';

export interface OutputFlags {
  output?: string;
  jsonOutput?: string;
  quiet: boolean;
  debug: boolean;
}

/**
 * Commander argument parser for integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function createCliLogger(flags: Pick<OutputFlags, 'quiet' | 'debug'>): Logger {
  return createLogger({ level: flags.debug ? 'debug' : 'info', quiet: flags.quiet });
}

/**
 * Target domains from `-d` or from a `-l` file (one per line, `#` comments)
 */
export async function resolveTargets(domain?: string, listPath?: string): Promise<string[]> {
  if (domain) {
    return [cleanDomain(domain)];
  }
  if (!listPath) {
    throw new Error('Provide a target with -d/--domain or -l/--list');
  }

  const content = await readFile(listPath, 'utf-8');
  const domains = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map(cleanDomain)
    .filter((line) => line.length > 0);

  if (domains.length === 0) {
    throw new Error(`No domains found in ${listPath}`);
  }
  return [...new Set(domains)];
}

/**
 * Sinks that outlive a single scan: the files stay open across every domain
 * of a list and are closed once by the command.
 */
export class CommandOutput {
  readonly console: ConsoleSink;
  private readonly files: ResultSink[] = [];
  private readonly paths: string[] = [];

  constructor(flags: OutputFlags, domains: readonly string[]) {
    this.console = new ConsoleSink();
    if (flags.output) {
      this.files.push(new TextFileSink(flags.output));
      this.paths.push(flags.output);
    }
    if (flags.jsonOutput) {
      this.files.push(new JsonFileSink(flags.jsonOutput, domains.join(',')));
      this.paths.push(flags.jsonOutput);
    }
  }

  /**
   * Sink for one scan; closing it leaves the files open
   */
  forScan(): ResultSink {
    const sinks = new MultiSink([this.console, ...this.files]);
    return {
      accept: (result: SubdomainResult) => sinks.accept(result),
      close: async () => undefined,
    };
  }

  async close(logger: Logger): Promise<void> {
    await new MultiSink(this.files).close();
    for (const path of this.paths) {
      logger.success(`Results saved to ${path}`);
    }
  }
}

/**
 * Abort controller wired to Ctrl-C for the duration of `body`
 */
export async function withInterrupt<T>(logger: Logger, body: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, stopping workers...');
    controller.abort();
  };

  process.once('SIGINT', onInterrupt);
  try {
    return await body(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
