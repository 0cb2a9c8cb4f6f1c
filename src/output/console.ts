/**
 * Terminal rendering of results
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { ResultSink, SubdomainResult } from '../core/types.js';

export interface ConsoleSinkOptions {
  /** Defaults to standard output */
  write?: (line: string) => void;
  /** Force colour on or off; detected from the terminal otherwise */
  color?: boolean;
}

export function formatResult(result: SubdomainResult, chalk: ChalkInstance = new Chalk({ level: 0 })): string {
  if (result.takeover) {
    return `${chalk.red('!')}  ${result.subdomain} | ${chalk.red(`Possible Takeover: ${result.takeover}`)}`;
  }
  if (result.ips && result.ips.length > 0) {
    return `${chalk.green('+')}  ${result.subdomain} → ${chalk.gray(result.ips.join(', '))}`;
  }
  return `${chalk.green('+')}  ${result.subdomain}`;
}

export class ConsoleSink implements ResultSink {
  private readonly write: (line: string) => void;
  private readonly chalk: ChalkInstance;
  private count = 0;

  constructor(options: ConsoleSinkOptions = {}) {
    this.write = options.write ?? ((line) => process.stdout.write(`${line}\n`));
    this.chalk = options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });
  }

  /** Results printed so far */
  get printed(): number {
    return this.count;
  }

  accept(result: SubdomainResult): void {
    this.count++;
    this.write(formatResult(result, this.chalk));
  }

  async close(): Promise<void> {
    // nothing buffered
  }
}
