import type { ResultSink, SubdomainResult } from '../core/types.js';

/**
 * Fan results out to several sinks
 */
export class MultiSink implements ResultSink {
  private readonly sinks: readonly ResultSink[];

  constructor(sinks: readonly ResultSink[]) {
    this.sinks = sinks;
  }

  async accept(result: SubdomainResult): Promise<void> {
    for (const sink of this.sinks) {
      await sink.accept(result);
    }
  }

  /**
   * Close every sink, then rethrow the first failure
   */
  async close(): Promise<void> {
    const settled = await Promise.allSettled(this.sinks.map((sink) => sink.close()));
    const failed = settled.find((entry): entry is PromiseRejectedResult => entry.status === 'rejected');
    if (failed) {
      throw failed.reason;
    }
  }
}
