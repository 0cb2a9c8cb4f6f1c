/**
 * Fixed-size async worker pool over a bounded task queue
 */

import { Channel } from '../utils/channel.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from './errors.js';

/**
 * Unit of work. Returning undefined means "no result to emit".
 */
export type Task<R> = () => Promise<R | undefined> | R | undefined;

export interface WorkerPoolOptions {
  concurrency: number;
  /** Queued tasks before addTask waits (default: concurrency * 2) */
  queueSize?: number;
  /** Buffered results before workers wait on the consumer (default: unbounded) */
  resultBufferSize?: number;
  /** Cancels the pool when aborted */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface PoolStats {
  accepted: number;
  completed: number;
  failed: number;
  /** Accepted tasks discarded by cancellation before they started */
  discarded: number;
}

export class WorkerPool<R> {
  readonly concurrency: number;
  private readonly tasks: Channel<Task<R>>;
  private readonly output: Channel<R>;
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private readonly detach?: () => void;
  private workers?: Promise<void>;
  private stopping?: Promise<void>;
  private counters: PoolStats = { accepted: 0, completed: 0, failed: 0, discarded: 0 };

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${options.concurrency}`);
    }

    this.concurrency = options.concurrency;
    this.tasks = new Channel<Task<R>>(options.queueSize ?? options.concurrency * 2);
    this.output = new Channel<R>(options.resultBufferSize ?? Number.POSITIVE_INFINITY);
    this.logger = options.logger ?? silentLogger();

    const external = options.signal;
    if (external) {
      if (external.aborted) {
        this.cancel();
      } else {
        const onAbort = () => this.cancel();
        external.addEventListener('abort', onAbort, { once: true });
        this.detach = () => external.removeEventListener('abort', onAbort);
      }
    }
  }

  /** Fires when the pool is cancelled */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  stats(): PoolStats {
    return { ...this.counters };
  }

  /**
   * Launch the workers. Calling it again has no effect.
   */
  start(): void {
    if (this.workers) {
      return;
    }
    const loops = Array.from({ length: this.concurrency }, () => this.work());
    this.workers = Promise.all(loops).then(() => undefined);
  }

  /**
   * Queue a task, waiting while the queue is full. Does nothing once the
   * pool is cancelled or stopped.
   */
  async addTask(task: Task<R>): Promise<void> {
    const accepted = await this.tasks.send(task, this.controller.signal);
    if (accepted) {
      this.counters.accepted++;
    }
  }

  /**
   * Results in completion order; ends after stop() once every worker is done.
   */
  results(): AsyncIterable<R> {
    return this.output;
  }

  /**
   * Fire the cancellation signal: queued tasks are discarded and results of
   * tasks still running are dropped.
   */
  cancel(): void {
    if (this.controller.signal.aborted) {
      return;
    }
    this.controller.abort();
    this.tasks.close();
    this.counters.discarded += this.tasks.drain().length;
  }

  /**
   * Close the intake, let workers finish every accepted task, then close
   * the result stream.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Stop and collect every result not yet consumed
   */
  async stopAndDrain(): Promise<R[]> {
    const collected: R[] = [];
    const draining = (async () => {
      for await (const result of this.output) {
        collected.push(result);
      }
    })();

    await this.stop();
    await draining;
    return collected;
  }

  private async shutdown(): Promise<void> {
    this.tasks.close();
    // accepted tasks run even if start() was never called
    this.start();
    await this.workers;
    this.detach?.();
    this.output.close();
  }

  private async work(): Promise<void> {
    const { signal } = this.controller;

    for (;;) {
      const next = await this.tasks.receive();
      if (next.done || signal.aborted) {
        return;
      }

      const result = await this.execute(next.value);
      if (result !== undefined && !signal.aborted) {
        await this.output.send(result, signal);
      }
    }
  }

  private async execute(task: Task<R>): Promise<R | undefined> {
    try {
      const result = await task();
      this.counters.completed++;
      return result;
    } catch (error) {
      this.counters.failed++;
      this.logger.debug(`Worker task failed: ${describeError(error)}`);
      return undefined;
    }
  }
}
