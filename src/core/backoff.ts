/**
 * Per-root-host exponential backoff with jitter and adaptive recovery
 */

import { extractRootDomain } from '../utils/domain.js';
import type { BackoffSettings } from './types.js';

export interface RateControllerOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Fraction of the computed delay added at random (0 disables jitter) */
  jitter: number;
  /** Uniform [0, 1) source; Math.random by default */
  random?: () => number;
}

interface BackoffState {
  attempts: number;
  totalRequests: number;
}

export const DEFAULT_BACKOFF: BackoffSettings = {
  enabled: true,
  baseDelayMs: 100,
  maxDelayMs: 10000,
  factor: 2,
  jitter: 0.3,
  failThreshold: 3,
};

/**
 * Backoff state is keyed by root host (last two labels), so
 * `a.example.com` and `b.example.com` slow down together.
 */
export class RateController {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;
  private readonly jitter: number;
  private readonly random: () => number;
  private states = new Map<string, BackoffState>();

  constructor(options: RateControllerOptions) {
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.factor = options.factor;
    this.jitter = options.jitter;
    this.random = options.random ?? Math.random;
  }

  /**
   * Register a failed attempt and return how long to wait before the next one
   * @returns delay in milliseconds
   */
  nextDelay(host: string): number {
    const state = this.state(host);
    state.attempts++;
    state.totalRequests++;

    let delay = this.baseDelayMs * Math.pow(this.factor, state.attempts - 1);
    delay += this.random() * this.jitter * delay;

    return Math.min(delay, this.maxDelayMs);
  }

  /**
   * Success walks the attempt counter back by one (not a hard reset) and
   * returns the delay at the reduced count; failure is `nextDelay`.
   */
  adaptiveDelay(host: string, success: boolean): number {
    if (!success) {
      return this.nextDelay(host);
    }

    const state = this.state(host);
    if (state.attempts > 0) {
      state.attempts--;
    }
    return this.delayAt(state.attempts);
  }

  isRateLimited(host: string, threshold: number): boolean {
    return this.getAttempts(host) >= threshold;
  }

  reset(host: string): void {
    const state = this.states.get(extractRootDomain(host));
    if (state) {
      state.attempts = 0;
    }
  }

  /**
   * Clear every attempt counter; request counts are kept
   */
  resetAll(): void {
    for (const state of this.states.values()) {
      state.attempts = 0;
    }
  }

  getAttempts(host: string): number {
    return this.states.get(extractRootDomain(host))?.attempts ?? 0;
  }

  getRequestCount(host: string): number {
    return this.states.get(extractRootDomain(host))?.totalRequests ?? 0;
  }

  private delayAt(attempts: number): number {
    if (attempts === 0) {
      return 0;
    }
    return Math.min(this.baseDelayMs * Math.pow(this.factor, attempts - 1), this.maxDelayMs);
  }

  private state(host: string): BackoffState {
    const key = extractRootDomain(host);
    let state = this.states.get(key);
    if (!state) {
      state = { attempts: 0, totalRequests: 0 };
      this.states.set(key, state);
    }
    return state;
  }
}

export function createRateController(
  settings: BackoffSettings,
  random?: () => number
): RateController {
  return new RateController({
    baseDelayMs: settings.baseDelayMs,
    maxDelayMs: settings.maxDelayMs,
    factor: settings.factor,
    jitter: settings.jitter,
    random,
  });
}
