import type { RateLimitConfig, RateLimitStatus } from '../types.js';
import { sleep } from './retry.js';

/**
 * Keeps at least `minIntervalMs` between the end of one request and the start
 * of the next. Callers that never reach the network never wait.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private lastRequestEnd: number | null = null;

  constructor(config: RateLimitConfig) {
    if (config.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must not be negative, got ${config.minIntervalMs}`);
    }
    this.minIntervalMs = config.minIntervalMs;
  }

  static perMinute(requestsPerMinute: number): RateLimiter {
    if (requestsPerMinute <= 0) {
      throw new RangeError(`requestsPerMinute must be positive, got ${requestsPerMinute}`);
    }
    return new RateLimiter({ minIntervalMs: Math.ceil(60000 / requestsPerMinute) });
  }

  getStatus(): RateLimitStatus {
    if (this.lastRequestEnd === null) {
      return { waitMs: 0 };
    }
    const elapsed = Date.now() - this.lastRequestEnd;
    return { waitMs: Math.max(0, this.minIntervalMs - elapsed) };
  }

  async acquire(): Promise<void> {
    const { waitMs } = this.getStatus();
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }

  release(): void {
    this.lastRequestEnd = Date.now();
  }
}
