import type { ApiStats, CallOutcome, CallResult, RemoteTranslateFn } from './types.js';
import { TransportError, RetryExhaustedError } from './types.js';
import type { ResultCache } from './cache/result-cache.js';
import { ContentHasher } from './utils/content-hash.js';
import { classifyError, retryWithBackoff, type RetryConfig } from './utils/retry.js';
import type { RateLimiter } from './utils/rate-limiter.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export interface ResilientCallerOptions {
  cache: ResultCache;
  retry?: Partial<Omit<RetryConfig, 'onRetry'>>;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Wraps a single remote translation with caching, a per-attempt timeout,
 * rate limiting and retry with exponential backoff.
 */
export class ResilientCaller {
  private readonly cache: ResultCache;
  private readonly retryConfig: Partial<Omit<RetryConfig, 'onRetry'>>;
  private readonly timeoutMs: number;
  private readonly rateLimiter?: RateLimiter;
  private readonly logger: Logger;

  private totalCalls = 0;
  private failedCalls = 0;
  private cacheHits = 0;

  constructor(options: ResilientCallerOptions) {
    this.cache = options.cache;
    this.retryConfig = options.retry ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimiter = options.rateLimiter;
    this.logger = (options.logger ?? rootLogger).child({ component: 'ResilientCaller' });
  }

  /**
   * Translate one chunk. Per-chunk failures are returned as data, never thrown.
   */
  async attempt(
    chunkText: string,
    targetLanguage: string,
    remoteFn: RemoteTranslateFn
  ): Promise<CallResult> {
    const key = ContentHasher.cacheKey(chunkText, targetLanguage);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.cacheHits++;
      return { status: 'success', text: cached, source: 'cache', attempts: 0, failedAttempts: 0 };
    }

    let failedAttempts = 0;
    const { outcome, attempts } = await retryWithBackoff<string>(
      async () => {
        const result = await this.invokeOnce(chunkText, targetLanguage, remoteFn);
        this.totalCalls++;
        if (result.kind !== 'success') {
          this.failedCalls++;
          failedAttempts++;
        }
        return result;
      },
      {
        ...this.retryConfig,
        onRetry: ({ attempt, delayMs, reason }) => {
          this.logger.warn(
            { attempt, delayMs, err: reason, targetLanguage, hash: key.contentHash },
            `Translation call failed, retrying in ${delayMs / 1000} seconds`
          );
        },
      }
    );

    switch (outcome.kind) {
      case 'success':
        this.cache.put(key, outcome.value);
        return { status: 'success', text: outcome.value, source: 'network', attempts, failedAttempts };
      case 'fatal':
        return { status: 'failed', error: outcome.reason, attempts, failedAttempts };
      case 'retryable':
        return {
          status: 'failed',
          error: new RetryExhaustedError(attempts, outcome.reason),
          attempts,
          failedAttempts,
        };
    }
  }

  async call(chunkText: string, targetLanguage: string, remoteFn: RemoteTranslateFn): Promise<string> {
    const result = await this.attempt(chunkText, targetLanguage, remoteFn);
    if (result.status === 'failed') {
      throw result.error;
    }
    return result.text;
  }

  private async invokeOnce(
    chunkText: string,
    targetLanguage: string,
    remoteFn: RemoteTranslateFn
  ): Promise<CallOutcome<string>> {
    await this.rateLimiter?.acquire();

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TransportError(`Request timed out after ${this.timeoutMs}ms`, 'caller'));
      }, this.timeoutMs);
    });

    try {
      const value = await Promise.race([
        remoteFn(chunkText, targetLanguage, controller.signal),
        timeout,
      ]);
      return { kind: 'success', value };
    } catch (error) {
      return classifyError(error, this.retryConfig.isRetryable);
    } finally {
      clearTimeout(timer);
      this.rateLimiter?.release();
    }
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  getApiStats(): ApiStats {
    return {
      totalCalls: this.totalCalls,
      failedCalls: this.failedCalls,
      cacheHits: this.cacheHits,
      successRate:
        Math.round(((this.totalCalls - this.failedCalls) / Math.max(this.totalCalls, 1)) * 10000) / 100,
      cacheEntries: this.cache.size,
    };
  }
}
