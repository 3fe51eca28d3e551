import type { CallOutcome } from '../types.js';
import { TranslationError, MalformedResponseError, RateLimitError, RetryExhaustedError } from '../types.js';

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  reason: Error;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the exponential delay added as random jitter. */
  jitterRatio: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryReport<T> {
  outcome: CallOutcome<T>;
  attempts: number;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  jitterRatio: 0,
  isRetryable,
};

const RETRYABLE_MESSAGES = [
  'rate limit',
  '429',
  '500',
  '502',
  '503',
  '504',
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'fetch failed',
  'network',
];

export function isRetryable(error: unknown): boolean {
  if (error instanceof MalformedResponseError) {
    return false;
  }

  if (error instanceof TranslationError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return RETRYABLE_MESSAGES.some((fragment) => message.includes(fragment));
  }

  return false;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function classifyError(error: unknown, retryable = isRetryable): CallOutcome<never> {
  const reason = toError(error);
  return retryable(error) ? { kind: 'retryable', reason } : { kind: 'fatal', reason };
}

/**
 * Run `attemptFn` until it succeeds, fails fatally, or `maxAttempts` is used
 * up. Waits `baseDelayMs * 2^n` between attempts.
 */
export async function retryWithBackoff<T>(
  attemptFn: (attempt: number) => Promise<CallOutcome<T>>,
  config: Partial<RetryConfig> = {}
): Promise<RetryReport<T>> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterRatio, onRetry } = {
    ...DEFAULT_CONFIG,
    ...config,
  };

  let attempts = 0;
  for (;;) {
    const outcome = await attemptFn(attempts);
    attempts++;

    if (outcome.kind !== 'retryable' || attempts >= maxAttempts) {
      return { outcome, attempts };
    }

    const delayMs = calculateDelay(outcome.reason, attempts - 1, baseDelayMs, maxDelayMs, jitterRatio);
    onRetry?.({ attempt: attempts, delayMs, reason: outcome.reason });
    await sleep(delayMs);
  }
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const retryable = config.isRetryable ?? DEFAULT_CONFIG.isRetryable;

  const { outcome, attempts } = await retryWithBackoff<T>(async () => {
    try {
      return { kind: 'success', value: await fn() };
    } catch (error) {
      return classifyError(error, retryable);
    }
  }, config);

  switch (outcome.kind) {
    case 'success':
      return outcome.value;
    case 'fatal':
      throw outcome.reason;
    case 'retryable':
      throw new RetryExhaustedError(attempts, outcome.reason);
  }
}

function calculateDelay(
  error: Error,
  attemptIndex: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterRatio: number
): number {
  if (error instanceof RateLimitError && error.retryAfterMs > 0) {
    return Math.min(error.retryAfterMs, maxDelayMs);
  }

  const exponentialDelay = baseDelayMs * Math.pow(2, attemptIndex);
  const jitter = jitterRatio > 0 ? Math.random() * jitterRatio * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
