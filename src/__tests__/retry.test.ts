import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { withRetry, retryWithBackoff, isRetryable, type RetryEvent } from '../utils/retry.js';
import type { CallOutcome } from '../types.js';
import {
  TranslationError,
  TransportError,
  RateLimitError,
  MalformedResponseError,
  RetryExhaustedError,
} from '../types.js';

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return result on first success', async () => {
    const fn = vi.fn().mockResolvedValue('success');
    const result = await withRetry(fn);
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on retryable error', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransportError('Service Unavailable', 'test', 503))
      .mockResolvedValue('success');

    const promise = withRetry(fn, { baseDelayMs: 100 });
    await vi.advanceTimersByTimeAsync(200);
    const result = await promise;

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry on non-retryable error', async () => {
    const fn = vi.fn().mockRejectedValue(new TranslationError('auth error', 'test', 401, false));

    await expect(withRetry(fn)).rejects.toThrow('auth error');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not retry a malformed response', async () => {
    const error = new MalformedResponseError('missing choices', 'test');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should use exponential backoff', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransportError('error', 'test', 500))
      .mockRejectedValueOnce(new TransportError('error', 'test', 500))
      .mockResolvedValue('success');

    const promise = withRetry(fn, { baseDelayMs: 100 });

    await vi.advanceTimersByTimeAsync(150);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(300);
    const result = await promise;
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should give up after maxAttempts with an aggregated error', async () => {
    const error = new TransportError('connection reset', 'test');
    const fn = vi.fn().mockRejectedValue(error);

    const promise = withRetry(fn, { maxAttempts: 3, baseDelayMs: 100 }).catch((e: unknown) => e);

    await vi.runAllTimersAsync();

    const result = await promise;
    expect(result).toBeInstanceOf(RetryExhaustedError);
    expect(result).toMatchObject({
      attempts: 3,
      lastError: error,
      message: 'Request failed after 3 attempts: connection reset',
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should use retryAfterMs from RateLimitError', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitError('test', 5000))
      .mockResolvedValue('success');

    const promise = withRetry(fn, { baseDelayMs: 100 });

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(5000);
    const result = await promise;
    expect(result).toBe('success');
  });

  it('should handle generic network errors', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValue('success');

    const promise = withRetry(fn, { baseDelayMs: 100 });
    await vi.advanceTimersByTimeAsync(200);

    expect(await promise).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should honour a custom retryability predicate', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('not found'));

    const promise = withRetry(fn, {
      maxAttempts: 2,
      baseDelayMs: 10,
      isRetryable: () => true,
    }).catch((e: unknown) => e);
    await vi.runAllTimersAsync();

    expect(await promise).toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('retryWithBackoff', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const alwaysRetryable = async (): Promise<CallOutcome<string>> => ({
    kind: 'retryable',
    reason: new TransportError('down', 'test', 502),
  });

  it('should wait 2s then 4s with the default configuration', async () => {
    const events: RetryEvent[] = [];
    const promise = retryWithBackoff(alwaysRetryable, { onRetry: (event) => events.push(event) });

    await vi.runAllTimersAsync();
    const report = await promise;

    expect(report.attempts).toBe(3);
    expect(report.outcome.kind).toBe('retryable');
    expect(events.map((e) => [e.attempt, e.delayMs])).toEqual([
      [1, 2000],
      [2, 4000],
    ]);
  });

  it('should not start the next attempt before the backoff elapses', async () => {
    const attemptFn = vi.fn(alwaysRetryable);
    const promise = retryWithBackoff(attemptFn);

    await vi.advanceTimersByTimeAsync(1999);
    expect(attemptFn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(attemptFn).toHaveBeenCalledTimes(2);

    await vi.runAllTimersAsync();
    await promise;
    expect(attemptFn).toHaveBeenCalledTimes(3);
  });

  it('should stop at the first fatal outcome', async () => {
    const attemptFn = vi.fn(
      async (): Promise<CallOutcome<string>> => ({
        kind: 'fatal',
        reason: new MalformedResponseError('bad shape', 'test'),
      })
    );

    const report = await retryWithBackoff(attemptFn);

    expect(report.attempts).toBe(1);
    expect(report.outcome.kind).toBe('fatal');
  });

  it('should cap delays at maxDelayMs', async () => {
    const delays: number[] = [];
    const promise = retryWithBackoff(alwaysRetryable, {
      baseDelayMs: 100,
      maxDelayMs: 150,
      onRetry: ({ delayMs }) => delays.push(delayMs),
    });

    await vi.runAllTimersAsync();
    await promise;

    expect(delays).toEqual([100, 150]);
  });

  it('should pass the attempt index to the attempt function', async () => {
    const seen: number[] = [];
    const promise = retryWithBackoff(
      async (attempt): Promise<CallOutcome<string>> => {
        seen.push(attempt);
        return attempt < 2
          ? { kind: 'retryable', reason: new TransportError('down', 'test') }
          : { kind: 'success', value: 'ok' };
      },
      { baseDelayMs: 10 }
    );

    await vi.runAllTimersAsync();
    const report = await promise;

    expect(seen).toEqual([0, 1, 2]);
    expect(report.outcome).toEqual({ kind: 'success', value: 'ok' });
  });
});

describe('isRetryable', () => {
  it('should follow the retryable flag of translation errors', () => {
    expect(isRetryable(new TransportError('x', 'test', 404))).toBe(true);
    expect(isRetryable(new TranslationError('x', 'test', 400, false))).toBe(false);
  });

  it('should never retry malformed responses', () => {
    expect(isRetryable(new MalformedResponseError('x', 'test'))).toBe(false);
  });

  it('should recognise network failures in generic errors', () => {
    expect(isRetryable(new Error('read ECONNRESET'))).toBe(true);
    expect(isRetryable(new Error('Request timeout'))).toBe(true);
    expect(isRetryable(new Error('HTTP 503 Service Unavailable'))).toBe(true);
  });

  it('should treat other errors as fatal', () => {
    expect(isRetryable(new Error('Cannot read properties of undefined'))).toBe(false);
    expect(isRetryable('boom')).toBe(false);
  });
});
