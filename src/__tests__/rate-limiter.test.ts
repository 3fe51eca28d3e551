import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RateLimiter } from '../utils/rate-limiter.js';

describe('RateLimiter', () => {
  let rateLimiter: RateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    rateLimiter = new RateLimiter({ minIntervalMs: 6000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should not wait before the first request', () => {
    expect(rateLimiter.getStatus().waitMs).toBe(0);
  });

  it('should resolve acquire immediately when idle', async () => {
    const acquired = vi.fn();
    void rateLimiter.acquire().then(acquired);

    await vi.advanceTimersByTimeAsync(0);
    expect(acquired).toHaveBeenCalledTimes(1);
  });

  it('should require the full interval after a request finishes', () => {
    rateLimiter.release();
    expect(rateLimiter.getStatus().waitMs).toBe(6000);

    vi.advanceTimersByTime(2500);
    expect(rateLimiter.getStatus().waitMs).toBe(3500);
  });

  it('should wait out the remaining interval in acquire', async () => {
    rateLimiter.release();
    vi.advanceTimersByTime(1000);

    const acquired = vi.fn();
    void rateLimiter.acquire().then(acquired);

    await vi.advanceTimersByTimeAsync(4999);
    expect(acquired).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(acquired).toHaveBeenCalledTimes(1);
  });

  it('should not wait once the interval has passed', () => {
    rateLimiter.release();
    vi.advanceTimersByTime(60000);
    expect(rateLimiter.getStatus().waitMs).toBe(0);
  });

  it('should derive the interval from requests per minute', () => {
    const limiter = RateLimiter.perMinute(10);
    limiter.release();
    expect(limiter.getStatus().waitMs).toBe(6000);
  });

  it('should reject invalid limits', () => {
    expect(() => RateLimiter.perMinute(0)).toThrow(RangeError);
    expect(() => new RateLimiter({ minIntervalMs: -1 })).toThrow(RangeError);
  });
});
