export interface Chunk {
  readonly index: number;
  readonly text: string;
  readonly length: number;
}

export interface CacheKey {
  targetLanguage: string;
  contentHash: string;
}

export type CallOutcome<T = string> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; reason: Error }
  | { kind: 'fatal'; reason: Error };

export type CallResult =
  | {
      status: 'success';
      text: string;
      source: 'cache' | 'network';
      attempts: number;
      failedAttempts: number;
    }
  | {
      status: 'failed';
      error: Error;
      attempts: number;
      failedAttempts: number;
    };

/**
 * The opaque translation backend. Implementations should honour `signal`
 * so a timed-out request does not keep running.
 */
export type RemoteTranslateFn = (
  text: string,
  targetLanguage: string,
  signal?: AbortSignal
) => Promise<string>;

export interface ApiStats {
  totalCalls: number;
  failedCalls: number;
  cacheHits: number;
  successRate: number;
  cacheEntries: number;
}

export interface PipelineStats {
  targetLanguage: string;
  totalChunks: number;
  translatedChunks: number;
  failedChunks: number;
  cacheHits: number;
  totalCalls: number;
  failedCalls: number;
  cacheEntries: number;
  outputLength: number;
  elapsedMs: number;
}

export interface RateLimitConfig {
  minIntervalMs: number;
}

export interface RateLimitStatus {
  waitMs: number;
}

export interface ProviderConfig {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export interface Translator {
  readonly name: string;
  readonly model: string;

  translate: RemoteTranslateFn;
}

export class TranslationError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

export class TransportError extends TranslationError {
  constructor(message: string, provider: string, statusCode?: number) {
    super(message, provider, statusCode, true);
    this.name = 'TransportError';
  }
}

export class RateLimitError extends TransportError {
  constructor(
    provider: string,
    public readonly retryAfterMs: number
  ) {
    super(`Rate limit exceeded for ${provider}`, provider, 429);
    this.name = 'RateLimitError';
  }
}

export class MalformedResponseError extends TranslationError {
  constructor(message: string, provider: string) {
    super(message, provider, undefined, false);
    this.name = 'MalformedResponseError';
  }
}

export class RetryExhaustedError extends TranslationError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(
      `Request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      lastError instanceof TranslationError ? lastError.provider : 'unknown',
      lastError instanceof TranslationError ? lastError.statusCode : undefined,
      false
    );
    this.name = 'RetryExhaustedError';
  }
}

export class UnsupportedLanguageError extends Error {
  constructor(
    public readonly language: string,
    public readonly supported: readonly string[]
  ) {
    super(`Unsupported language '${language}'. Supported: ${supported.join(', ')}`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class CacheCorruptionError extends Error {
  constructor(
    message: string,
    public readonly location: string
  ) {
    super(message);
    this.name = 'CacheCorruptionError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
