export type {
  Chunk,
  CacheKey,
  CallOutcome,
  CallResult,
  RemoteTranslateFn,
  ApiStats,
  PipelineStats,
  RateLimitConfig,
  RateLimitStatus,
  ProviderConfig,
  Translator,
} from './types.js';

export {
  TranslationError,
  TransportError,
  RateLimitError,
  MalformedResponseError,
  RetryExhaustedError,
  UnsupportedLanguageError,
  CacheCorruptionError,
  ConfigurationError,
} from './types.js';

export { chunkText, normalizeWhitespace, splitParagraphs, splitSentences, joinChunks, PARAGRAPH_SEPARATOR } from './chunker.js';

export { ResultCache } from './cache/result-cache.js';
export { MemoryCacheStore, type CacheStore } from './cache/cache-store.js';
export { JsonFileCacheStore } from './cache/json-file-store.js';
export { SqliteCacheStore } from './cache/sqlite-store.js';

export { ResilientCaller, type ResilientCallerOptions } from './resilient-caller.js';
export {
  TranslationPipeline,
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  type PipelineProgress,
  type ChunkEvent,
  type ChunkFailedEvent,
} from './pipeline.js';

export { OpenAITranslator, createSeaLionTranslator, type OpenAIConfig } from './providers/openai.js';
export { AnthropicTranslator, type AnthropicConfig } from './providers/anthropic.js';
export { GeminiTranslator, type GeminiConfig } from './providers/gemini.js';
export { createTranslator, PROVIDER_NAMES, type ProviderName, type TranslatorSettings } from './providers/index.js';

export { BookDownloader, DEFAULT_BOOK_URL, type BookDownloaderConfig } from './source/book-downloader.js';

export { loadConfig, type AppConfig, type CacheBackend } from './config.js';
export { buildTranslationApp, createCacheStore, type TranslationApp, type BuildOptions } from './app.js';

export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_CODES,
  isSupportedLanguage,
  assertSupportedLanguage,
  getLanguageName,
  type LanguageCode,
} from './languages.js';

export { RateLimiter } from './utils/rate-limiter.js';
export { withRetry, retryWithBackoff, isRetryable, classifyError, type RetryConfig, type RetryEvent } from './utils/retry.js';
export { ContentHasher } from './utils/content-hash.js';
export { logger } from './utils/logger.js';

export { getTranslationSystemPrompt, getTranslationUserPrompt } from './prompts.js';
