import type { RemoteTranslateFn, Translator } from './types.js';
import type { AppConfig, CacheBackend } from './config.js';
import { MemoryCacheStore, type CacheStore } from './cache/cache-store.js';
import { JsonFileCacheStore } from './cache/json-file-store.js';
import { SqliteCacheStore } from './cache/sqlite-store.js';
import { ResultCache } from './cache/result-cache.js';
import { ResilientCaller } from './resilient-caller.js';
import { TranslationPipeline } from './pipeline.js';
import { createTranslator } from './providers/index.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export interface TranslationApp {
  pipeline: TranslationPipeline;
  caller: ResilientCaller;
  cache: ResultCache;
  translator: Pick<Translator, 'name' | 'model'>;
  close(): void;
}

export interface BuildOptions {
  /** Replaces the provider built from `config.provider`. */
  remoteFn?: RemoteTranslateFn;
  store?: CacheStore;
  logger?: Logger;
}

export function createCacheStore(backend: CacheBackend, location: string): CacheStore {
  switch (backend) {
    case 'json':
      return new JsonFileCacheStore(location);
    case 'sqlite':
      return new SqliteCacheStore(location);
    case 'memory':
      return new MemoryCacheStore();
  }
}

export function buildTranslationApp(config: AppConfig, options: BuildOptions = {}): TranslationApp {
  const logger = options.logger ?? rootLogger;

  const store = options.store ?? createCacheStore(config.storage.cacheBackend, config.storage.cacheFile);
  const cache = new ResultCache(store, logger);

  const caller = new ResilientCaller({
    cache,
    retry: {
      maxAttempts: config.resilience.maxAttempts,
      baseDelayMs: config.resilience.retryBaseDelayMs,
    },
    timeoutMs: config.resilience.requestTimeoutMs,
    rateLimiter: RateLimiter.perMinute(config.resilience.requestsPerMinute),
    logger,
  });

  let translator: Pick<Translator, 'name' | 'model'>;
  let remoteFn: RemoteTranslateFn;
  if (options.remoteFn) {
    translator = { name: 'custom', model: 'custom' };
    remoteFn = options.remoteFn;
  } else {
    const provider = createTranslator({
      provider: config.provider.name,
      apiKey: config.provider.apiKey,
      model: config.provider.model,
      timeoutMs: config.resilience.requestTimeoutMs,
    });
    translator = provider;
    remoteFn = provider.translate;
  }

  const pipeline = new TranslationPipeline(
    caller,
    remoteFn,
    {
      maxChunkSize: config.translation.maxChunkSize,
      placeholder: config.translation.placeholder,
    },
    logger
  );

  return {
    pipeline,
    caller,
    cache,
    translator,
    close: () => cache.close(),
  };
}
