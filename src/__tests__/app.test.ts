import { describe, it, expect, vi } from 'vitest';
import { buildTranslationApp, createCacheStore } from '../app.js';
import type { AppConfig } from '../config.js';
import { MemoryCacheStore } from '../cache/cache-store.js';
import { JsonFileCacheStore } from '../cache/json-file-store.js';
import { SqliteCacheStore } from '../cache/sqlite-store.js';
import { SEA_LION_DEFAULT_MODEL } from '../providers/openai.js';
import type { RemoteTranslateFn } from '../types.js';

function testConfig(overrides: Partial<AppConfig['translation']> = {}): AppConfig {
  return {
    provider: { name: 'sea-lion', apiKey: 'test-secret' },
    translation: { maxChunkSize: 2000, placeholder: '[Translation failed]', ...overrides },
    resilience: { maxAttempts: 2, retryBaseDelayMs: 1, requestsPerMinute: 60000, requestTimeoutMs: 1000 },
    storage: { cacheBackend: 'memory', cacheFile: 'unused.json', bookCacheFile: 'unused.txt' },
  };
}

describe('createCacheStore', () => {
  it('should build the store for each backend', () => {
    expect(createCacheStore('json', 'cache.json')).toBeInstanceOf(JsonFileCacheStore);
    expect(createCacheStore('memory', 'ignored')).toBeInstanceOf(MemoryCacheStore);

    const sqlite = createCacheStore('sqlite', ':memory:');
    expect(sqlite).toBeInstanceOf(SqliteCacheStore);
    sqlite.close?.();
  });
});

describe('buildTranslationApp', () => {
  it('should wire a custom remote function through the pipeline', async () => {
    const remoteFn = vi.fn<RemoteTranslateFn>(async (text, lang) => `${lang}: ${text}`);
    const app = buildTranslationApp(testConfig(), { remoteFn });

    const output = await app.pipeline.translateDocument('One.\n\nTwo.', 'vi');

    expect(output).toBe('vi: One.\n\nTwo.');
    expect(app.translator).toEqual({ name: 'custom', model: 'custom' });
    expect(app.cache.size).toBe(1);
    app.close();
  });

  it('should apply the configured chunk size and placeholder', async () => {
    const remoteFn = vi.fn<RemoteTranslateFn>(async (text) => {
      if (text === 'Two.') throw new Error('unexpected payload');
      return text.toUpperCase();
    });
    const app = buildTranslationApp(testConfig({ maxChunkSize: 5, placeholder: '???' }), { remoteFn });

    const output = await app.pipeline.translateDocument('One.\n\nTwo.', 'id');

    expect(output).toBe('ONE.\n\n???');
    app.close();
  });

  it('should persist into a supplied store', async () => {
    const store = new MemoryCacheStore();
    const app = buildTranslationApp(testConfig(), { remoteFn: async () => 'Halo.', store });

    await app.pipeline.translateDocument('Hello.', 'id');

    expect(Object.values(store.entries())).toEqual(['Halo.']);
  });

  it('should build the configured provider when no remote function is given', () => {
    const app = buildTranslationApp(testConfig());

    expect(app.translator.name).toBe('sea-lion');
    expect(app.translator.model).toBe(SEA_LION_DEFAULT_MODEL);
  });
});
