import type { CacheKey } from '../types.js';
import { CacheCorruptionError } from '../types.js';
import { ContentHasher } from '../utils/content-hash.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { CacheStore } from './cache-store.js';

/**
 * Translations keyed by target language and content hash. Every `put` is
 * flushed straight away so an interrupted run keeps its completed chunks.
 */
export class ResultCache {
  private entries = new Map<string, string>();
  private readonly logger: Logger;

  constructor(
    private readonly store: CacheStore,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'ResultCache', location: store.location });
    this.load();
  }

  load(): void {
    try {
      this.entries = this.store.load();
      this.logger.debug({ entries: this.entries.size }, 'Translation cache loaded');
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      this.logger.warn({ err: error }, 'Could not read translation cache, starting empty');
      this.entries = new Map();
    }
  }

  get(key: CacheKey): string | undefined {
    return this.entries.get(ContentHasher.serialize(key));
  }

  has(key: CacheKey): boolean {
    return this.entries.has(ContentHasher.serialize(key));
  }

  put(key: CacheKey, text: string): void {
    this.entries.set(ContentHasher.serialize(key), text);
    this.flush();
  }

  // Write failures are logged; the in-memory entry is kept.
  flush(): void {
    try {
      this.store.flush(this.entries);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to persist translation cache');
    }
  }

  get size(): number {
    return this.entries.size;
  }

  close(): void {
    this.store.close?.();
  }
}
