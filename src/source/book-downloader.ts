import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { TransportError } from '../types.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface BookDownloaderConfig {
  url: string;
  cacheFile: string;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

export const DEFAULT_BOOK_URL = 'https://www.gutenberg.org/cache/epub/16317/pg16317.txt';

/**
 * Fetches the source document once and keeps it on disk; later runs read the
 * cached copy without touching the network.
 */
export class BookDownloader {
  private readonly url: string;
  private readonly cacheFile: string;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly logger: Logger;

  constructor(config: BookDownloaderConfig) {
    this.url = config.url;
    this.cacheFile = config.cacheFile;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.retry = config.retry ?? {};
    this.logger = (config.logger ?? rootLogger).child({ component: 'BookDownloader' });
  }

  async download(): Promise<string> {
    if (existsSync(this.cacheFile)) {
      this.logger.info({ cacheFile: this.cacheFile }, 'Using cached book');
      return readFile(this.cacheFile, 'utf8');
    }

    this.logger.info({ url: this.url }, 'Downloading book');
    const text = await withRetry(() => this.fetchText(), this.retry);

    await mkdir(path.dirname(path.resolve(this.cacheFile)), { recursive: true });
    await writeFile(this.cacheFile, text, 'utf8');
    this.logger.info({ cacheFile: this.cacheFile, characters: text.length }, 'Book downloaded and cached');
    return text;
  }

  private async fetchText(): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.url, { signal: controller.signal });
      if (!response.ok) {
        throw new TransportError(
          `Failed to download book: HTTP ${response.status} ${response.statusText}`,
          'http',
          response.status
        );
      }
      return await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Book download timed out after ${this.timeoutMs}ms`, 'http');
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
