import { createHash } from 'crypto';
import type { CacheKey } from '../types.js';

export class ContentHasher {
  /**
   * SHA-256 of the exact text. No normalisation: a one-character difference
   * must produce a different key.
   */
  static hash(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex');
  }

  static cacheKey(text: string, targetLanguage: string): CacheKey {
    return { targetLanguage, contentHash: this.hash(text) };
  }

  static serialize(key: CacheKey): string {
    return `${key.targetLanguage}:${key.contentHash}`;
  }
}
