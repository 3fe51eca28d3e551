import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { CacheCorruptionError } from '../types.js';
import type { CacheStore } from './cache-store.js';

const cacheFileSchema = z.record(z.string(), z.string());

export class JsonFileCacheStore implements CacheStore {
  constructor(readonly location: string) {}

  load(): Map<string, string> {
    if (!existsSync(this.location)) {
      return new Map();
    }

    let raw: string;
    try {
      raw = readFileSync(this.location, 'utf8');
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CacheCorruptionError(`Cache file could not be read: ${detail}`, this.location);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CacheCorruptionError(`Cache file is not valid JSON: ${detail}`, this.location);
    }

    const result = cacheFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheCorruptionError(
        'Cache file must be an object mapping keys to translated text',
        this.location
      );
    }
    return new Map(Object.entries(result.data));
  }

  flush(entries: ReadonlyMap<string, string>): void {
    mkdirSync(path.dirname(path.resolve(this.location)), { recursive: true });
    const tempFile = `${this.location}.tmp`;
    try {
      writeFileSync(tempFile, JSON.stringify(Object.fromEntries(entries), null, 2), 'utf8');
      renameSync(tempFile, this.location);
    } catch (error) {
      rmSync(tempFile, { force: true });
      throw error;
    }
  }
}
