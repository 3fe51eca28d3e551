import Database from 'better-sqlite3';
import { CacheCorruptionError } from '../types.js';
import type { CacheStore } from './cache-store.js';

interface CacheRow {
  cache_key: string;
  translated_text: string;
}

const CORRUPTION_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT']);

export class SqliteCacheStore implements CacheStore {
  private db: Database.Database | null = null;
  // Mirrors what is already on disk so a flush only writes changed rows.
  private readonly written = new Map<string, string>();

  constructor(readonly location: string) {}

  // Opened on first use so an unopenable path surfaces from load().
  private connection(): Database.Database {
    if (!this.db) {
      const db = new Database(this.location);
      try {
        this.ensureSchema(db);
      } catch (error) {
        db.close();
        throw error;
      }
      this.db = db;
    }
    return this.db;
  }

  private ensureSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS translations (
        cache_key TEXT PRIMARY KEY,
        translated_text TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);
  }

  load(): Map<string, string> {
    let db: Database.Database;
    try {
      db = this.connection();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CacheCorruptionError(`Cache database could not be opened: ${detail}`, this.location);
    }

    try {
      const rows = db
        .prepare<[], CacheRow>('SELECT cache_key, translated_text FROM translations')
        .all();

      this.written.clear();
      for (const row of rows) {
        this.written.set(row.cache_key, row.translated_text);
      }
      return new Map(this.written);
    } catch (error) {
      if (error instanceof Database.SqliteError && CORRUPTION_CODES.has(error.code)) {
        throw new CacheCorruptionError(`Cache database is unreadable: ${error.message}`, this.location);
      }
      throw error;
    }
  }

  flush(entries: ReadonlyMap<string, string>): void {
    const db = this.connection();
    const upsert = db.prepare<[string, string, number]>(`
      INSERT INTO translations (cache_key, translated_text, created_at)
      VALUES (?, ?, ?)
      ON CONFLICT(cache_key) DO UPDATE SET translated_text = excluded.translated_text
    `);

    const changed = [...entries].filter(([key, value]) => this.written.get(key) !== value);
    if (changed.length === 0) {
      return;
    }

    const writeChanged = db.transaction((rows: Array<[string, string]>) => {
      const now = Date.now();
      for (const [key, value] of rows) {
        upsert.run(key, value, now);
      }
    });
    writeChanged(changed);

    for (const [key, value] of changed) {
      this.written.set(key, value);
    }
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}
