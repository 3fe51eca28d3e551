/**
 * Durable backing for {@link ResultCache}. `load` is called once; `flush`
 * receives the full mapping after every write.
 */
export interface CacheStore {
  readonly location: string;

  /**
   * @throws {CacheCorruptionError} when the persisted state cannot be read back
   */
  load(): Map<string, string>;

  flush(entries: ReadonlyMap<string, string>): void;

  close?(): void;
}

export class MemoryCacheStore implements CacheStore {
  readonly location = ':memory:';
  private snapshot: Map<string, string>;
  flushCount = 0;

  constructor(initial: Record<string, string> = {}) {
    this.snapshot = new Map(Object.entries(initial));
  }

  load(): Map<string, string> {
    return new Map(this.snapshot);
  }

  flush(entries: ReadonlyMap<string, string>): void {
    this.snapshot = new Map(entries);
    this.flushCount++;
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.snapshot);
  }
}
