/**
 * In-memory TTL cache for read-mostly data (the cosmetic catalog).
 *
 * Entries expire lazily on read; `set` prunes expired entries once the cache
 * grows past `maxEntries`. One instance lives on the engine context, so tests
 * get a fresh cache with every context.
 */

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export class TtlCache {
  private entries = new Map<string, CacheEntry<unknown>>();

  constructor(
    private readonly maxEntries = 256,
    private readonly now: () => number = Date.now,
  ) {}

  get<T>(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    // Callers read a key back with the type they stored it under
    return entry.data as T;
  }

  /** A TTL of 0 stores nothing. */
  set<T>(key: string, data: T, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return;

    if (this.entries.size >= this.maxEntries) {
      this.prune();
    }
    this.entries.set(key, { data, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getOrSet<T>(key: string, ttlSeconds: number, load: () => T): T {
    const cached = this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    const data = load();
    this.set(key, data, ttlSeconds);
    return data;
  }

  prune(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  stats(): { size: number; keys: string[] } {
    return {
      size: this.entries.size,
      keys: Array.from(this.entries.keys()),
    };
  }
}

export const CACHE_KEYS = {
  catalog: () => 'cosmetics:catalog',
} as const;
