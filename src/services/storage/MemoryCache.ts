interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

interface CacheOptions {
  ttlMs?: number;
}

/** Process-local key/value cache; entries without a TTL never expire. A value failing its guard is dropped. */
export class MemoryCache {
  private readonly entries = new Map<string, CacheEntry<unknown>>();

  constructor(private readonly now: () => number = Date.now) {}

  async get<T>(key: string, guard: (value: unknown) => value is T): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return null;
    }
    if (!guard(entry.value)) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set<T>(key: string, value: T, options: CacheOptions = {}): Promise<void> {
    const ttlMs = options.ttlMs ?? 0;
    this.entries.set(key, {
      value,
      expiresAt: ttlMs > 0 ? this.now() + ttlMs : 0,
    });
  }

  private isExpired(entry: CacheEntry<unknown>): boolean {
    return entry.expiresAt !== 0 && entry.expiresAt < this.now();
  }
}
